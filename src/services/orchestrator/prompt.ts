// Prompt construction for the ReAct loop

import type { ToolSpec } from '../tools/types.js';
import { formatUsage } from '../tools/registry.js';

export function buildSystemPrompt(tools: readonly ToolSpec<string>[]): string {
  const toolLines = tools.map(tool => `- ${formatUsage(tool)} - ${tool.description}`);

  return `You are a helpful Norwegian financial assistant using Statistics Norway data.

Answer questions using this EXACT format:

THOUGHT: [explain what you need to know]
ACTION: tool_name("argument")
[wait for observation]

Available tools:
${toolLines.join('\n')}

After getting observations, provide:
FINAL ANSWER: [your complete answer with sources]

Be concise. Use tools to get data before answering.`;
}

export function buildPrompt(systemPrompt: string, question: string, history: readonly string[]): string {
  const header = `${systemPrompt}\n\nQuestion: ${question}\n\n`;
  if (history.length === 0) {
    return `${header}Let's think step by step:`;
  }
  return `${header}${history.join('\n')}\n\nContinue reasoning:`;
}
