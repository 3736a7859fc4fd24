// Baseline Agent
// Single-shot answering: one keyword-detected spending lookup, one model call.
// Kept as a comparison point for the ReAct loop.

import type { ModelClient } from '../providers/model-client.js';
import type { ToolExecutor } from './orchestrator/executor.js';
import type { ToolKind } from './tools/types.js';

const SYSTEM_PROMPT = `You are a helpful Norwegian financial assistant.
You have access to Statistics Norway (SSB) household budget data.

When answering questions about Norwegian household spending:
1. Identify the spending category being asked about
2. Provide average spending amount from SSB data (if available)
3. Give a clear, factual, and concise answer
4. If data is missing, say so clearly.

Always cite Statistics Norway (SSB) as your source when giving numbers.`;

const DETECTABLE_CATEGORIES = [
  'housing',
  'food',
  'transport',
  'entertainment',
  'clothing',
  'health',
  'communication',
  'restaurants',
];

export interface BaselineResult {
  question: string;
  answer: string;
  toolUsed: boolean;
  toolResult: string | null;
  model: string;
}

export function detectCategory(question: string): string | null {
  const lower = question.toLowerCase();
  return DETECTABLE_CATEGORIES.find(category => lower.includes(category)) ?? null;
}

export function buildBaselinePrompt(question: string, toolResult: string | null): string {
  const userMessage = toolResult
    ? `Question: ${question}

Relevant data from Statistics Norway: ${toolResult}

Please answer the question using this data and cite SSB as the source.`
    : question;

  return `${SYSTEM_PROMPT}\n\n${userMessage}`;
}

export class BaselineAgent {
  private label: string;

  constructor(private model: ModelClient, private executor: ToolExecutor<ToolKind>) {
    this.label = `baseline (${model.label})`;
  }

  async run(question: string): Promise<BaselineResult> {
    const category = detectCategory(question);
    const toolResult = category ? await this.executor.observe('get_spending', [category]) : null;

    const answer = (await this.model.generate(buildBaselinePrompt(question, toolResult))).trim();

    return {
      question,
      answer: answer || 'The model returned an empty answer',
      toolUsed: category !== null,
      toolResult,
      model: this.label,
    };
  }
}
