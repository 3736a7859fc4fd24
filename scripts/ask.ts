#!/usr/bin/env node
// Ask the spending agent questions from a terminal
// Usage: npm run ask -- [--baseline] ["question"]

import 'dotenv/config';
import readline from 'node:readline/promises';
import { createDefaultAgentServices } from '../src/services/agent.js';
import { logger } from '../src/utils/logger.js';
import type { AgentResult } from '../src/services/orchestrator/types.js';

const rule = '='.repeat(80);

function printReactResult(result: AgentResult): void {
  for (const turn of result.turns) {
    console.log(`--- Iteration ${turn.iteration} ---\n`);
    console.log(`LLM output:\n${turn.output}\n`);
    if (turn.action) {
      console.log(`Executing: ${turn.action.tool}(${turn.action.args.join(', ')})\n`);
      console.log(`OBSERVATION:\n${turn.observation ?? ''}\n`);
    }
  }

  console.log(rule);
  console.log(result.status === 'terminated' ? 'REACHED FINAL ANSWER' : 'MAX ITERATIONS REACHED');
  console.log(rule);
  console.log(result.answer);
  console.log(`\nCompleted in ${result.iterations} iteration(s) using ${result.model}`);
  console.log(`${rule}\n`);
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const baseline = argv.includes('--baseline');
  const questionArg = argv.filter(arg => arg !== '--baseline').join(' ').trim();

  const services = createDefaultAgentServices(logger);

  const ask = async (question: string) => {
    if (baseline) {
      const result = await services.baseline.run(question);
      console.log(`Answer: ${result.answer}`);
      console.log(`Used tool: ${result.toolUsed}`);
      if (result.toolResult) console.log(`Tool result: ${result.toolResult}`);
      return;
    }
    printReactResult(await services.createReactAgent().run(question));
  };

  if (questionArg) {
    await ask(questionArg);
    return;
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    while (true) {
      const question = (await rl.question('Question (empty to quit): ')).trim();
      if (!question) break;
      await ask(question);
    }
  } finally {
    rl.close();
  }
}

main().catch(error => {
  logger.error({ err: error }, 'Agent run failed');
  process.exitCode = 1;
});
