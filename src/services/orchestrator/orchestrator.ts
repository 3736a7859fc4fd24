// ReAct Orchestrator
// Drives the think -> act -> observe loop: one model call per iteration, at most
// one tool call per iteration, until FINAL ANSWER or the iteration cap

import type { ModelClient } from '../../providers/model-client.js';
import type { ToolRegistry } from '../tools/registry.js';
import { AppError } from '../../utils/errors.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import { ToolExecutor } from './executor.js';
import { parseModelOutput } from './parser.js';
import { buildPrompt, buildSystemPrompt } from './prompt.js';
import { Transcript } from './transcript.js';
import type { AgentResult, LoopState, OrchestratorOptions, ParsedAction } from './types.js';

export const DEFAULT_MAX_ITERATIONS = 5;
export const EXHAUSTED_ANSWER = 'Could not reach final answer within iteration limit';
export const EMPTY_FINAL_ANSWER = 'Final answer marker found but no answer text followed';

export interface OrchestratorDeps<K extends string = string> {
  model: ModelClient;
  registry: ToolRegistry<K>;
  executor?: ToolExecutor<K>;
  logger?: Logger;
}

export class ReactOrchestrator<K extends string = string> {
  private model: ModelClient;
  private executor: ToolExecutor<K>;
  private systemPrompt: string;
  private maxIterations: number;
  private label: string;
  private log: Logger;

  constructor(deps: OrchestratorDeps<K>, options: OrchestratorOptions = {}) {
    const maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw AppError.configuration(`maxIterations must be a positive integer, got ${maxIterations}`);
    }

    this.model = deps.model;
    this.log = (deps.logger ?? rootLogger).child({ component: 'react-orchestrator' });
    this.executor = deps.executor ?? new ToolExecutor(deps.registry, { logger: deps.logger });
    this.systemPrompt = buildSystemPrompt(deps.registry.list());
    this.maxIterations = maxIterations;
    this.label = options.label ?? `react (${deps.model.label})`;
  }

  /**
   * Answers one question. Every session owns its own transcript, so concurrent
   * calls on one orchestrator do not interact. Rejects only when the model fails.
   */
  async run(question: string): Promise<AgentResult> {
    const transcript = new Transcript();
    let state: LoopState = 'awaiting_model';
    const log = this.log.child({ question });

    for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
      const prompt = buildPrompt(this.systemPrompt, question, transcript.history);
      const output = await this.model.generate(prompt);
      log.debug({ iteration, state, output }, 'Model output');
      transcript.append(output);

      const parsed = parseModelOutput(output);

      if (parsed.kind === 'final') {
        state = 'terminated';
        transcript.record({ iteration, output, action: null, observation: null, terminal: true });
        log.info({ iteration }, 'Reached final answer');

        return this.result(question, transcript, {
          answer: parsed.answer || EMPTY_FINAL_ANSWER,
          status: state,
          iterations: iteration,
        });
      }

      if (parsed.kind === 'action') {
        state = 'acting';
        const action: ParsedAction = { tool: parsed.tool, args: parsed.args };
        const observation = await this.executor.observe(action.tool, action.args);
        log.info({ iteration, tool: action.tool, args: action.args }, 'Tool observed');

        transcript.append(`OBSERVATION: ${observation}`);
        transcript.record({ iteration, output, action, observation, terminal: false });
        continue;
      }

      state = 'awaiting_model';
      transcript.record({ iteration, output, action: null, observation: null, terminal: false });
    }

    state = 'exhausted';
    log.warn({ maxIterations: this.maxIterations }, 'Max iterations reached');

    return this.result(question, transcript, {
      answer: EXHAUSTED_ANSWER,
      status: state,
      iterations: this.maxIterations,
    });
  }

  private result(
    question: string,
    transcript: Transcript,
    outcome: Pick<AgentResult, 'answer' | 'status' | 'iterations'>,
  ): AgentResult {
    return {
      question,
      ...outcome,
      turns: transcript.turns,
      history: transcript.history,
      model: this.label,
    };
  }
}
