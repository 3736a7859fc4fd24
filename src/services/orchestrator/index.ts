// Orchestrator Module - Main exports

export { ReactOrchestrator, DEFAULT_MAX_ITERATIONS, EXHAUSTED_ANSWER, EMPTY_FINAL_ANSWER } from './orchestrator.js';
export type { OrchestratorDeps } from './orchestrator.js';
export { parseModelOutput, parseAction, extractFinalAnswer } from './parser.js';
export { ToolExecutor, bindArguments, UNKNOWN_TOOL_PREFIX, TOOL_ERROR_PREFIX } from './executor.js';
export type { ExecutionResult, ToolExecutorOptions } from './executor.js';
export { buildPrompt, buildSystemPrompt } from './prompt.js';
export { Transcript } from './transcript.js';
export type {
  AgentResult,
  AgentStatus,
  LoopState,
  OrchestratorOptions,
  ParsedAction,
  RecordedAction,
  ParseOutcome,
  Turn,
} from './types.js';
