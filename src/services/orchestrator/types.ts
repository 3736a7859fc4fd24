// Orchestrator Types

export interface ParsedAction {
  tool: string;
  args: string[];
}

/** What a single model output asks for. Parsing never throws; "none" is a normal outcome. */
export type ParseOutcome =
  | { kind: 'final'; answer: string }
  | ({ kind: 'action' } & ParsedAction)
  | { kind: 'none' };

export type LoopState = 'awaiting_model' | 'acting' | 'terminated' | 'exhausted';

/** An action as stored on a recorded turn. */
export interface RecordedAction {
  readonly tool: string;
  readonly args: readonly string[];
}

export interface Turn {
  readonly iteration: number;
  readonly output: string;
  readonly action: RecordedAction | null;
  readonly observation: string | null;
  readonly terminal: boolean;
}

export type AgentStatus = Extract<LoopState, 'terminated' | 'exhausted'>;

export interface AgentResult {
  question: string;
  answer: string;
  status: AgentStatus;
  turns: Turn[];
  /** Raw text fed back to the model: model outputs and OBSERVATION entries. */
  history: string[];
  iterations: number;
  model: string;
}

export interface OrchestratorOptions {
  maxIterations?: number;
  /** Label reported on results; defaults to the model client's label. */
  label?: string;
}
