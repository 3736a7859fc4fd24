// Agent wiring
// Constructs the collaborators of an agent session explicitly, once per application

import { env } from '../env.js';
import { createModelClient, getProvider, parseModelId, type ModelClient } from '../providers/index.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { BaselineAgent } from './baseline.js';
import { ReactOrchestrator } from './orchestrator/orchestrator.js';
import { ToolExecutor } from './orchestrator/executor.js';
import { SsbClient } from './ssb/client.js';
import { SsbSpendingSource, type SpendingDataSource } from './ssb/spending-source.js';
import { createSpendingToolRegistry } from './tools/spending-tools.js';
import type { ToolRegistry } from './tools/registry.js';
import type { ToolKind } from './tools/types.js';

export interface AgentServices {
  model: ModelClient;
  registry: ToolRegistry;
  executor: ToolExecutor<ToolKind>;
  baseline: BaselineAgent;
  createReactAgent(maxIterations?: number): ReactOrchestrator<ToolKind>;
}

export interface AgentServiceConfig {
  model: ModelClient;
  dataSource: SpendingDataSource;
  defaultYear?: string;
  maxIterations?: number;
  toolTimeoutMs?: number;
  logger?: Logger;
}

export function createAgentServices(config: AgentServiceConfig): AgentServices {
  const logger = config.logger ?? rootLogger;
  const registry = createSpendingToolRegistry({
    dataSource: config.dataSource,
    defaultYear: config.defaultYear ?? env.AGENT_DEFAULT_YEAR,
  });
  const executor = new ToolExecutor(registry, {
    timeoutMs: config.toolTimeoutMs ?? env.TOOL_TIMEOUT_MS,
    logger,
  });

  return {
    model: config.model,
    registry,
    executor,
    baseline: new BaselineAgent(config.model, executor),
    createReactAgent: (maxIterations = config.maxIterations ?? env.AGENT_MAX_ITERATIONS) =>
      new ReactOrchestrator({ model: config.model, registry, executor, logger }, { maxIterations }),
  };
}

/** Production wiring from environment configuration: SSB over HTTP plus the configured model provider. */
export function createDefaultAgentServices(logger: Logger = rootLogger): AgentServices {
  const { provider, model } = parseModelId(env.AGENT_MODEL);

  return createAgentServices({
    model: createModelClient(getProvider(provider), model, { timeoutMs: env.MODEL_TIMEOUT_MS }),
    dataSource: new SsbSpendingSource(new SsbClient({ logger })),
    logger,
  });
}
