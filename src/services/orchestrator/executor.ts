// Tool Executor
// Binds parsed arguments to a tool's parameters, runs it, and turns every
// outcome into one observation string for the transcript

import type { ToolRegistry } from '../tools/registry.js';
import { formatUsage } from '../tools/registry.js';
import type { ToolArgs, ToolResult, ToolSpec } from '../tools/types.js';
import { errorMessage } from '../../utils/errors.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';

export const UNKNOWN_TOOL_PREFIX = 'Error: Unknown tool';
export const TOOL_ERROR_PREFIX = 'Error calling tool:';

export interface ExecutionResult {
  tool: string;
  success: boolean;
  observation: string;
  durationMs: number;
}

export interface ToolExecutorOptions {
  timeoutMs?: number;
  logger?: Logger;
}

type Binding = { ok: true; args: ToolArgs } | { ok: false; error: string };

export function bindArguments(tool: Pick<ToolSpec<string>, 'name' | 'parameters'>, rawArgs: readonly string[]): Binding {
  const { parameters } = tool;
  if (rawArgs.length > parameters.length) {
    return {
      ok: false,
      error: `${tool.name} takes at most ${parameters.length} argument(s) but got ${rawArgs.length}. Usage: ${formatUsage(tool)}`,
    };
  }

  const args: ToolArgs = {};
  for (let i = 0; i < parameters.length; i++) {
    const param = parameters[i];
    if (i < rawArgs.length) {
      args[param.name] = rawArgs[i];
    } else if (param.default !== undefined) {
      args[param.name] = param.default;
    } else {
      return {
        ok: false,
        error: `${tool.name} is missing required argument "${param.name}". Usage: ${formatUsage(tool)}`,
      };
    }
  }

  return { ok: true, args };
}

export class ToolExecutor<K extends string = string> {
  private timeoutMs: number;
  private log: Logger;

  constructor(private registry: ToolRegistry<K>, options: ToolExecutorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.log = (options.logger ?? rootLogger).child({ component: 'tool-executor' });
  }

  /** Never rejects: unknown tools, usage errors, failures and timeouts all become observations. */
  async execute(toolName: string, rawArgs: readonly string[]): Promise<ExecutionResult> {
    const startTime = Date.now();
    const done = (success: boolean, observation: string): ExecutionResult => ({
      tool: toolName,
      success,
      observation,
      durationMs: Date.now() - startTime,
    });

    const tool = this.registry.resolve(toolName);
    if (!tool) {
      this.log.warn({ tool: toolName }, 'Model requested an unknown tool');
      const available = this.registry.toolNames().join(', ');
      return done(false, `${UNKNOWN_TOOL_PREFIX} '${toolName}'. Available tools: ${available}`);
    }

    const binding = bindArguments(tool, rawArgs);
    if (!binding.ok) {
      return done(false, `${TOOL_ERROR_PREFIX} ${binding.error}`);
    }

    try {
      this.log.info({ tool: tool.name, args: binding.args }, 'Executing tool');
      const result = await this.executeWithTimeout(tool, binding.args);
      if (result.success) {
        return done(true, result.content);
      }
      return done(false, `${TOOL_ERROR_PREFIX} ${result.error}`);
    } catch (error) {
      this.log.error({ tool: tool.name, err: error }, 'Tool threw');
      return done(false, `${TOOL_ERROR_PREFIX} ${errorMessage(error)}`);
    }
  }

  /** The observation text alone, as fed back to the model. */
  async observe(toolName: string, rawArgs: readonly string[]): Promise<string> {
    const result = await this.execute(toolName, rawArgs);
    return result.observation;
  }

  private async executeWithTimeout(tool: ToolSpec<K>, args: ToolArgs): Promise<ToolResult> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`${tool.name} timed out after ${this.timeoutMs}ms`)),
        this.timeoutMs,
      );
    });

    try {
      return await Promise.race([tool.execute(args), timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  }
}
