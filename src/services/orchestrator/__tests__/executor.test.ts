import { describe, it, expect } from 'vitest';
import { ToolExecutor, bindArguments } from '../executor.js';
import { ToolRegistry } from '../../tools/registry.js';
import { createSpendingToolRegistry } from '../../tools/spending-tools.js';
import type { ToolDefinition } from '../../tools/types.js';
import { FOOD_LABEL, HOUSING_LABEL, HOUSING_OBSERVATION, createFakeDataSource } from '../../__tests__/helpers.js';

function spendingExecutor() {
  const fake = createFakeDataSource();
  const registry = createSpendingToolRegistry({ dataSource: fake.dataSource, defaultYear: '2012' });
  return { ...fake, executor: new ToolExecutor(registry) };
}

function customTool(name: string, execute: ToolDefinition<string>['execute']): ToolDefinition<string> {
  return {
    name,
    aliases: [],
    description: `${name} tool`,
    parameters: [{ name: 'input', description: 'Input' }],
    execute,
  };
}

describe('Tool Executor', () => {
  it('should call the housing tool with the year defaulted', async () => {
    const { executor, fetchCategorySpending } = spendingExecutor();

    const result = await executor.execute('get_spending', ['housing']);

    expect(result.success).toBe(true);
    expect(result.observation).toBe(HOUSING_OBSERVATION);
    expect(result.observation).toMatch(/\d[\d,]* NOK per month/);
    expect(fetchCategorySpending).toHaveBeenCalledWith('04', '2012');
  });

  it('should resolve aliases case-insensitively', async () => {
    const { executor } = spendingExecutor();

    const observation = await executor.observe('GET_AVERAGE_SPENDING_BY_CATEGORY', ['housing']);

    expect(observation).toBe(HOUSING_OBSERVATION);
  });

  it('should use declared defaults for missing trailing arguments', async () => {
    const { executor } = spendingExecutor();

    const observation = await executor.observe('compare_spending', ['housing']);

    expect(observation).toBe(
      `${HOUSING_LABEL} (11,332 NOK/month) costs 2.6x more than ${FOOD_LABEL} (4,342 NOK/month). ` +
      'Source: SSB Table 10235 (2012)',
    );
  });

  it('should report unknown tools without throwing', async () => {
    const { executor } = spendingExecutor();

    const result = await executor.execute('unknown_tool', ['x']);

    expect(result.success).toBe(false);
    expect(result.tool).toBe('unknown_tool');
    expect(result.observation).toBe(
      "Error: Unknown tool 'unknown_tool'. Available tools: get_spending, compare_spending, get_total_spending",
    );
  });

  it('should report a missing required argument as a usage error', async () => {
    const { executor, fetchCategorySpending } = spendingExecutor();

    const observation = await executor.observe('get_spending', []);

    expect(observation).toBe(
      'Error calling tool: get_spending is missing required argument "category". Usage: get_spending("category", "year"?)',
    );
    expect(fetchCategorySpending).not.toHaveBeenCalled();
  });

  it('should report surplus arguments as a usage error', async () => {
    const { executor, fetchTotalSpending } = spendingExecutor();

    const observation = await executor.observe('get_total_spending', ['2012', 'extra']);

    expect(observation).toBe(
      'Error calling tool: get_total_spending takes at most 1 argument(s) but got 2. Usage: get_total_spending("year"?)',
    );
    expect(fetchTotalSpending).not.toHaveBeenCalled();
  });

  it('should tag tool failures as errors', async () => {
    const { executor } = spendingExecutor();

    const observation = await executor.observe('get_spending', ['housing', '1999']);

    expect(observation).toBe('Error calling tool: No data available for housing in 1999');
  });

  it('should convert thrown errors into observations', async () => {
    const registry = new ToolRegistry<string>();
    registry.register(customTool('explode', async () => {
      throw new Error('backend down');
    }));
    const executor = new ToolExecutor(registry);

    const result = await executor.execute('explode', ['x']);

    expect(result.success).toBe(false);
    expect(result.observation).toBe('Error calling tool: backend down');
  });

  it('should time out slow tools', async () => {
    const registry = new ToolRegistry<string>();
    registry.register(customTool('slow', () => new Promise(() => {})));
    const executor = new ToolExecutor(registry, { timeoutMs: 20 });

    const observation = await executor.observe('slow', ['x']);

    expect(observation).toBe('Error calling tool: slow timed out after 20ms');
  });

  it('should pass successful output through unmodified', async () => {
    const registry = new ToolRegistry<string>();
    registry.register(customTool('echo', async ({ input }) => ({ success: true, content: `  ${input}\n` })));
    const executor = new ToolExecutor(registry);

    expect(await executor.observe('echo', ['raw'])).toBe('  raw\n');
  });
});

describe('bindArguments', () => {
  const tool = {
    name: 'compare_spending',
    parameters: [
      { name: 'category1', description: '' },
      { name: 'category2', description: '', default: 'food' },
      { name: 'year', description: '', default: '2012' },
    ],
  };

  it('should bind positionally and fill defaults', () => {
    expect(bindArguments(tool, ['housing'])).toEqual({
      ok: true,
      args: { category1: 'housing', category2: 'food', year: '2012' },
    });
    expect(bindArguments(tool, ['housing', 'transport', '2011'])).toEqual({
      ok: true,
      args: { category1: 'housing', category2: 'transport', year: '2011' },
    });
  });

  it('should reject missing required arguments', () => {
    const binding = bindArguments(tool, []);
    expect(binding.ok).toBe(false);
  });
});
