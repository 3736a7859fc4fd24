import { describe, it, expect } from 'vitest';
import { BaselineAgent, buildBaselinePrompt, detectCategory } from '../baseline.js';
import { ToolExecutor } from '../orchestrator/executor.js';
import { createSpendingToolRegistry } from '../tools/spending-tools.js';
import { HOUSING_OBSERVATION, createFakeDataSource, createScriptedModel } from './helpers.js';

function setup(outputs: string[]) {
  const fake = createFakeDataSource();
  const registry = createSpendingToolRegistry({ dataSource: fake.dataSource, defaultYear: '2012' });
  const scripted = createScriptedModel(outputs);
  const agent = new BaselineAgent(scripted.model, new ToolExecutor(registry));
  return { ...fake, ...scripted, agent };
}

describe('Baseline Agent', () => {
  it('should detect the first known category mentioned in the question', () => {
    expect(detectCategory('How much do Norwegian families spend on HOUSING?')).toBe('housing');
    expect(detectCategory('Do Norwegians spend more on food or transport?')).toBe('food');
    expect(detectCategory('What is the weather like?')).toBeNull();
  });

  it('should enrich the question with the tool result', async () => {
    const { agent, prompts } = setup(['  About 11,332 NOK per month (SSB).  ']);

    const result = await agent.run('How much do Norwegian families spend on housing?');

    expect(result).toEqual({
      question: 'How much do Norwegian families spend on housing?',
      answer: 'About 11,332 NOK per month (SSB).',
      toolUsed: true,
      toolResult: HOUSING_OBSERVATION,
      model: 'baseline (fake:scripted)',
    });
    expect(prompts[0]).toBe(buildBaselinePrompt('How much do Norwegian families spend on housing?', HOUSING_OBSERVATION));
    expect(prompts[0]).toContain(`Relevant data from Statistics Norway: ${HOUSING_OBSERVATION}`);
  });

  it('should ask the model directly when no category is found', async () => {
    const { agent, prompts, fetchCategorySpending } = setup(['I do not know.']);

    const result = await agent.run('Is Norway expensive?');

    expect(result.toolUsed).toBe(false);
    expect(result.toolResult).toBeNull();
    expect(prompts[0].endsWith('\n\nIs Norway expensive?')).toBe(true);
    expect(fetchCategorySpending).not.toHaveBeenCalled();
  });

  it('should never return an empty answer', async () => {
    const { agent } = setup(['   ']);

    const result = await agent.run('Is Norway expensive?');

    expect(result.answer).toBe('The model returned an empty answer');
  });
});
