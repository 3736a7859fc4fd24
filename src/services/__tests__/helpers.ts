// In-process stand-ins for the model and the SSB backend

import { vi } from 'vitest';
import type { ModelClient } from '../../providers/model-client.js';
import type { CategoryCode } from '../ssb/categories.js';
import type { CategorySpending, SpendingDataSource, TotalSpending } from '../ssb/spending-source.js';

export const HOUSING_LABEL = 'Housing, water, electricity, gas and other fuels';
export const FOOD_LABEL = 'Food and non-alcoholic beverages';

const ANNUAL_BY_CODE: Partial<Record<CategoryCode, { label: string; annual: number }>> = {
  '01': { label: FOOD_LABEL, annual: 52104 },
  '04': { label: HOUSING_LABEL, annual: 135984 },
  '07': { label: 'Transport', annual: 78000 },
};

export const HOUSING_OBSERVATION =
  `Norwegian households spend an average of 11,332 NOK per month on ${HOUSING_LABEL} (135,984 NOK per year). ` +
  'Source: Statistics Norway Household Budget Survey 2012, Table 10235. ' +
  'URL: https://www.ssb.no/statbank/table/10235';

export function createFakeDataSource(year = '2012') {
  const fetchCategorySpending = vi.fn(async (code: CategoryCode, requestedYear: string): Promise<CategorySpending | null> => {
    const entry = ANNUAL_BY_CODE[code];
    if (!entry || requestedYear !== year) return null;
    return {
      categoryCode: code,
      canonicalLabel: entry.label,
      annualAmount: entry.annual,
      monthlyAmount: entry.annual / 12,
      year: requestedYear,
    };
  });

  const fetchTotalSpending = vi.fn(async (requestedYear: string): Promise<TotalSpending | null> => {
    if (requestedYear !== year) return null;
    return { annualAmount: 408000, monthlyAmount: 34000, categoryCount: 12, year: requestedYear };
  });

  const dataSource: SpendingDataSource = { fetchCategorySpending, fetchTotalSpending };
  return { dataSource, fetchCategorySpending, fetchTotalSpending };
}

/** Replies with the scripted outputs in order, repeating the last one once they run out. */
export function createScriptedModel(outputs: string[], label = 'fake:scripted') {
  const prompts: string[] = [];
  const generate = vi.fn(async (prompt: string) => {
    prompts.push(prompt);
    return outputs[Math.min(prompts.length, outputs.length) - 1] ?? '';
  });

  const model: ModelClient = { label, generate };
  return { model, generate, prompts };
}
