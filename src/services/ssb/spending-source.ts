// Spending data source
// The data-fetch collaborator consumed by the spending tools

import { SsbClient, parseHouseholdData } from './client.js';
import type { CategoryCode } from './categories.js';

export interface CategorySpending {
  categoryCode: CategoryCode;
  canonicalLabel: string;
  monthlyAmount: number;
  annualAmount: number;
  year: string;
}

export interface TotalSpending {
  monthlyAmount: number;
  annualAmount: number;
  categoryCount: number;
  year: string;
}

/**
 * Lookups resolve to null when the data does not exist (NotFound) and
 * reject when the backend itself fails.
 */
export interface SpendingDataSource {
  fetchCategorySpending(category: CategoryCode, year: string): Promise<CategorySpending | null>;
  fetchTotalSpending(year: string): Promise<TotalSpending | null>;
}

export class SsbSpendingSource implements SpendingDataSource {
  constructor(private client: SsbClient) {}

  async fetchCategorySpending(category: CategoryCode, year: string): Promise<CategorySpending | null> {
    const dataset = await this.client.getHouseholdBudgetData(year, [category]);
    if (!dataset) return null;

    const rows = parseHouseholdData(dataset).filter(row => row.categoryCode === category);
    if (rows.length === 0) return null;

    const annualAmount = rows.reduce((sum, row) => sum + row.value, 0);
    return {
      categoryCode: category,
      canonicalLabel: rows[0].category,
      monthlyAmount: annualAmount / 12,
      annualAmount,
      year,
    };
  }

  async fetchTotalSpending(year: string): Promise<TotalSpending | null> {
    const dataset = await this.client.getHouseholdBudgetData(year);
    if (!dataset) return null;

    const rows = parseHouseholdData(dataset);
    if (rows.length === 0) return null;

    const annualAmount = rows.reduce((sum, row) => sum + row.value, 0);
    return {
      monthlyAmount: annualAmount / 12,
      annualAmount,
      categoryCount: rows.length,
      year,
    };
  }
}
