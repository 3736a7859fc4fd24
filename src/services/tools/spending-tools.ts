// Spending tools
// Household spending lookups backed by a SpendingDataSource (SSB Table 10235)

import { listCategoryTerms, resolveCategory } from '../ssb/categories.js';
import type { SpendingDataSource } from '../ssb/spending-source.js';
import { errorMessage } from '../../utils/errors.js';
import { ToolRegistry } from './registry.js';
import type { ToolArgs, ToolCallable, ToolDefinition, ToolKind, ToolResult } from './types.js';

export interface SpendingToolOptions {
  dataSource: SpendingDataSource;
  defaultYear: string;
}

const SOURCE_TABLE_URL = 'https://www.ssb.no/statbank/table/10235';

const nokFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

export function formatNok(amount: number): string {
  return nokFormat.format(amount);
}

function ok(content: string): ToolResult {
  return { success: true, content };
}

function fail(error: string): ToolResult {
  return { success: false, error };
}

function checkYear(year: string): string | null {
  return /^\d{4}$/.test(year) ? null : `Invalid year '${year}'; expected a four-digit year such as 2012`;
}

function createHandlers({ dataSource }: SpendingToolOptions) {
  async function getSpending(args: ToolArgs): Promise<ToolResult> {
    const { category, year } = args;
    const yearError = checkYear(year);
    if (yearError) return fail(yearError);

    const code = resolveCategory(category);
    if (!code) {
      return fail(`Category '${category}' not recognized. Available categories: ${listCategoryTerms().join(', ')}`);
    }

    try {
      const spending = await dataSource.fetchCategorySpending(code, year);
      if (!spending) {
        return fail(`No data available for ${category} in ${year}`);
      }

      return ok(
        `Norwegian households spend an average of ${formatNok(spending.monthlyAmount)} NOK per month ` +
        `on ${spending.canonicalLabel} (${formatNok(spending.annualAmount)} NOK per year). ` +
        `Source: Statistics Norway Household Budget Survey ${year}, Table 10235. ` +
        `URL: ${SOURCE_TABLE_URL}`,
      );
    } catch (error) {
      return fail(`Error retrieving data: ${errorMessage(error)}`);
    }
  }

  async function compareSpending(args: ToolArgs): Promise<ToolResult> {
    const { category1, category2, year } = args;
    const yearError = checkYear(year);
    if (yearError) return fail(yearError);

    const code1 = resolveCategory(category1);
    const code2 = resolveCategory(category2);
    if (!code1 || !code2) {
      return fail(`One or both categories not recognized: ${category1}, ${category2}`);
    }

    try {
      const first = await dataSource.fetchCategorySpending(code1, year);
      const second = await dataSource.fetchCategorySpending(code2, year);
      if (!first || !second) {
        return fail(`No data available for comparison in ${year}`);
      }

      if (first.monthlyAmount <= 0 || second.monthlyAmount <= 0) {
        return fail('Could not compare - one category has zero spending');
      }

      const [higher, lower] = first.monthlyAmount > second.monthlyAmount
        ? [first, second]
        : [second, first];
      const ratio = higher.monthlyAmount / lower.monthlyAmount;

      return ok(
        `${higher.canonicalLabel} (${formatNok(higher.monthlyAmount)} NOK/month) costs ` +
        `${ratio.toFixed(1)}x more than ${lower.canonicalLabel} (${formatNok(lower.monthlyAmount)} NOK/month). ` +
        `Source: SSB Table 10235 (${year})`,
      );
    } catch (error) {
      return fail(`Error comparing categories: ${errorMessage(error)}`);
    }
  }

  async function getTotalSpending(args: ToolArgs): Promise<ToolResult> {
    const { year } = args;
    const yearError = checkYear(year);
    if (yearError) return fail(yearError);

    try {
      const total = await dataSource.fetchTotalSpending(year);
      if (!total) {
        return fail(`No data available for ${year}`);
      }

      return ok(
        `Norwegian households spend an average of ${formatNok(total.monthlyAmount)} NOK per month ` +
        `(${formatNok(total.annualAmount)} NOK per year) across ${total.categoryCount} main spending categories. ` +
        `Source: Statistics Norway Household Budget Survey ${year}, Table 10235`,
      );
    } catch (error) {
      return fail(`Error calculating total spending: ${errorMessage(error)}`);
    }
  }

  return {
    get_spending: getSpending,
    compare_spending: compareSpending,
    get_total_spending: getTotalSpending,
  } satisfies Record<ToolKind, ToolCallable>;
}

export function createSpendingTools(options: SpendingToolOptions): ToolDefinition[] {
  const handlers = createHandlers(options);
  const yearParam = {
    name: 'year',
    description: 'Survey year',
    default: options.defaultYear,
  };

  return [
    {
      name: 'get_spending',
      aliases: ['get_average_spending_by_category'],
      description: 'get spending for a category like "housing", "food", etc.',
      parameters: [
        { name: 'category', description: 'Spending category, e.g. "housing" or "food"' },
        yearParam,
      ],
      execute: handlers.get_spending,
    },
    {
      name: 'compare_spending',
      aliases: ['compare_spending_categories'],
      description: 'compare two categories',
      parameters: [
        { name: 'category1', description: 'First spending category' },
        { name: 'category2', description: 'Second spending category', default: 'food' },
        yearParam,
      ],
      execute: handlers.compare_spending,
    },
    {
      name: 'get_total_spending',
      aliases: ['get_total_household_spending'],
      description: 'get total household spending',
      parameters: [yearParam],
      execute: handlers.get_total_spending,
    },
  ];
}

export function createSpendingToolRegistry(options: SpendingToolOptions): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of createSpendingTools(options)) {
    registry.register(tool);
  }
  return registry;
}
