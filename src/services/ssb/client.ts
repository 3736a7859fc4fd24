// Statistics Norway (SSB) API client
// Posts PxWeb queries, caches the JSON-stat2 responses and flattens them into rows

import { z } from 'zod';
import { env } from '../../env.js';
import { TTLCache } from '../../utils/ttl-cache.js';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import { CATEGORY_CODES } from './categories.js';

export const HOUSEHOLD_BUDGET_TABLE = '10235';

const CategorySchema = z.object({
  index: z.union([z.record(z.number()), z.array(z.string())]).optional(),
  label: z.record(z.string()).optional(),
});

const DimensionSchema = z.object({
  label: z.string().optional(),
  category: CategorySchema,
});

export const JsonStatDatasetSchema = z.object({
  label: z.string().optional(),
  dimension: z.record(DimensionSchema),
  value: z.union([
    z.array(z.number().nullable()),
    z.record(z.number().nullable()),
  ]),
});

export type JsonStatDataset = z.infer<typeof JsonStatDatasetSchema>;

const TableMetadataSchema = z.object({
  title: z.string(),
  variables: z.array(z.object({
    code: z.string(),
    text: z.string(),
    values: z.array(z.string()),
    valueTexts: z.array(z.string()),
  })),
});

export type TableMetadata = z.infer<typeof TableMetadataSchema>;

interface QuerySelection {
  code: string;
  selection: {
    filter: 'item';
    values: string[];
  };
}

export interface TableQuery {
  query: QuerySelection[];
  response: { format: 'json-stat2' };
}

export interface HouseholdSpendingRow {
  category: string;
  categoryCode: string;
  /** NOK per household per year */
  value: number;
  year: string;
}

export interface SsbClientOptions {
  baseUrl?: string;
  cacheTtlMs?: number;
  logger?: Logger;
}

function item(code: string, values: string[]): QuerySelection {
  return { code, selection: { filter: 'item', values } };
}

export class SsbApiError extends Error {
  constructor(message: string, public status?: number) {
    super(message);
    this.name = 'SsbApiError';
  }
}

export class SsbClient {
  private baseUrl: string;
  private cache: TTLCache<string, JsonStatDataset>;
  private log: Logger;

  constructor(options: SsbClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? env.SSB_BASE_URL).replace(/\/+$/, '');
    this.cache = new TTLCache(options.cacheTtlMs ?? env.SSB_CACHE_TTL_MS);
    this.log = (options.logger ?? rootLogger).child({ component: 'ssb' });
  }

  async getTableMetadata(tableId: string): Promise<TableMetadata> {
    const response = await fetch(`${this.baseUrl}/en/table/${tableId}`, {
      method: 'GET',
      headers: { Accept: 'application/json' },
    });

    if (!response.ok) {
      throw new SsbApiError(`SSB metadata request for table ${tableId} failed (${response.status})`, response.status);
    }

    const parsed = TableMetadataSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SsbApiError(`SSB returned malformed metadata for table ${tableId}`);
    }
    return parsed.data;
  }

  /**
   * Runs a table query. Resolves to null when SSB rejects the selection
   * (400/404: unknown year or category), throws on any other failure.
   */
  async queryTable(tableId: string, query: TableQuery): Promise<JsonStatDataset | null> {
    const cacheKey = `${tableId}:${JSON.stringify(query)}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      this.log.debug({ tableId }, 'Loaded table query from cache');
      return cached;
    }

    this.log.info({ tableId }, 'Querying SSB table');
    const response = await fetch(`${this.baseUrl}/en/table/${tableId}`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body: JSON.stringify(query),
    });

    if (response.status === 400 || response.status === 404) {
      this.log.warn({ tableId, status: response.status }, 'SSB rejected table query');
      return null;
    }

    if (!response.ok) {
      throw new SsbApiError(`SSB query for table ${tableId} failed (${response.status})`, response.status);
    }

    const parsed = JsonStatDatasetSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new SsbApiError(`SSB returned a malformed JSON-stat2 dataset for table ${tableId}`);
    }

    this.cache.set(cacheKey, parsed.data);
    return parsed.data;
  }

  async getHouseholdBudgetData(year: string, categories: readonly string[] = CATEGORY_CODES): Promise<JsonStatDataset | null> {
    const query: TableQuery = {
      query: [
        item('Forbruksundersok', [...categories]),
        item('ContentsCode', ['Utgift']),
        item('Tid', [year]),
      ],
      response: { format: 'json-stat2' },
    };

    return this.queryTable(HOUSEHOLD_BUDGET_TABLE, query);
  }
}

function categoryPosition(index: Record<string, number> | string[] | undefined, code: string): number | undefined {
  if (!index) return undefined;
  if (Array.isArray(index)) {
    const position = index.indexOf(code);
    return position >= 0 ? position : undefined;
  }
  return index[code];
}

/**
 * Flattens a household budget dataset into one row per spending category.
 * ContentsCode and Tid are single-valued in our queries, so the category
 * position indexes the value array directly.
 */
export function parseHouseholdData(dataset: JsonStatDataset): HouseholdSpendingRow[] {
  const categoryDim = dataset.dimension['Forbruksundersok'];
  if (!categoryDim) return [];

  const labels = categoryDim.category.label ?? {};
  const yearLabels = Object.values(dataset.dimension['Tid']?.category.label ?? {});
  const year = yearLabels[0] ?? 'Unknown';

  const rows: HouseholdSpendingRow[] = [];
  for (const [code, label] of Object.entries(labels)) {
    const position = categoryPosition(categoryDim.category.index, code);
    if (position === undefined) continue;

    const value = Array.isArray(dataset.value)
      ? dataset.value[position]
      : dataset.value[String(position)];

    if (typeof value === 'number') {
      rows.push({ category: label, categoryCode: code, value, year });
    }
  }

  return rows;
}
