export { SsbClient, SsbApiError, parseHouseholdData, HOUSEHOLD_BUDGET_TABLE } from './client.js';
export type { JsonStatDataset, HouseholdSpendingRow, TableMetadata, TableQuery, SsbClientOptions } from './client.js';
export { SsbSpendingSource } from './spending-source.js';
export type { SpendingDataSource, CategorySpending, TotalSpending } from './spending-source.js';
export { resolveCategory, listCategoryTerms, CATEGORY_CODES } from './categories.js';
export type { CategoryCode } from './categories.js';
