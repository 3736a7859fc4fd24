// Spending categories of SSB Table 10235 (COICOP main groups) and the
// free-text terms that resolve to them

export const CATEGORY_CODES = ['01', '02', '03', '04', '05', '06', '07', '08', '09', '10', '11', '12'] as const;

export type CategoryCode = typeof CATEGORY_CODES[number];

const CATEGORY_ALIASES = new Map<string, CategoryCode>(Object.entries({
  food: '01',
  alcohol: '02',
  tobacco: '02',
  clothing: '03',
  clothes: '03',
  housing: '04',
  home: '04',
  furnishings: '05',
  furniture: '05',
  health: '06',
  medical: '06',
  transport: '07',
  transportation: '07',
  communication: '08',
  phone: '08',
  entertainment: '09',
  recreation: '09',
  culture: '09',
  education: '10',
  school: '10',
  restaurants: '11',
  hotels: '11',
  dining: '11',
  other: '12',
  miscellaneous: '12',
} satisfies Record<string, CategoryCode>));

export function resolveCategory(term: string): CategoryCode | null {
  return CATEGORY_ALIASES.get(term.trim().toLowerCase()) ?? null;
}

export function listCategoryTerms(): string[] {
  return [...CATEGORY_ALIASES.keys()].sort();
}
