import { z } from "zod";

// ============================================================================
// Product
// ============================================================================

/**
 * Catalog entry as served over HTTP. Column names follow the `products`
 * table written by the crawler; `test_types` and `duration_minutes` are
 * derived from the free-text columns.
 */
export interface Product {
  readonly id: number;
  readonly name: string;
  readonly url: string;
  readonly remote_testing: boolean | null;
  readonly adaptive_irt: boolean | null;
  readonly test_type: string | null;
  readonly description: string | null;
  readonly job_levels: string | null;
  readonly languages: string | null;
  readonly assessment_length: string | null;
  readonly test_types: readonly string[];
  readonly duration_minutes: number | null;
}

// BOOLEAN columns come back as 0/1 integers
const sqliteBool = z.number().nullable();
// assessment_length is TEXT but the crawler sometimes stored bare minutes
const sqliteText = z
  .union([z.string(), z.number()])
  .nullable()
  .transform((value) => (value === null ? null : String(value)));

export const ProductRowSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  url: z.string(),
  remote_testing: sqliteBool,
  adaptive_irt: sqliteBool,
  test_type: sqliteText,
  description: sqliteText,
  job_levels: sqliteText,
  languages: sqliteText,
  assessment_length: sqliteText,
});
export type ProductRow = z.infer<typeof ProductRowSchema>;

/** Columns selected for every product read; `embedding` and `crawled_at` stay internal. */
export const PRODUCT_COLUMNS = [
  "id",
  "name",
  "url",
  "remote_testing",
  "adaptive_irt",
  "test_type",
  "description",
  "job_levels",
  "languages",
  "assessment_length",
] as const;

const toBool = (value: number | null): boolean | null => (value === null ? null : value !== 0);

/** "Ability & Aptitude, Personality & Behavior" -> ["Ability & Aptitude", "Personality & Behavior"] */
export function parseTestTypes(value: string | null): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/** First integer in the text ("Approximate Completion Time in minutes = 30" -> 30). */
export function parseDurationMinutes(value: string | null): number | null {
  if (!value) return null;
  const match = value.match(/(\d+)/);
  if (!match) return null;
  return Number.parseInt(match[1], 10);
}

export function toProduct(row: ProductRow): Product {
  return Object.freeze({
    id: row.id,
    name: row.name,
    url: row.url,
    remote_testing: toBool(row.remote_testing),
    adaptive_irt: toBool(row.adaptive_irt),
    test_type: row.test_type,
    description: row.description,
    job_levels: row.job_levels,
    languages: row.languages,
    assessment_length: row.assessment_length,
    test_types: Object.freeze(parseTestTypes(row.test_type)),
    duration_minutes: parseDurationMinutes(row.assessment_length),
  });
}

// ============================================================================
// Filters
// ============================================================================

export const MAX_PAGE_SIZE = 100;
export const DEFAULT_PAGE_SIZE = 20;

export const SUBSTRING_FILTER_KEYS = ["name", "description", "test_type", "job_levels", "languages"] as const;
export const EXACT_FILTER_KEYS = ["assessment_length"] as const;
export const BOOLEAN_FILTER_KEYS = ["remote_testing", "adaptive_irt"] as const;

export type SubstringFilterKey = (typeof SUBSTRING_FILTER_KEYS)[number];
export type ExactFilterKey = (typeof EXACT_FILTER_KEYS)[number];
export type BooleanFilterKey = (typeof BOOLEAN_FILTER_KEYS)[number];
export type FilterKey = SubstringFilterKey | ExactFilterKey | BooleanFilterKey;

export const FILTER_KEYS: readonly FilterKey[] = [
  ...SUBSTRING_FILTER_KEYS,
  ...EXACT_FILTER_KEYS,
  ...BOOLEAN_FILTER_KEYS,
];

/**
 * Typed predicates for a listing query. Text keys match a case-insensitive
 * substring, `assessment_length` matches exactly, boolean keys match equality.
 * Keys combine with AND.
 */
export type ProductFilters = {
  [K in SubstringFilterKey | ExactFilterKey]?: string;
} & {
  [K in BooleanFilterKey]?: boolean;
};

export type FilterPredicate = "substring" | "equals" | "boolean";

const filterKeySet: ReadonlySet<string> = new Set(FILTER_KEYS);
const substringKeySet: ReadonlySet<string> = new Set(SUBSTRING_FILTER_KEYS);
const booleanKeySet: ReadonlySet<string> = new Set(BOOLEAN_FILTER_KEYS);

export function isFilterKey(key: string): key is FilterKey {
  return filterKeySet.has(key);
}

export function isBooleanFilterKey(key: string): key is BooleanFilterKey {
  return booleanKeySet.has(key);
}

export function filterPredicate(key: FilterKey): FilterPredicate {
  if (substringKeySet.has(key)) return "substring";
  if (booleanKeySet.has(key)) return "boolean";
  return "equals";
}
