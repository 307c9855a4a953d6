/**
 * Product Query Service
 *
 * Turns raw query-string parameters into typed filters and page bounds,
 * runs them against the catalog store and wraps the page with count
 * metadata. Holds no state beyond the injected store.
 */

import type { Logger } from "pino";
import { z } from "zod";
import type { CatalogStore } from "../repositories/catalogStore";
import {
  DEFAULT_PAGE_SIZE,
  FILTER_KEYS,
  MAX_PAGE_SIZE,
  isBooleanFilterKey,
  isFilterKey,
  type Product,
  type ProductFilters,
} from "../domain/product";
import { InvalidArgumentError, NotFoundError, QueryError } from "../errors";

export interface ProductPage {
  items: Product[];
  total: number;
  limit: number;
  offset: number;
}

/** Shape of `req.query`: values may be strings, repeated strings or nested objects. */
export type QueryParams = Record<string, unknown>;

const PAGINATION_KEYS = new Set(["limit", "offset"]);

const integerParam = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, "must be an integer")
  .transform((value) => Number.parseInt(value, 10));

const PaginationSchema = z.object({
  limit: integerParam.pipe(z.number().int().min(1).max(MAX_PAGE_SIZE)).optional(),
  offset: integerParam.pipe(z.number().int().min(0).max(Number.MAX_SAFE_INTEGER)).optional(),
});

const TRUE_VALUES = new Set(["true", "1", "yes"]);
const FALSE_VALUES = new Set(["false", "0", "no"]);

function singleValue(key: string, raw: unknown): string {
  if (typeof raw === "string") return raw;
  throw new InvalidArgumentError(`${key} must be given once as a plain value`, { key });
}

function parseBooleanParam(key: string, raw: string): boolean {
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new InvalidArgumentError(`${key} must be true or false`, { key, value: raw });
}

function parsePagination(query: QueryParams): { limit: number; offset: number } {
  const raw: Record<string, string | undefined> = {};
  for (const key of PAGINATION_KEYS) {
    if (query[key] !== undefined) raw[key] = singleValue(key, query[key]);
  }

  const parsed = PaginationSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(`${issue.path.join(".")}: ${issue.message}`, {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
  }

  return {
    limit: parsed.data.limit ?? DEFAULT_PAGE_SIZE,
    offset: parsed.data.offset ?? 0,
  };
}

export function parseFilters(query: QueryParams): ProductFilters {
  const filters: ProductFilters = {};

  for (const [key, rawValue] of Object.entries(query)) {
    if (PAGINATION_KEYS.has(key) || rawValue === undefined) continue;
    if (!isFilterKey(key)) {
      throw new InvalidArgumentError(`Unknown filter "${key}"`, { key, allowed: FILTER_KEYS });
    }

    const value = singleValue(key, rawValue);
    if (isBooleanFilterKey(key)) {
      filters[key] = parseBooleanParam(key, value);
      continue;
    }

    const trimmed = value.trim();
    if (trimmed.length === 0) {
      throw new InvalidArgumentError(`${key} must not be empty`, { key });
    }
    filters[key] = trimmed;
  }

  return filters;
}

export class ProductQueryService {
  private readonly log: Logger;

  constructor(private readonly store: CatalogStore, logger: Logger) {
    this.log = logger.child({ module: "product-query-service" });
  }

  listProducts(query: QueryParams): ProductPage {
    const { limit, offset } = parsePagination(query);
    const filters = parseFilters(query);

    try {
      const items = Array.from(this.store.search(filters, limit, offset));
      const total = this.store.count(filters);
      this.log.debug({ filters, limit, offset, returned: items.length, total }, "Listed products");
      return { items, total, limit, offset };
    } catch (error) {
      if (error instanceof QueryError && error.malformedInput) {
        throw new InvalidArgumentError("Malformed filter", error.details);
      }
      throw error;
    }
  }

  getProduct(rawId: string): Product {
    const trimmed = rawId.trim();
    // An id that cannot be a row key is simply absent
    if (!/^\d+$/.test(trimmed)) {
      throw new NotFoundError("Product", rawId);
    }
    const id = Number.parseInt(trimmed, 10);
    if (!Number.isSafeInteger(id)) {
      throw new NotFoundError("Product", rawId);
    }
    return this.store.getById(id);
  }
}
