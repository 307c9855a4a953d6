import type Database from "better-sqlite3";
import type { Logger } from "pino";
import { z } from "zod";
import { openReadOnlyDatabase } from "../db/connection";
import {
  MAX_PAGE_SIZE,
  PRODUCT_COLUMNS,
  ProductRowSchema,
  filterPredicate,
  isFilterKey,
  toProduct,
  type Product,
  type ProductFilters,
} from "../domain/product";
import {
  AppError,
  InvalidArgumentError,
  NotFoundError,
  QueryError,
  StoreUnavailableError,
  describeError,
} from "../errors";

// ============================================================================
// Types
// ============================================================================

/**
 * Read-only access to the product table. Implementations hold no per-request
 * state, so one instance is shared by every request.
 */
export interface CatalogStore {
  /** Throws NotFoundError when no row has this id. */
  getById(id: number): Product;
  /**
   * Matching products ordered by id ascending. Rows are read while the result
   * is iterated; iterating again re-runs the query.
   */
  search(filters: ProductFilters, limit: number, offset: number): Iterable<Product>;
  count(filters: ProductFilters): number;
  /** Trivial read used by the health check; throws StoreUnavailableError. */
  ping(): void;
  close(): void;
}

type SqlParam = string | number;

interface WhereClause {
  sql: string;
  params: SqlParam[];
}

const CountRowSchema = z.object({ total: z.number().int() });

const SELECT_PRODUCT = `SELECT ${PRODUCT_COLUMNS.join(", ")} FROM products`;

// ============================================================================
// Query building
// ============================================================================

export function assertPageBounds(limit: number, offset: number): void {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
    throw new InvalidArgumentError(`limit must be an integer between 1 and ${MAX_PAGE_SIZE}`, { limit });
  }
  if (!Number.isSafeInteger(offset) || offset < 0) {
    throw new InvalidArgumentError("offset must be a non-negative integer", { offset });
  }
}

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (ch) => `\\${ch}`);

/**
 * Translate filters into a WHERE clause. Column names only ever come from the
 * recognized filter keys; values are always bound.
 */
export function buildWhereClause(filters: ProductFilters): WhereClause {
  const constraints: string[] = [];
  const params: SqlParam[] = [];

  for (const [key, value] of Object.entries(filters)) {
    if (value === undefined) continue;
    if (!isFilterKey(key)) {
      throw new QueryError("filter", { malformedInput: true, details: { key } });
    }

    const predicate = filterPredicate(key);
    if (predicate === "boolean") {
      if (typeof value !== "boolean") {
        throw new QueryError("filter", { malformedInput: true, details: { key, expected: "boolean" } });
      }
      constraints.push(`${key} = ?`);
      params.push(value ? 1 : 0);
      continue;
    }

    if (typeof value !== "string" || value.length === 0) {
      throw new QueryError("filter", { malformedInput: true, details: { key, expected: "non-empty string" } });
    }
    if (predicate === "substring") {
      // SQLite LIKE folds ASCII case only
      constraints.push(`${key} LIKE ? ESCAPE '\\'`);
      params.push(`%${escapeLike(value)}%`);
    } else {
      constraints.push(`${key} = ?`);
      params.push(value);
    }
  }

  return {
    sql: constraints.length > 0 ? `WHERE ${constraints.join(" AND ")}` : "",
    params,
  };
}

// ============================================================================
// SQLite store
// ============================================================================

export class SqliteCatalogStore implements CatalogStore {
  private readonly statements = new Map<string, Database.Statement>();

  constructor(private readonly db: Database.Database) {}

  getById(id: number): Product {
    if (!Number.isSafeInteger(id)) {
      throw new NotFoundError("Product", String(id));
    }
    const row = this.guard("getById", () => this.prepare(`${SELECT_PRODUCT} WHERE id = ?`).get(id));
    if (row === undefined) {
      throw new NotFoundError("Product", String(id));
    }
    return toProduct(this.parseRow(row));
  }

  search(filters: ProductFilters, limit: number, offset: number): Iterable<Product> {
    assertPageBounds(limit, offset);
    const where = buildWhereClause(filters);
    const sql = `${SELECT_PRODUCT} ${where.sql} ORDER BY id ASC LIMIT ? OFFSET ?`;
    const params = [...where.params, limit, offset];

    return {
      [Symbol.iterator]: () => this.iterateRows(sql, params),
    };
  }

  count(filters: ProductFilters): number {
    const where = buildWhereClause(filters);
    const row = this.guard("count", () =>
      this.prepare(`SELECT COUNT(*) AS total FROM products ${where.sql}`).get(...where.params)
    );
    const parsed = CountRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new QueryError("count", { details: { issues: parsed.error.issues } });
    }
    return parsed.data.total;
  }

  ping(): void {
    try {
      this.prepare("SELECT 1 FROM products LIMIT 1").get();
    } catch (error) {
      throw new StoreUnavailableError({ reason: describeError(error) });
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private *iterateRows(sql: string, params: SqlParam[]): Generator<Product> {
    const rows = this.guard("search", () => this.prepare(sql).iterate(...params));
    try {
      while (true) {
        const next = this.guard("search", () => rows.next());
        if (next.done) return;
        yield toProduct(this.parseRow(next.value));
      }
    } finally {
      // An unfinished iterator keeps the connection busy for other statements
      rows.return?.();
    }
  }

  private prepare(sql: string): Database.Statement {
    let statement = this.statements.get(sql);
    if (!statement) {
      statement = this.db.prepare(sql);
      this.statements.set(sql, statement);
    }
    return statement;
  }

  private parseRow(row: unknown) {
    const parsed = ProductRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new QueryError("decodeRow", { details: { issues: parsed.error.issues } });
    }
    return parsed.data;
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (error instanceof AppError) throw error;
      throw new QueryError(operation, { cause: error });
    }
  }
}

// ============================================================================
// Unavailable store
// ============================================================================

/**
 * Stand-in used when the catalog file could not be opened and the service was
 * configured to start anyway: every call fails with the original
 * StoreUnavailableError, so health stays 503 until the process restarts.
 */
export class UnavailableCatalogStore implements CatalogStore {
  constructor(private readonly reason: StoreUnavailableError) {}

  getById(_id: number): Product {
    throw this.reason;
  }

  search(_filters: ProductFilters, _limit: number, _offset: number): Iterable<Product> {
    throw this.reason;
  }

  count(_filters: ProductFilters): number {
    throw this.reason;
  }

  ping(): void {
    throw this.reason;
  }

  close(): void {}
}

// ============================================================================
// Bootstrap
// ============================================================================

function assertProductsTable(db: Database.Database): void {
  const table = db
    .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'products' LIMIT 1`)
    .get();
  if (table === undefined) {
    throw new Error("products table missing");
  }
}

/**
 * Open the catalog file and verify it holds a `products` table. Any failure
 * (missing file, not a database, no table) is a StoreUnavailableError.
 */
export function openCatalogStore(filePath: string, logger: Logger): SqliteCatalogStore {
  const log = logger.child({ module: "catalog-store" });

  let db: Database.Database;
  try {
    db = openReadOnlyDatabase(filePath);
  } catch (error) {
    throw new StoreUnavailableError({ path: filePath, reason: describeError(error) });
  }

  try {
    assertProductsTable(db);
  } catch (error) {
    db.close();
    throw new StoreUnavailableError({ path: filePath, reason: describeError(error) });
  }

  const store = new SqliteCatalogStore(db);
  const total = store.count({});
  if (total === 0) {
    log.warn({ path: filePath }, "Catalog store opened but products table is empty");
  } else {
    log.info({ path: filePath, products: total }, "Catalog store opened (read-only)");
  }
  return store;
}
