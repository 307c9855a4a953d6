/**
 * Test fixtures: a throwaway catalog file with the crawler's schema, a fake
 * in-memory store behind the CatalogStore interface, and an in-process HTTP
 * harness.
 */

import Database from "better-sqlite3";
import type { Express } from "express";
import { once } from "node:events";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import pino, { type Logger } from "pino";
import { assertPageBounds, type CatalogStore } from "../repositories/catalogStore";
import {
  filterPredicate,
  isFilterKey,
  toProduct,
  type Product,
  type ProductFilters,
} from "../domain/product";
import { NotFoundError, QueryError } from "../errors";

export const silentLogger: Logger = pino({ level: "silent" });

export interface SeedProduct {
  id: number;
  name: string;
  url: string;
  remote_testing: boolean | null;
  adaptive_irt: boolean | null;
  test_type: string | null;
  description: string | null;
  job_levels: string | null;
  languages: string | null;
  assessment_length: string | null;
}

export const sampleCatalog: SeedProduct[] = [
  {
    id: 1,
    name: "Numerical Reasoning (New)",
    url: "https://catalog.example.test/products/numerical-reasoning-new/",
    remote_testing: true,
    adaptive_irt: true,
    test_type: "Ability & Aptitude",
    description: "Measures the ability to work with numerical data and charts.",
    job_levels: "Graduate, Mid-Professional",
    languages: "English (USA), French",
    assessment_length: "25",
  },
  {
    id: 2,
    name: "Customer Service Simulation",
    url: "https://catalog.example.test/products/customer-service-simulation/",
    remote_testing: true,
    adaptive_irt: false,
    test_type: "Simulations, Biodata & Situational Judgement",
    description: "Interactive simulation of contact-centre tasks.",
    job_levels: "Entry-Level",
    languages: "English (USA)",
    assessment_length: "40",
  },
  {
    id: 3,
    name: "Java 8 (New)",
    url: "https://catalog.example.test/products/java-8-new/",
    remote_testing: true,
    adaptive_irt: false,
    test_type: "Knowledge & Skills",
    description: "Multiple-choice test of Java 8 language features.",
    job_levels: "Mid-Professional, Professional Individual Contributor",
    languages: "English (USA)",
    assessment_length: "18",
  },
  {
    id: 4,
    name: "Occupational Personality Questionnaire",
    url: "https://catalog.example.test/products/occupational-personality-questionnaire/",
    remote_testing: true,
    adaptive_irt: null,
    test_type: "Personality & Behavior",
    description: "Workplace behavioural style questionnaire.",
    job_levels: "Manager, Director",
    languages: "English (USA), German, Spanish",
    assessment_length: "25",
  },
  {
    id: 5,
    name: "Data Entry 100% Accuracy",
    url: "https://catalog.example.test/products/data-entry-accuracy/",
    remote_testing: false,
    adaptive_irt: false,
    test_type: "Ability & Aptitude, Knowledge & Skills",
    description: "Speed_and_accuracy check for data entry roles.",
    job_levels: "Entry-Level",
    languages: "English (USA)",
    assessment_length: null,
  },
];

// Same DDL the crawler writes, plus the embedding column the pipeline adds
const CREATE_PRODUCTS = `
  CREATE TABLE products (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    url TEXT UNIQUE NOT NULL,
    remote_testing BOOLEAN,
    adaptive_irt BOOLEAN,
    test_type TEXT,
    description TEXT,
    job_levels TEXT,
    languages TEXT,
    assessment_length TEXT,
    crawled_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
    embedding TEXT
  )
`;

const sqliteBool = (value: boolean | null): number | null => (value === null ? null : value ? 1 : 0);

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "catalog-test-"));
}

/** Write `products` into a fresh SQLite file and return its path. */
export function writeCatalogFile(products: SeedProduct[] = sampleCatalog, dir: string = makeTempDir()): string {
  const filePath = path.join(dir, "catalog.db");
  const db = new Database(filePath);
  try {
    db.exec(CREATE_PRODUCTS);
    const insert = db.prepare(`
      INSERT INTO products (
        id, name, url, remote_testing, adaptive_irt, test_type,
        description, job_levels, languages, assessment_length, embedding
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertAll = db.transaction((rows: SeedProduct[]) => {
      for (const p of rows) {
        insert.run(
          p.id,
          p.name,
          p.url,
          sqliteBool(p.remote_testing),
          sqliteBool(p.adaptive_irt),
          p.test_type,
          p.description,
          p.job_levels,
          p.languages,
          p.assessment_length,
          JSON.stringify([0.1, 0.2, 0.3])
        );
      }
    });
    insertAll(products);
  } finally {
    db.close();
  }
  return filePath;
}

export function removeCatalogDir(filePath: string): void {
  fs.rmSync(path.dirname(filePath), { recursive: true, force: true });
}

/** Generate `count` products with ids 1..count. */
export function generateCatalog(count: number): SeedProduct[] {
  return Array.from({ length: count }, (_, i) => ({
    id: i + 1,
    name: `Assessment ${i + 1}`,
    url: `https://catalog.example.test/products/assessment-${i + 1}/`,
    remote_testing: i % 2 === 0,
    adaptive_irt: i % 3 === 0,
    test_type: i % 2 === 0 ? "Knowledge & Skills" : "Personality & Behavior",
    description: `Generated assessment number ${i + 1}.`,
    job_levels: "Entry-Level",
    languages: "English (USA)",
    assessment_length: String(10 + (i % 5) * 5),
  }));
}

export function toProducts(seed: SeedProduct[]): Product[] {
  return seed.map((p) =>
    toProduct({
      ...p,
      remote_testing: sqliteBool(p.remote_testing),
      adaptive_irt: sqliteBool(p.adaptive_irt),
    })
  );
}

// -----------------------------------------------------------------------------
// In-memory fake store
// -----------------------------------------------------------------------------

function matches(product: Product, filters: ProductFilters): boolean {
  for (const [key, value] of Object.entries(filters)) {
    if (value === undefined) continue;
    if (!isFilterKey(key)) {
      throw new QueryError("filter", { malformedInput: true, details: { key } });
    }
    const actual = product[key];
    switch (filterPredicate(key)) {
      case "boolean":
        if (actual !== value) return false;
        break;
      case "substring":
        if (typeof actual !== "string" || typeof value !== "string") return false;
        if (!actual.toLowerCase().includes(value.toLowerCase())) return false;
        break;
      case "equals":
        if (actual !== value) return false;
        break;
    }
  }
  return true;
}

export function createInMemoryCatalogStore(products: Product[]): CatalogStore {
  const sorted = [...products].sort((a, b) => a.id - b.id);
  return {
    getById(id) {
      const product = sorted.find((p) => p.id === id);
      if (!product) throw new NotFoundError("Product", String(id));
      return product;
    },
    search(filters, limit, offset) {
      assertPageBounds(limit, offset);
      return {
        [Symbol.iterator]: () => sorted.filter((p) => matches(p, filters)).slice(offset, offset + limit)[Symbol.iterator](),
      };
    },
    count(filters) {
      return sorted.filter((p) => matches(p, filters)).length;
    },
    ping() {},
    close() {},
  };
}

// -----------------------------------------------------------------------------
// HTTP harness
// -----------------------------------------------------------------------------

export interface RunningServer {
  baseUrl: string;
  close: () => Promise<void>;
}

export async function startServer(app: Express): Promise<RunningServer> {
  const server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Expected the test server to listen on a TCP port");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
