/**
 * AppContext: composition root for the catalog service.
 *
 * Builds the logger, the read-only catalog store and the services once, and
 * hands the same store handle to every service. Nothing here is a module
 * singleton, so tests build a context around a fixture file or a fake store.
 */

import pino, { type Logger } from "pino";
import { runtimeConfig, type RuntimeConfig } from "../config";
import { StoreUnavailableError } from "../errors";
import { openCatalogStore, UnavailableCatalogStore, type CatalogStore } from "../repositories/catalogStore";
import { HealthService } from "../services/healthService";
import { ProductQueryService } from "../services/productQueryService";

// -----------------------------------------------------------------------------
// AppContext interface
// -----------------------------------------------------------------------------

export interface AppContext {
  config: RuntimeConfig;
  logger: Logger;
  catalogStore: CatalogStore;
  productQueryService: ProductQueryService;
  healthService: HealthService;
}

export interface CreateContextOptions {
  config?: RuntimeConfig;
  logger?: Logger;
  /** Skip opening `config.catalogDbPath` and use this store instead. */
  catalogStore?: CatalogStore;
}

// -----------------------------------------------------------------------------
// Logger factory
// -----------------------------------------------------------------------------

export function createLogger(level: RuntimeConfig["logLevel"] = runtimeConfig.logLevel): Logger {
  const destination = pino.destination({ sync: process.env.NODE_ENV !== "production" });
  destination.on("error", (err: NodeJS.ErrnoException) => {
    if (err?.code === "EINTR") return;
    console.error("pino destination error", err);
  });
  return pino({ level }, destination);
}

// -----------------------------------------------------------------------------
// Store bootstrap
// -----------------------------------------------------------------------------

/**
 * Open the configured catalog file. When it cannot be opened the error is
 * fatal unless CATALOG_REQUIRE_ON_START=false, in which case the service runs
 * against an UnavailableCatalogStore and reports degraded health.
 */
export function openConfiguredStore(config: RuntimeConfig, logger: Logger): CatalogStore {
  try {
    return openCatalogStore(config.catalogDbPath, logger);
  } catch (error) {
    if (!(error instanceof StoreUnavailableError) || config.catalogRequireOnStart) {
      throw error;
    }
    logger.error(
      { path: config.catalogDbPath, details: error.details },
      "Catalog store unavailable, serving degraded (CATALOG_REQUIRE_ON_START=false)"
    );
    return new UnavailableCatalogStore(error);
  }
}

// -----------------------------------------------------------------------------
// Context factory
// -----------------------------------------------------------------------------

export function createContext(options: CreateContextOptions = {}): AppContext {
  const config = options.config ?? runtimeConfig;
  const logger = options.logger ?? createLogger(config.logLevel);
  const catalogStore = options.catalogStore ?? openConfiguredStore(config, logger);

  return {
    config,
    logger,
    catalogStore,
    productQueryService: new ProductQueryService(catalogStore, logger),
    healthService: new HealthService(catalogStore, logger),
  };
}
