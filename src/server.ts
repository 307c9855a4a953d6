/**
 * Catalog Service (Entry Point)
 *
 * Thin shell: context creation, startup/shutdown.
 * Route registration lives in ./app/http.ts; feature routers in ./routes/*.
 */

import { runtimeConfig } from "./config";
import { createContext, createLogger } from "./app/context";
import { createApp } from "./app/http";

const logger = createLogger(runtimeConfig.logLevel);

function start(): void {
  const ctx = createContext({ config: runtimeConfig, logger });
  const { catalogStore } = ctx;
  const app = createApp(ctx);

  const { port, bindHost } = runtimeConfig;
  const server = app.listen(port, bindHost, () => {
    logger.info({ port, host: bindHost, catalog: runtimeConfig.catalogDbPath }, "Catalog service listening");
  });

  server.on("error", (error) => {
    logger.fatal({ err: error, port, host: bindHost }, "HTTP server failed");
    process.exit(1);
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Received termination signal, initiating graceful shutdown");

    // In-flight reads finish; no writes exist to interrupt
    server.close(() => {
      logger.info("HTTP server closed");
      catalogStore.close();
      logger.info("Catalog store closed, graceful shutdown complete");
      process.exit(0);
    });

    // Force exit after timeout (configurable via GRACEFUL_SHUTDOWN_MS)
    setTimeout(() => {
      logger.warn({ timeoutMs: runtimeConfig.gracefulShutdownMs }, "Graceful shutdown timeout exceeded, forcing exit");
      process.exit(1);
    }, runtimeConfig.gracefulShutdownMs).unref();
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

try {
  start();
} catch (error) {
  logger.fatal({ err: error }, "Fatal error during server startup");
  process.exit(1);
}
