import type { Logger } from "pino";
import type { CatalogStore } from "../repositories/catalogStore";
import { describeError } from "../errors";

export type HealthStatus = "ok" | "degraded";

/**
 * Liveness as seen by the container probe: "ok" iff the catalog store answers
 * a trivial read. Computed on every call, never cached.
 */
export class HealthService {
  private readonly log: Logger;

  constructor(private readonly store: CatalogStore, logger: Logger) {
    this.log = logger.child({ module: "health" });
  }

  check(): HealthStatus {
    try {
      this.store.ping();
      return "ok";
    } catch (error) {
      this.log.warn({ reason: describeError(error) }, "Catalog store health check failed");
      return "degraded";
    }
  }
}
