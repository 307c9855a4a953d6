import type { Express, Request, Response } from "express";
import type { AppContext } from "../app/context";
import { methodNotAllowedHandler } from "../middleware/errorHandler";

export const HEALTH_PATH = "/api/v1/health";

export function registerHealthRoutes(app: Express, ctx: AppContext): void {
  const { healthService } = ctx;

  // Polled by the container HEALTHCHECK (30s interval, 10s timeout, 3 retries)
  app.get(HEALTH_PATH, (_req: Request, res: Response) => {
    const status = healthService.check();
    res.setHeader("Cache-Control", "no-store");
    res.status(status === "ok" ? 200 : 503).json({ status });
  });

  app.all(HEALTH_PATH, methodNotAllowedHandler);
}
