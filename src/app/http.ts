/**
 * HTTP Application Factory
 *
 * Creates the Express app with core middleware and registers feature routers.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { AppContext } from "./context";
import { createRequestContextMiddleware } from "../middleware/requestContext";
import { createErrorHandler, notFoundHandler } from "../middleware/errorHandler";

// Route registrars
import { registerHealthRoutes } from "../routes/health";
import { registerProductRoutes } from "../routes/products";

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.disable("x-powered-by");

  app.use(createRequestContextMiddleware(ctx.logger));

  // The catalog is public and read-only: any origin may GET it
  app.use((req: Request, res: Response, next: NextFunction) => {
    res.header("Access-Control-Allow-Origin", ctx.config.corsAllowOrigin);
    res.header("Access-Control-Allow-Methods", "GET, HEAD, OPTIONS");
    res.header("Access-Control-Allow-Headers", "Content-Type, X-Request-Id");
    res.header("Access-Control-Expose-Headers", "X-Request-Id");

    if (req.method === "OPTIONS") {
      return res.sendStatus(204);
    }

    next();
  });

  registerHealthRoutes(app, ctx);
  registerProductRoutes(app, ctx);

  app.use(notFoundHandler);
  app.use(createErrorHandler(ctx.logger));

  return app;
}
