/**
 * Products Router
 *
 * Read-only catalog listing and lookup.
 */

import type { Express, NextFunction, Request, Response } from "express";
import type { AppContext } from "../app/context";
import { methodNotAllowedHandler } from "../middleware/errorHandler";

export const PRODUCTS_PATH = "/api/v1/products";

export function registerProductRoutes(app: Express, ctx: AppContext): void {
  const { productQueryService } = ctx;

  /**
   * GET /api/v1/products?{filters}&limit=&offset=
   *
   * Filters: name, description, test_type, job_levels, languages (substring),
   * assessment_length (exact), remote_testing, adaptive_irt (true/false).
   */
  app.get(PRODUCTS_PATH, (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(productQueryService.listProducts(req.query));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/v1/products/:id
   */
  app.get(`${PRODUCTS_PATH}/:id`, (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(productQueryService.getProduct(req.params.id));
    } catch (error) {
      next(error);
    }
  });

  app.all(PRODUCTS_PATH, methodNotAllowedHandler);
  app.all(`${PRODUCTS_PATH}/:id`, methodNotAllowedHandler);
}
