import type { NextFunction, Request, Response } from "express";
import type { Logger } from "pino";
import { AppError, MethodNotAllowedError, NotFoundError } from "../errors";
import { getRequestId } from "./requestContext";

export interface ErrorBody {
  error: string;
  message: string;
  requestId: string;
}

// Fallback for unknown routes (404)
export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
  next(new NotFoundError("Route", req.path));
}

// Known path, unsupported verb (405)
export function methodNotAllowedHandler(req: Request, res: Response, next: NextFunction) {
  res.setHeader("Allow", "GET, HEAD, OPTIONS");
  next(new MethodNotAllowedError(req.method, req.path));
}

/**
 * Central error middleware. AppErrors carry their own status and code;
 * anything else is an unexpected 500. Details and stacks go to the log only.
 */
export function createErrorHandler(logger: Logger) {
  const log = logger.child({ module: "http-errors" });

  return (error: unknown, req: Request, res: Response, next: NextFunction) => {
    const requestId = getRequestId(res);
    const appError = error instanceof AppError ? error : null;
    const statusCode = appError?.statusCode ?? 500;
    const logContext = {
      requestId,
      code: appError?.code ?? "INTERNAL_ERROR",
      details: appError?.details,
      request: { method: req.method, path: req.path, query: req.query },
    };

    if (statusCode >= 500) {
      log.error({ ...logContext, err: error }, "Request failed");
    } else {
      log.warn({ ...logContext, message: appError?.message }, "Client error");
    }

    if (res.headersSent) {
      return next(error);
    }

    const body: ErrorBody = {
      error: appError?.code ?? "INTERNAL_ERROR",
      message: appError?.message ?? "Internal server error",
      requestId,
    };
    res.status(statusCode).json(body);
  };
}
