import { randomUUID } from "node:crypto";
import type { NextFunction, Request, Response } from "express";
import type { Logger } from "pino";

const REQUEST_ID_HEADER = "X-Request-Id";
const MAX_INCOMING_ID_LENGTH = 128;

export function getRequestId(res: Response): string {
  const value: unknown = res.locals.requestId;
  return typeof value === "string" ? value : "";
}

/**
 * Tag each request with an id (reusing a sane incoming X-Request-Id) and log
 * its completion with status and duration.
 */
export function createRequestContextMiddleware(logger: Logger) {
  const log = logger.child({ module: "http" });

  return (req: Request, res: Response, next: NextFunction) => {
    const startTime = process.hrtime.bigint();
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId =
      incoming && incoming.length <= MAX_INCOMING_ID_LENGTH && /^[\w.-]+$/.test(incoming) ? incoming : randomUUID();

    res.locals.requestId = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - startTime) / 1e6;
      log.info(
        {
          requestId,
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          durationMs: Math.round(durationMs * 100) / 100,
        },
        "Request completed"
      );
    });

    next();
  };
}
