import type { NextFunction, Request, RequestHandler, Response } from "express";

import type { Logger } from "@lingua-digest/core";

/**
 * Logs one line per request once the response has finished or the client
 * went away.
 */
export function requestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();

    res.on("close", () => {
      const duration = Date.now() - startedAt;
      const outcome = res.writableFinished ? String(res.statusCode) : "aborted";
      logger.info(`${req.method} ${req.path} ${outcome} ${duration}ms`);
    });

    next();
  };
}
