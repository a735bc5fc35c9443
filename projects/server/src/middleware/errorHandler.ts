import type { ErrorRequestHandler, NextFunction, Request, Response } from "express";

import {
  ConfigurationError,
  ValidationError,
  describeError,
  type Logger,
} from "@lingua-digest/core";

export interface ErrorBody {
  readonly error: string;
}

/**
 * Turns errors raised before the first body byte into JSON responses.
 * Once streaming has started the response is left to express, which closes
 * the connection.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    if (err instanceof ValidationError || err instanceof ConfigurationError) {
      res.status(400).json({ error: err.message } satisfies ErrorBody);
      return;
    }

    // body-parser rejects malformed JSON with a SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: "Malformed JSON body" } satisfies ErrorBody);
      return;
    }

    logger.error(`Request failed: ${describeError(err)}`);
    res.status(500).json({
      error: err instanceof Error ? err.message : "Internal server error",
    } satisfies ErrorBody);
  };
}
