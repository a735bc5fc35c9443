import { Router } from "express";

import type { ITextGenerator, ITranslator } from "@lingua-digest/core";

export interface HealthBody {
  readonly status: "ok";
  readonly translator: boolean;
  readonly generator: boolean;
}

export function healthRouter(translator: ITranslator, generator: ITextGenerator): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      translator: translator.isReady,
      generator: generator.isReady,
    } satisfies HealthBody);
  });

  return router;
}
