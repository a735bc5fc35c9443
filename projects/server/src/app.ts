import express, { type Express } from "express";

import {
  silentLogger,
  type ITextGenerator,
  type ITranslator,
  type Logger,
  type SummarizationPipeline,
} from "@lingua-digest/core";

import { errorHandler } from "./middleware/errorHandler.js";
import { requestLogger } from "./middleware/requestLogger.js";
import { healthRouter } from "./routes/health.js";
import { summarizeRouter } from "./routes/summarize.js";

export interface AppDependencies {
  readonly pipeline: SummarizationPipeline;
  /** The services the pipeline was built with; reported by /health */
  readonly translator: ITranslator;
  readonly generator: ITextGenerator;
  readonly logger?: Logger;
}

export function createApp(dependencies: Readonly<AppDependencies>): Express {
  const logger = dependencies.logger ?? silentLogger;
  const app = express();

  app.use(requestLogger(logger.child("HTTP")));
  app.use(express.json({ limit: "1mb" }));

  app.use(healthRouter(dependencies.translator, dependencies.generator));
  app.use(summarizeRouter(dependencies.pipeline, logger.child("Summarize")));

  app.use(errorHandler(logger));

  return app;
}

export { loadEnv, parseEnv, pipelineConfigFromEnv, type Env } from "./config.js";
export { createModelServices, type ModelServices } from "./models.js";
