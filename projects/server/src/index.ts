import type { Server } from "node:http";

import {
  createLogger,
  createSummarizationPipeline,
  createSummaryPromptBuilder,
  describeError,
} from "@lingua-digest/core";

import { createApp } from "./app.js";
import { loadEnv, pipelineConfigFromEnv } from "./config.js";
import { createModelServices, languageName } from "./models.js";

const env = loadEnv();
const logger = createLogger("Server", { level: env.LOG_LEVEL });

const { translator, generator } = createModelServices(env, logger);
const pipeline = createSummarizationPipeline(
  {
    translator,
    generator,
    promptBuilder: createSummaryPromptBuilder({
      bulletCount: env.SUMMARY_BULLET_COUNT,
      stopPhrase: env.STOP_MARKER,
      downstreamLanguageName: languageName(env.SOURCE_LANGUAGE),
    }),
    logger: logger.child("Pipeline"),
  },
  { config: pipelineConfigFromEnv(env) }
);

logger.info(`Loading models (generator: ${generator.backend})`);
await Promise.all([translator.initialize(), generator.initialize()]);

const app = createApp({ pipeline, translator, generator, logger });

const server: Server = app.listen(env.PORT, env.HOST, () => {
  logger.info(`Listening on http://${env.HOST}:${env.PORT}`);
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down`);
  server.close();
  try {
    await Promise.all([translator.dispose(), generator.dispose()]);
  } catch (error) {
    logger.error(`Dispose failed: ${describeError(error)}`);
  }
  process.exit(0);
}

process.once("SIGTERM", () => void shutdown("SIGTERM"));
process.once("SIGINT", () => void shutdown("SIGINT"));
