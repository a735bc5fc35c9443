/**
 * Builds the shared model services once per process.
 */

import {
  createLlamaServerTextGenerator,
  createNLLBTranslator,
  createTransformersTextGenerator,
  type ITextGenerator,
  type ITranslator,
  type Logger,
} from "@lingua-digest/core";

import type { Env } from "./config.js";

export interface ModelServices {
  readonly translator: ITranslator;
  readonly generator: ITextGenerator;
}

export function createGenerator(env: Readonly<Env>, logger: Logger): ITextGenerator {
  switch (env.GENERATOR_BACKEND) {
    case "llama-server":
      return createLlamaServerTextGenerator({
        endpoint: env.LLAMA_SERVER_URL,
        model: env.LLAMA_SERVER_MODEL,
        logger: logger.child("LlamaServer"),
      });
    case "transformers":
      return createTransformersTextGenerator({
        modelId: env.GENERATION_MODEL_ID,
        cacheDir: env.TRANSFORMERS_CACHE_DIR,
        dtype: env.MODEL_QUANTIZED ? "q4" : "fp32",
        logger: logger.child("Generator"),
      });
  }
}

export function createModelServices(env: Readonly<Env>, logger: Logger): ModelServices {
  return {
    translator: createNLLBTranslator({
      modelId: env.TRANSLATION_MODEL_ID,
      cacheDir: env.TRANSFORMERS_CACHE_DIR,
      quantized: env.MODEL_QUANTIZED,
      logger: logger.child("NLLB"),
    }),
    generator: createGenerator(env, logger),
  };
}

/**
 * English name of a language code for the prompt's style guidance,
 * e.g. "he" -> "Hebrew". Falls back to the code itself.
 */
export function languageName(code: string): string {
  try {
    return new Intl.DisplayNames(["en"], { type: "language" }).of(code) ?? code;
  } catch {
    // Not a well-formed language tag
    return code;
  }
}
