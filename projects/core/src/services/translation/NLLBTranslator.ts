import { pipeline, type PipelineType } from "@huggingface/transformers";

import type {
  ITranslator,
  TranslationOptions,
  TranslationResult,
} from "../../interfaces/ITranslator.js";
import {
  TranslatorNotInitializedError,
  TranslationFailedError,
  UnsupportedLanguageError,
  isTranslationError,
  type LanguageRole,
} from "../../errors/TranslationError.js";
import { type Logger, silentLogger } from "../../logging/logger.js";

const DEFAULT_MODEL_ID = "Xenova/nllb-200-distilled-600M";
const DEFAULT_MAX_NEW_TOKENS = 400;

/**
 * Short tags and the FLORES-200 codes NLLB expects for them.
 * The FLORES codes themselves are accepted as well.
 */
const NLLB_CODES: ReadonlyMap<string, string> = new Map([
  ["he", "heb_Hebr"],
  ["en", "eng_Latn"],
  ["ar", "arb_Arab"],
  ["ru", "rus_Cyrl"],
  ["fr", "fra_Latn"],
  ["de", "deu_Latn"],
  ["es", "spa_Latn"],
]);

const SUPPORTED_LANGUAGES: readonly string[] = [...NLLB_CODES.keys()];
const FLORES_CODES: ReadonlySet<string> = new Set(NLLB_CODES.values());

export interface NLLBTranslatorOptions {
  readonly modelId?: string;
  readonly cacheDir?: string;
  /** Load 8-bit weights (default) instead of fp32 */
  readonly quantized?: boolean;
  readonly maxNewTokens?: number;
  readonly logger?: Logger;
}

interface TranslationPipelineOutput {
  readonly translation_text: string;
}

interface TranslationPipelineFn {
  (
    text: string,
    options: { src_lang: string; tgt_lang: string; max_new_tokens: number }
  ): Promise<TranslationPipelineOutput[]>;
  dispose?(): Promise<void>;
}

/**
 * NLLB-200 translator on Transformers.js (ONNX runtime).
 *
 * One instance is shared by every session; `initialize()` may be called
 * concurrently and loads the model once.
 */
export class NLLBTranslator implements ITranslator {
  private readonly modelId: string;
  private readonly cacheDir: string | undefined;
  private readonly quantized: boolean;
  private readonly maxNewTokens: number;
  private readonly logger: Logger;

  private translator: TranslationPipelineFn | null = null;
  private loading: Promise<TranslationPipelineFn> | null = null;

  constructor(options?: Readonly<NLLBTranslatorOptions>) {
    this.modelId = options?.modelId ?? DEFAULT_MODEL_ID;
    this.cacheDir = options?.cacheDir;
    this.quantized = options?.quantized ?? true;
    this.maxNewTokens = options?.maxNewTokens ?? DEFAULT_MAX_NEW_TOKENS;
    this.logger = options?.logger ?? silentLogger;
  }

  get isReady(): boolean {
    return this.translator !== null;
  }

  async initialize(): Promise<void> {
    if (this.translator) {
      return;
    }
    this.loading ??= this.load();
    try {
      this.translator = await this.loading;
    } finally {
      this.loading = null;
    }
  }

  async translate(
    text: string,
    options: Readonly<TranslationOptions>
  ): Promise<TranslationResult> {
    const translator = this.translator;
    if (!translator) {
      throw new TranslatorNotInitializedError("NLLBTranslator");
    }

    const { sourceLanguage, targetLanguage } = options;
    const src_lang = resolveLanguage(sourceLanguage, "source");
    const tgt_lang = resolveLanguage(targetLanguage, "target");

    if (text.trim().length === 0) {
      return { text: "", sourceLanguage, targetLanguage };
    }

    let output: TranslationPipelineOutput[];
    try {
      output = await translator(text, { src_lang, tgt_lang, max_new_tokens: this.maxNewTokens });
    } catch (error) {
      if (isTranslationError(error)) {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new TranslationFailedError(reason, options, error);
    }

    const translated = output[0]?.translation_text;
    if (translated === undefined) {
      throw new TranslationFailedError("No translation result produced", options);
    }

    this.logger.debug(`${sourceLanguage}->${targetLanguage}: ${text.length} -> ${translated.length} chars`);
    return { text: translated.trim(), sourceLanguage, targetLanguage };
  }

  getSupportedLanguages(): readonly string[] {
    return SUPPORTED_LANGUAGES;
  }

  async dispose(): Promise<void> {
    const translator = this.translator;
    this.translator = null;
    await translator?.dispose?.();
  }

  private async load(): Promise<TranslationPipelineFn> {
    const dtype = this.quantized ? "q8" : "fp32";
    this.logger.info(`Loading ${this.modelId} (${dtype})`);

    const translator = (await pipeline(
      "translation" as PipelineType,
      this.modelId,
      { dtype, ...(this.cacheDir ? { cache_dir: this.cacheDir } : {}) }
    )) as unknown as TranslationPipelineFn;

    this.logger.info(`${this.modelId} ready`);
    return translator;
  }
}

/**
 * Maps a short tag or FLORES-200 code to the code NLLB expects.
 *
 * @throws UnsupportedLanguageError
 */
export function resolveLanguage(code: string, role: LanguageRole): string {
  const mapped = NLLB_CODES.get(code);
  if (mapped !== undefined) {
    return mapped;
  }
  if (FLORES_CODES.has(code)) {
    return code;
  }
  throw new UnsupportedLanguageError(code, role, SUPPORTED_LANGUAGES);
}

export function createNLLBTranslator(
  options?: Readonly<NLLBTranslatorOptions>
): NLLBTranslator {
  return new NLLBTranslator(options);
}
