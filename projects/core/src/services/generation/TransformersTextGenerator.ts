import {
  pipeline,
  TextStreamer,
  InterruptableStoppingCriteria,
  type PipelineType,
  type PreTrainedTokenizer,
} from "@huggingface/transformers";

import type { ITextGenerator, GenerateOptions } from "../../interfaces/ITextGenerator.js";
import {
  GeneratorNotInitializedError,
  GenerationSourceError,
} from "../../errors/GenerationError.js";
import { type Logger, silentLogger, describeError } from "../../logging/logger.js";
import { AsyncQueue } from "../pipeline/AsyncQueue.js";
import { hasSampling, type SamplingParameters } from "./GenerationParameters.js";

const BACKEND = "transformers";

/**
 * Instruction-tuned model small enough for CPU inference through ONNX.
 */
const DEFAULT_MODEL_ID = "onnx-community/Phi-3.5-mini-instruct-onnx-web";

export interface TransformersTextGeneratorOptions {
  readonly modelId?: string;
  readonly cacheDir?: string;
  readonly dtype?: "q4" | "q8" | "fp16" | "fp32";
  readonly logger?: Logger;
}

/**
 * Generation kwargs understood by the text-generation pipeline.
 * Unset sampling fields are left out entirely.
 */
interface TextGenerationKwargs {
  max_new_tokens: number;
  do_sample: boolean;
  return_full_text: boolean;
  temperature?: number;
  top_p?: number;
  top_k?: number;
  repetition_penalty?: number;
  streamer?: TextStreamer;
  stopping_criteria?: InterruptableStoppingCriteria;
}

interface TextGenerationOutput {
  readonly generated_text: string;
}

/**
 * Callable shape of the text-generation pipeline, plus the tokenizer the
 * streamer decodes with.
 */
interface TextGenerationPipelineFn {
  (text: string, options: TextGenerationKwargs): Promise<TextGenerationOutput[]>;
  readonly tokenizer: PreTrainedTokenizer;
}

/**
 * Maps the validated sampling record onto pipeline kwargs.
 * Sampling is only switched on when at least one sampling field was set;
 * otherwise decoding is greedy and the model's defaults stand.
 */
export function toTextGenerationKwargs(
  maxTokens: number,
  sampling: SamplingParameters
): TextGenerationKwargs {
  const kwargs: TextGenerationKwargs = {
    max_new_tokens: maxTokens,
    do_sample: hasSampling(sampling),
    return_full_text: false,
  };

  if (sampling.temperature !== undefined) kwargs.temperature = sampling.temperature;
  if (sampling.topP !== undefined) kwargs.top_p = sampling.topP;
  if (sampling.topK !== undefined) kwargs.top_k = sampling.topK;
  if (sampling.repeatPenalty !== undefined) kwargs.repetition_penalty = sampling.repeatPenalty;

  return kwargs;
}

/**
 * Local text generation through Transformers.js.
 *
 * Decoded text is pushed by a TextStreamer callback into an AsyncQueue that
 * the consumer pulls from. When the consumer stops pulling (or the signal
 * aborts) the stopping criteria interrupt inference at the next token.
 */
export class TransformersTextGenerator implements ITextGenerator {
  readonly backend = BACKEND;

  private readonly modelId: string;
  private readonly cacheDir: string | null;
  private readonly dtype: "q4" | "q8" | "fp16" | "fp32";
  private readonly logger: Logger;

  private generator: TextGenerationPipelineFn | null = null;

  constructor(options?: Readonly<TransformersTextGeneratorOptions>) {
    this.modelId = options?.modelId ?? DEFAULT_MODEL_ID;
    this.cacheDir = options?.cacheDir ?? null;
    this.dtype = options?.dtype ?? "q4";
    this.logger = options?.logger ?? silentLogger;
  }

  get isReady(): boolean {
    return this.generator !== null;
  }

  async initialize(): Promise<void> {
    if (this.generator) {
      return;
    }

    const pipelineOptions: { dtype: "q4" | "q8" | "fp16" | "fp32"; cache_dir?: string } = {
      dtype: this.dtype,
    };
    if (this.cacheDir) {
      pipelineOptions.cache_dir = this.cacheDir;
    }

    this.logger.info(`Loading ${this.modelId} (${this.dtype})`);

    this.generator = (await pipeline(
      "text-generation" as PipelineType,
      this.modelId,
      pipelineOptions
    )) as unknown as TextGenerationPipelineFn;

    this.logger.info(`${this.modelId} ready`);
  }

  generate(prompt: string, options: Readonly<GenerateOptions>): AsyncIterable<string> {
    const generator = this.requireGenerator();
    const stoppingCriteria = new InterruptableStoppingCriteria();
    const queue = new AsyncQueue<string>(() => stoppingCriteria.interrupt());

    const onAbort = (): void => {
      stoppingCriteria.interrupt();
      queue.close();
    };
    if (options.signal?.aborted) {
      onAbort();
      return queue;
    }
    options.signal?.addEventListener("abort", onAbort, { once: true });

    const streamer = new TextStreamer(generator.tokenizer, {
      skip_prompt: true,
      callback_function: (text: string) => queue.push(text),
    });

    const kwargs = toTextGenerationKwargs(options.maxTokens, options.sampling);
    kwargs.streamer = streamer;
    kwargs.stopping_criteria = stoppingCriteria;

    void generator(prompt, kwargs)
      .then(() => queue.close())
      .catch((error: unknown) => {
        queue.closeWithError(new GenerationSourceError(BACKEND, describeError(error), error));
      })
      .finally(() => options.signal?.removeEventListener("abort", onAbort));

    return queue;
  }

  async complete(prompt: string, options: Readonly<GenerateOptions>): Promise<string> {
    const generator = this.requireGenerator();

    try {
      const output = await generator(
        prompt,
        toTextGenerationKwargs(options.maxTokens, options.sampling)
      );
      return output[0]?.generated_text ?? "";
    } catch (error) {
      throw new GenerationSourceError(BACKEND, describeError(error), error);
    }
  }

  async dispose(): Promise<void> {
    this.generator = null;
  }

  private requireGenerator(): TextGenerationPipelineFn {
    if (!this.generator) {
      throw new GeneratorNotInitializedError("TransformersTextGenerator");
    }
    return this.generator;
  }
}

export function createTransformersTextGenerator(
  options?: Readonly<TransformersTextGeneratorOptions>
): TransformersTextGenerator {
  return new TransformersTextGenerator(options);
}
