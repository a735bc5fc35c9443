/**
 * Generation through a llama.cpp server's OpenAI-compatible completions
 * endpoint, for GGUF models.
 */

import { z } from "zod";

import type { ITextGenerator, GenerateOptions } from "../../interfaces/ITextGenerator.js";
import { GenerationSourceError } from "../../errors/GenerationError.js";
import { type Logger, silentLogger, describeError } from "../../logging/logger.js";
import type { SamplingParameters } from "./GenerationParameters.js";

const BACKEND = "llama-server";

export interface LlamaServerTextGeneratorOptions {
  /** Base URL, e.g. http://localhost:8080 */
  readonly endpoint: string;
  /** Model name reported to the server; llama-server serves one model and ignores it */
  readonly model?: string;
  /** Injected for tests. Default: global fetch */
  readonly fetchFn?: typeof fetch;
  readonly logger?: Logger;
}

/**
 * Request body for POST /v1/completions. top_k and repeat_penalty are
 * llama.cpp extensions.
 */
export interface CompletionRequestBody {
  model?: string;
  prompt: string;
  max_tokens: number;
  stream: boolean;
  temperature?: number;
  top_p?: number;
  top_k?: number;
  repeat_penalty?: number;
}

const completionChunkSchema = z.object({
  choices: z.array(z.object({ text: z.string().optional() })).optional(),
});

function completionText(payload: unknown): string | null {
  const parsed = completionChunkSchema.safeParse(payload);
  if (!parsed.success) {
    return null;
  }
  return parsed.data.choices?.[0]?.text ?? null;
}

export function toCompletionRequestBody(
  prompt: string,
  maxTokens: number,
  sampling: SamplingParameters,
  stream: boolean,
  model?: string
): CompletionRequestBody {
  const body: CompletionRequestBody = { prompt, max_tokens: maxTokens, stream };

  if (model !== undefined) body.model = model;
  if (sampling.temperature !== undefined) body.temperature = sampling.temperature;
  if (sampling.topP !== undefined) body.top_p = sampling.topP;
  if (sampling.topK !== undefined) body.top_k = sampling.topK;
  if (sampling.repeatPenalty !== undefined) body.repeat_penalty = sampling.repeatPenalty;

  return body;
}

/**
 * Extracts the text delta from one SSE `data:` payload.
 * Returns null for keep-alives, [DONE] and malformed payloads.
 */
export function parseCompletionEvent(line: string): string | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith("data:")) {
    return null;
  }

  const data = trimmed.slice(5).trim();
  if (data === "" || data === "[DONE]") {
    return null;
  }

  try {
    return completionText(JSON.parse(data));
  } catch {
    // Skip malformed SSE chunks
    return null;
  }
}

export class LlamaServerTextGenerator implements ITextGenerator {
  readonly backend = BACKEND;

  private readonly endpoint: string;
  private readonly model: string | undefined;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;
  private ready = false;

  constructor(options: Readonly<LlamaServerTextGeneratorOptions>) {
    this.endpoint = options.endpoint.replace(/\/+$/, "");
    this.model = options.model;
    this.fetchFn = options.fetchFn ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  get isReady(): boolean {
    return this.ready;
  }

  /**
   * Checks the server's /health endpoint. Failure is logged, not thrown:
   * the server may come up after this process.
   */
  async initialize(): Promise<void> {
    try {
      const res = await this.fetchFn(`${this.endpoint}/health`, {
        signal: AbortSignal.timeout(2000),
      });
      this.ready = res.ok;
      if (!res.ok) {
        this.logger.warn(`${this.endpoint} health check returned ${res.status}`);
      }
    } catch (error) {
      this.ready = false;
      this.logger.warn(`${this.endpoint} unreachable: ${describeError(error)}`);
    }
  }

  async *generate(
    prompt: string,
    options: Readonly<GenerateOptions>
  ): AsyncGenerator<string, void, undefined> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const res = await this.post(
        toCompletionRequestBody(prompt, options.maxTokens, options.sampling, true, this.model),
        controller.signal
      );
      if (!res.body) {
        throw new GenerationSourceError(BACKEND, "response has no body");
      }

      const reader = res.body.getReader();
      const decoder = new TextDecoder();
      let buffer = "";

      try {
        while (true) {
          const { done, value } = await reader.read();
          if (done) break;

          buffer += decoder.decode(value, { stream: true });
          const lines = buffer.split("\n");
          buffer = lines.pop() ?? "";

          for (const line of lines) {
            const text = parseCompletionEvent(line);
            if (text !== null) {
              yield text;
            }
          }
        }

        const last = parseCompletionEvent(buffer + decoder.decode());
        if (last !== null) {
          yield last;
        }
      } finally {
        reader.releaseLock();
      }
    } catch (error) {
      if (controller.signal.aborted) {
        return;
      }
      throw error instanceof GenerationSourceError
        ? error
        : new GenerationSourceError(BACKEND, describeError(error), error);
    } finally {
      options.signal?.removeEventListener("abort", onAbort);
      // Cancels the HTTP request if the consumer stopped early
      controller.abort();
    }
  }

  async complete(prompt: string, options: Readonly<GenerateOptions>): Promise<string> {
    try {
      const res = await this.post(
        toCompletionRequestBody(prompt, options.maxTokens, options.sampling, false, this.model),
        options.signal
      );
      return completionText(await res.json()) ?? "";
    } catch (error) {
      throw error instanceof GenerationSourceError
        ? error
        : new GenerationSourceError(BACKEND, describeError(error), error);
    }
  }

  async dispose(): Promise<void> {
    this.ready = false;
  }

  private async post(body: CompletionRequestBody, signal?: AbortSignal): Promise<Response> {
    const res = await this.fetchFn(`${this.endpoint}/v1/completions`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
      signal,
    });

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new GenerationSourceError(BACKEND, `server returned ${res.status}: ${text}`);
    }
    return res;
  }
}

export function createLlamaServerTextGenerator(
  options: Readonly<LlamaServerTextGeneratorOptions>
): LlamaServerTextGenerator {
  return new LlamaServerTextGenerator(options);
}
