import { once } from "node:events";
import { Router, type Response } from "express";
import { z } from "zod";

import {
  MAX_TOKENS_RANGE,
  ValidationError,
  describeError,
  samplingParametersSchema,
  type Logger,
  type SummarizationPipeline,
  type SummarizeRequest,
} from "@lingua-digest/core";

export const MISSING_TEXT_MESSAGE = "Missing 'text' field";

const { temperature, topP, topK, repeatPenalty } = samplingParametersSchema.shape;

/**
 * Wire format of POST /summarize. Sampling fields reuse the core ranges;
 * null is accepted as "unset".
 */
export const summarizeBodySchema = z.object({
  text: z.string({ required_error: MISSING_TEXT_MESSAGE }),
  back_translate: z.boolean().nullish(),
  max_tokens: z.number().int().min(MAX_TOKENS_RANGE.min).max(MAX_TOKENS_RANGE.max).nullish(),
  temperature: temperature.nullable(),
  top_p: topP.nullable(),
  top_k: topK.nullable(),
  repeat_penalty: repeatPenalty.nullable(),
});

export type SummarizeBody = z.infer<typeof summarizeBodySchema>;

export interface ParsedSummarizeBody {
  readonly text: string;
  readonly request: SummarizeRequest;
}

/**
 * @throws ValidationError naming the first offending field
 */
export function parseSummarizeBody(body: unknown): ParsedSummarizeBody {
  const parsed = summarizeBodySchema.safeParse(body);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.map(String).join(".") || "body";
    if (issue?.message === MISSING_TEXT_MESSAGE) {
      throw new ValidationError(field, MISSING_TEXT_MESSAGE);
    }
    throw new ValidationError(field, `${field}: ${issue?.message ?? "invalid value"}`);
  }

  const data = parsed.data;
  return {
    text: data.text,
    request: {
      backTranslate: data.back_translate ?? false,
      generation: {
        maxTokens: data.max_tokens ?? undefined,
        temperature: data.temperature ?? undefined,
        topP: data.top_p ?? undefined,
        topK: data.top_k ?? undefined,
        repeatPenalty: data.repeat_penalty ?? undefined,
      },
    },
  };
}

/**
 * Writes one chunk, waiting for the socket to drain when its buffer is full.
 */
async function write(res: Response, chunk: string, signal: AbortSignal): Promise<void> {
  if (!res.write(chunk)) {
    await once(res, "drain", { signal });
  }
}

export function summarizeRouter(pipeline: SummarizationPipeline, logger: Logger): Router {
  const router = Router();

  router.post("/summarize", async (req, res, next) => {
    const controller = new AbortController();
    const onClose = (): void => {
      if (!res.writableFinished) {
        controller.abort();
      }
    };

    try {
      const { text, request } = parseSummarizeBody(req.body);
      const session = pipeline.createSession(request);
      res.on("close", onClose);

      const segments = pipeline.run(text, request, { signal: controller.signal, session });

      // Errors up to the first segment still get a JSON status
      const first = await segments.next();

      res.status(200);
      res.setHeader("Content-Type", "text/plain; charset=utf-8");
      res.setHeader("Cache-Control", "no-cache");

      try {
        let result = first;
        while (!result.done) {
          await write(res, result.value.text, controller.signal);
          result = await segments.next();
        }
      } catch (error) {
        if (controller.signal.aborted) {
          logger.info(`${session.sessionId} client disconnected`);
        } else {
          logger.error(`${session.sessionId} stream ended early: ${describeError(error)}`);
        }
      } finally {
        await segments.return();
      }

      res.end();
    } catch (error) {
      next(error);
    } finally {
      res.off("close", onClose);
    }
  });

  return router;
}
