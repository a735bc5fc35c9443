/**
 * Summarization Pipeline - Main Orchestrator
 *
 * Runs translate-input -> separator -> generate -> (back-translate) as one
 * ordered, pull-driven stream of output segments. The consumer's pulls drive
 * every upstream call, so one sentence, fragment or unit is in flight at a time.
 */

import type { ITranslator } from "../../interfaces/ITranslator.js";
import type { ITextGenerator, GenerateOptions } from "../../interfaces/ITextGenerator.js";
import {
  ConfigurationError,
  StageFailedError,
  type FailedStage,
} from "../../errors/PipelineError.js";
import { type Logger, silentLogger, describeError } from "../../logging/logger.js";
import { parseGenerationParameters } from "../generation/GenerationParameters.js";
import { accumulateFragments } from "../generation/StopMarkerAccumulator.js";
import { segmentSentences } from "../segmentation/SentenceSegmenter.js";
import { DEFAULT_UNIT_DELIMITERS, segmentUnits } from "../segmentation/UnitSegmenter.js";
import {
  createSummaryPromptBuilder,
  type PromptBuilder,
} from "../prompts/SummaryPromptBuilder.js";
import { transformEach, fromArray } from "./transformEach.js";
import { StreamSession, createStreamSession } from "./StreamSession.js";
import {
  type OutputSegment,
  type PipelineConfig,
  type SummarizeRequest,
  DEFAULT_PIPELINE_CONFIG,
  GENERATION_SEPARATOR,
  formatTranslatedSentence,
  formatUnit,
} from "./PipelineTypes.js";

/**
 * Shared model services. The pipeline holds references, it does not own them.
 */
export interface SummarizationPipelineDependencies {
  readonly translator: ITranslator;
  readonly generator: ITextGenerator;
  /** Default: the five-bullet summary prompt ending in the stop marker */
  readonly promptBuilder?: PromptBuilder;
  readonly logger?: Logger;
}

export interface SummarizationPipelineOptions {
  readonly config?: Partial<PipelineConfig>;
}

export interface RunOptions {
  /** Aborting stops the run before its next upstream pull */
  readonly signal?: AbortSignal;
  /** Session to record progress on. Created per run if omitted. */
  readonly session?: StreamSession;
}

/**
 * Usage:
 * ```typescript
 * const pipeline = createSummarizationPipeline({ translator, generator });
 *
 * for await (const segment of pipeline.run(hebrewText, { backTranslate: true })) {
 *   response.write(segment.text);
 * }
 * ```
 */
export class SummarizationPipeline {
  readonly config: PipelineConfig;

  private readonly translator: ITranslator;
  private readonly generator: ITextGenerator;
  private readonly promptBuilder: PromptBuilder;
  private readonly logger: Logger;

  constructor(
    dependencies: Readonly<SummarizationPipelineDependencies>,
    options?: Readonly<SummarizationPipelineOptions>
  ) {
    this.config = {
      ...DEFAULT_PIPELINE_CONFIG,
      ...options?.config,
    };

    if (this.config.stopMarker.length === 0) {
      throw new ConfigurationError("stop marker", "must not be empty");
    }
    const delimiter = DEFAULT_UNIT_DELIMITERS.find((d) => this.config.stopMarker.includes(d));
    if (delimiter !== undefined) {
      throw new ConfigurationError("stop marker", `must not contain ${JSON.stringify(delimiter)}`);
    }

    this.translator = dependencies.translator;
    this.generator = dependencies.generator;
    this.promptBuilder =
      dependencies.promptBuilder ??
      createSummaryPromptBuilder({ stopPhrase: this.config.stopMarker });
    this.logger = dependencies.logger ?? silentLogger;
  }

  createSession(request?: Readonly<SummarizeRequest>): StreamSession {
    return createStreamSession({ backTranslate: request?.backTranslate ?? false });
  }

  /**
   * Streams the output segments for one request.
   *
   * Generation parameters are validated before anything is produced
   * (ConfigurationError). A failing phase ends the stream with a
   * StageFailedError; segments already yielded stand.
   */
  async *run(
    text: string,
    request: Readonly<SummarizeRequest> = {},
    options: Readonly<RunOptions> = {}
  ): AsyncGenerator<OutputSegment, void, undefined> {
    const parameters = parseGenerationParameters(request.generation);
    const session = options.session ?? this.createSession(request);
    const signal = options.signal;
    const log = this.logger.child(session.sessionId);

    session.addStateListener((change) => {
      log.debug(`${change.from} -> ${change.to}`);
    });
    log.info(
      `Session started (backTranslate=${session.backTranslate}, maxTokens=${parameters.maxTokens})`
    );

    try {
      // Phase 1: source -> pivot, sentence by sentence
      session.enter("TRANSLATING_INPUT");
      const translatedSentences: string[] = [];
      const sentences = segmentSentences(text);

      const inputTranslations = transformEach(fromArray(sentences), (sentence) =>
        this.translateOrFail("input-translation", sentence, {
          sourceLanguage: this.config.sourceLanguage,
          targetLanguage: this.config.pivotLanguage,
        })
      );
      for await (const translated of untilAborted(inputTranslations, signal)) {
        translatedSentences.push(translated.text);
        session.recordSentence();
        yield {
          phase: "TRANSLATING_INPUT",
          kind: "translation",
          text: formatTranslatedSentence(translated.text),
        };
      }
      if (signal?.aborted) {
        return;
      }

      // Phase 2
      session.enter("SEPARATOR");
      yield { phase: "SEPARATOR", kind: "separator", text: GENERATION_SEPARATOR };

      // Phase 3: generate, strip the stop marker, cut into units
      session.enter("GENERATING");
      const prompt = this.promptBuilder(translatedSentences.join(" ").trim());
      const generateOptions: GenerateOptions = {
        maxTokens: parameters.maxTokens,
        sampling: parameters.sampling,
        signal,
      };
      const fragments = countFragments(this.fragmentSource(prompt, generateOptions), session);
      const units = segmentUnits(accumulateFragments(fragments, this.config.stopMarker), {
        sentinel: this.config.stopMarker,
      });

      if (!request.backTranslate) {
        for await (const unit of untilAborted(units, signal)) {
          session.recordUnit();
          yield { phase: "GENERATING", kind: "unit", text: formatUnit(unit) };
        }
      } else {
        // Phase 4: each unit is translated back as soon as it is complete.
        // The phase starts when the first unit arrives; generation keeps
        // running underneath it.
        const backTranslations = transformEach(units, (unit) => {
          if (session.currentState === "GENERATING") {
            session.enter("BACK_TRANSLATING");
          }
          return this.translateOrFail("back-translation", unit, {
            sourceLanguage: this.config.pivotLanguage,
            targetLanguage: this.config.sourceLanguage,
          });
        });
        for await (const translated of untilAborted(backTranslations, signal)) {
          session.recordUnit();
          yield {
            phase: "BACK_TRANSLATING",
            kind: "back-translation",
            text: formatUnit(translated.text),
          };
        }
      }
      if (signal?.aborted) {
        return;
      }

      session.enter("DONE");
      log.info(`Session done (${session.getSessionInfo().unitsEmitted} units)`);
    } catch (error) {
      const failure =
        error instanceof StageFailedError
          ? error
          : new StageFailedError(stageOf(session), describeError(error), error);
      session.fail(failure);
      log.warn(`Session failed: ${failure.message}`);
      throw failure;
    } finally {
      if (!session.isTerminal) {
        session.cancel();
        log.info("Session cancelled by consumer");
      }
    }
  }

  private fragmentSource(prompt: string, options: GenerateOptions): AsyncIterable<string> {
    if (this.config.streamGeneration) {
      return this.generator.generate(prompt, options);
    }
    return singleCompletion(this.generator, prompt, options);
  }

  private async translateOrFail(
    stage: FailedStage,
    text: string,
    languages: { readonly sourceLanguage: string; readonly targetLanguage: string }
  ): Promise<string> {
    try {
      const result = await this.translator.translate(text, languages);
      return result.text.trim();
    } catch (error) {
      throw new StageFailedError(stage, describeError(error), error);
    }
  }
}

/**
 * Yields from `source` until `signal` aborts. The abort is checked before
 * every pull and after every resolved item, so an item already requested
 * completes but is not passed on.
 */
async function* untilAborted<T>(
  source: AsyncIterable<T>,
  signal: AbortSignal | undefined
): AsyncGenerator<T, void, undefined> {
  const iterator = source[Symbol.asyncIterator]();
  let exhausted = false;
  try {
    while (!signal?.aborted) {
      const result = await iterator.next();
      if (result.done) {
        exhausted = true;
        return;
      }
      if (signal?.aborted) {
        return;
      }
      yield result.value;
    }
  } finally {
    if (!exhausted) {
      await iterator.return?.();
    }
  }
}

/**
 * Counts fragments on the session and attributes source failures to the
 * generation stage, whichever phase is pulling.
 */
async function* countFragments(
  fragments: AsyncIterable<string>,
  session: StreamSession
): AsyncGenerator<string, void, undefined> {
  try {
    for await (const fragment of fragments) {
      session.recordFragment();
      yield fragment;
    }
  } catch (error) {
    throw new StageFailedError("generation", describeError(error), error);
  }
}

async function* singleCompletion(
  generator: ITextGenerator,
  prompt: string,
  options: GenerateOptions
): AsyncGenerator<string, void, undefined> {
  yield await generator.complete(prompt, options);
}

function stageOf(session: StreamSession): FailedStage {
  switch (session.currentState) {
    case "CREATED":
    case "TRANSLATING_INPUT":
      return "input-translation";
    case "BACK_TRANSLATING":
      return "back-translation";
    default:
      return "generation";
  }
}

export function createSummarizationPipeline(
  dependencies: Readonly<SummarizationPipelineDependencies>,
  options?: Readonly<SummarizationPipelineOptions>
): SummarizationPipeline {
  return new SummarizationPipeline(dependencies, options);
}
