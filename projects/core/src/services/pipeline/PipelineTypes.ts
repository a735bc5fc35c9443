/**
 * Type definitions for the summarization pipeline.
 * Defines phases, output segments, configuration, and shared helpers.
 */

import type { GenerationParametersInput } from "../generation/GenerationParameters.js";

/**
 * Orchestrator phases in the order they run. BACK_TRANSLATING only runs when
 * requested.
 */
export const PIPELINE_PHASES = [
  "TRANSLATING_INPUT",
  "SEPARATOR",
  "GENERATING",
  "BACK_TRANSLATING",
  "DONE",
] as const;
export type PipelinePhase = (typeof PIPELINE_PHASES)[number];

/**
 * Session states: the phases plus the abnormal terminals.
 */
export type SessionState = "CREATED" | PipelinePhase | "FAILED" | "CANCELLED";

export type OutputSegmentKind = "translation" | "separator" | "unit" | "back-translation";

/**
 * One piece of the output stream. `text` is written to the client verbatim.
 */
export interface OutputSegment {
  readonly phase: PipelinePhase;
  readonly kind: OutputSegmentKind;
  readonly text: string;
}

/**
 * Per-request options for a pipeline run.
 */
export interface SummarizeRequest {
  /** Stream back-translated units instead of generated ones. Default: false */
  readonly backTranslate?: boolean;
  /** Max tokens and sampling fields; unset fields are not forwarded */
  readonly generation?: Readonly<GenerationParametersInput>;
}

/**
 * Static configuration of the pipeline, shared by all sessions.
 */
export interface PipelineConfig {
  /** Language of the client's input text. Default: "he" */
  readonly sourceLanguage: string;
  /** Language the generator works in. Default: "en" */
  readonly pivotLanguage: string;
  /** Phrase that ends generation. Default: "END SUMMARY" */
  readonly stopMarker: string;
  /** Whether to consume the generator as a fragment stream or a single completion. Default: true */
  readonly streamGeneration: boolean;
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  sourceLanguage: "he",
  pivotLanguage: "en",
  stopMarker: "END SUMMARY",
  streamGeneration: true,
};

export const TRANSLATION_LABEL = "TRANSLATION: ";

export const GENERATION_SEPARATOR = `\n${"-".repeat(50)} GENERATION ${"-".repeat(50)}\n`;

export function formatTranslatedSentence(sentence: string): string {
  return `${TRANSLATION_LABEL}${sentence}\n`;
}

export function formatUnit(unit: string): string {
  return `• ${unit}\n`;
}

/**
 * Get timestamp in milliseconds.
 */
export function getTimestamp(): number {
  return Date.now();
}

/**
 * Generate a unique ID for tracking sessions.
 */
export function generateId(prefix: string): string {
  return `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2, 9)}`;
}
