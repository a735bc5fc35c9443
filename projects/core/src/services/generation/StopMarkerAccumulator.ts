/**
 * Boundary-safe token accumulator.
 *
 * Re-chunks a generator's fragment stream so that a multi-character stop
 * marker is detected even when it is split across fragments, and is never
 * passed downstream as content.
 */

import { ConfigurationError } from "../../errors/PipelineError.js";

/**
 * Result of pushing one fragment.
 */
export interface AccumulatorStep {
  /** Content that is now known not to belong to the marker, or null */
  readonly content: string | null;
  /** True once the marker has fully arrived */
  readonly stopped: boolean;
}

/**
 * Chunk emitted once after the marker is detected.
 */
export function endOfStreamChunk(marker: string): string {
  return `\n${marker}\n`;
}

/**
 * Stateful accumulator. Feed fragments with push(), then flush() when the
 * source is exhausted.
 *
 * The pending buffer only ever holds the longest suffix of the received text
 * that could still grow into the marker, so it never exceeds
 * `marker.length - 1` characters after a step.
 */
export class StopMarkerAccumulator {
  private pending = "";
  private stopped = false;

  constructor(readonly marker: string) {
    if (marker.length === 0) {
      throw new ConfigurationError("stop marker", "must not be empty");
    }
  }

  get pendingLength(): number {
    return this.pending.length;
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Appends a fragment. Fragments pushed after the marker was detected are
   * ignored.
   */
  push(fragment: string): AccumulatorStep {
    if (this.stopped || fragment.length === 0) {
      return { content: null, stopped: this.stopped };
    }

    const buffer = this.pending + fragment;
    const markerIndex = buffer.indexOf(this.marker);

    if (markerIndex !== -1) {
      this.stopped = true;
      this.pending = "";
      const before = buffer.slice(0, markerIndex);
      return { content: before.length > 0 ? before : null, stopped: true };
    }

    const keep = this.partialMarkerLength(buffer);
    this.pending = buffer.slice(buffer.length - keep);
    const emit = buffer.slice(0, buffer.length - keep);
    return { content: emit.length > 0 ? emit : null, stopped: false };
  }

  /**
   * Releases whatever is still pending. Only meaningful when the source ended
   * without producing the marker.
   */
  flush(): string | null {
    const rest = this.pending;
    this.pending = "";
    return rest.length > 0 && !this.stopped ? rest : null;
  }

  /**
   * Length of the longest proper prefix of the marker that the buffer ends with.
   */
  private partialMarkerLength(buffer: string): number {
    const max = Math.min(this.marker.length - 1, buffer.length);
    for (let length = max; length > 0; length--) {
      if (buffer.endsWith(this.marker.slice(0, length))) {
        return length;
      }
    }
    return 0;
  }
}

/**
 * Pulls fragments from `source` and yields stop-marker-safe chunks.
 *
 * When the marker arrives the content before it is yielded, then
 * {@link endOfStreamChunk}, and the source is closed without being pulled
 * again. If the source throws, the error propagates and any pending text is
 * dropped.
 */
export async function* accumulateFragments(
  source: AsyncIterable<string>,
  marker: string
): AsyncGenerator<string, void, undefined> {
  const accumulator = new StopMarkerAccumulator(marker);

  for await (const fragment of source) {
    const step = accumulator.push(fragment);
    if (step.content !== null) {
      yield step.content;
    }
    if (step.stopped) {
      yield endOfStreamChunk(marker);
      // Leaving the loop calls return() on the source.
      return;
    }
  }

  const rest = accumulator.flush();
  if (rest !== null) {
    yield rest;
  }
}
