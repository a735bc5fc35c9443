/**
 * Unit segmenter.
 *
 * Turns a chunked text stream into complete units (bullet lines) as soon as
 * each one is delimited, without waiting for the stream to end.
 */

/** Bullet glyph the summary prompt asks the model to start lines with. */
export const BULLET_GLYPH = "•";

export const DEFAULT_UNIT_DELIMITERS: readonly string[] = ["\n", BULLET_GLYPH];

export interface UnitSegmenterOptions {
  /** Phrase that is never emitted as a unit (the generation stop marker) */
  readonly sentinel?: string;
  /** Single-character or multi-character delimiters. Default: newline and bullet glyph */
  readonly delimiters?: readonly string[];
}

interface DelimiterMatch {
  readonly index: number;
  readonly length: number;
}

/**
 * Stateful segmenter. push() returns units completed by the chunk; flush()
 * returns the trailing unit once the input is exhausted.
 */
export class UnitSegmenter {
  private buffer = "";
  private readonly sentinel: string | null;
  private readonly delimiters: readonly string[];

  constructor(options?: Readonly<UnitSegmenterOptions>) {
    this.sentinel = options?.sentinel ?? null;
    this.delimiters = (options?.delimiters ?? DEFAULT_UNIT_DELIMITERS).filter(
      (delimiter) => delimiter.length > 0
    );
  }

  /**
   * Text received but not yet part of a completed unit.
   */
  get pendingText(): string {
    return this.buffer;
  }

  push(chunk: string): string[] {
    this.buffer += chunk;
    const units: string[] = [];

    let match = this.findDelimiter();
    while (match !== null) {
      const candidate = this.buffer.slice(0, match.index);
      this.buffer = this.buffer.slice(match.index + match.length);
      const unit = this.accept(candidate);
      if (unit !== null) {
        units.push(unit);
      }
      match = this.findDelimiter();
    }

    return units;
  }

  flush(): string[] {
    const unit = this.accept(this.buffer);
    this.buffer = "";
    return unit === null ? [] : [unit];
  }

  private accept(candidate: string): string | null {
    const unit = candidate.trim();
    if (unit.length === 0 || unit === this.sentinel) {
      return null;
    }
    return unit;
  }

  /**
   * Earliest delimiter occurrence in the buffer.
   */
  private findDelimiter(): DelimiterMatch | null {
    let best: DelimiterMatch | null = null;
    for (const delimiter of this.delimiters) {
      const index = this.buffer.indexOf(delimiter);
      if (index !== -1 && (best === null || index < best.index)) {
        best = { index, length: delimiter.length };
      }
    }
    return best;
  }
}

/**
 * Pulls chunks and yields each unit as soon as it is complete.
 */
export async function* segmentUnits(
  chunks: AsyncIterable<string>,
  options?: Readonly<UnitSegmenterOptions>
): AsyncGenerator<string, void, undefined> {
  const segmenter = new UnitSegmenter(options);

  for await (const chunk of chunks) {
    for (const unit of segmenter.push(chunk)) {
      yield unit;
    }
  }

  for (const unit of segmenter.flush()) {
    yield unit;
  }
}
