import { describe, it, expect } from "vitest";

import {
  StopMarkerAccumulator,
  accumulateFragments,
  endOfStreamChunk,
} from "../StopMarkerAccumulator.js";
import { fromArray } from "../../pipeline/transformEach.js";
import { createMockTextGenerator } from "./__mocks__/MockTextGenerator.js";
import { ConfigurationError } from "../../../errors/PipelineError.js";
import { GenerationSourceError } from "../../../errors/GenerationError.js";
import { randomSplit, randomText, seededRandom } from "../../../__tests__/randomText.js";

const MARKER = "END SUMMARY";

async function collect(source: AsyncIterable<string>): Promise<string[]> {
  const items: string[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

describe("StopMarkerAccumulator", () => {
  describe("constructor", () => {
    it("rejects an empty marker", () => {
      expect(() => new StopMarkerAccumulator("")).toThrow(ConfigurationError);
    });
  });

  describe("push()", () => {
    it("holds back a suffix that could grow into the marker", () => {
      const accumulator = new StopMarkerAccumulator(MARKER);

      expect(accumulator.push("foo ")).toEqual({ content: "foo ", stopped: false });
      expect(accumulator.push("bar END SUM")).toEqual({ content: "bar ", stopped: false });
      expect(accumulator.pendingLength).toBe(7);
      expect(accumulator.push("MARY")).toEqual({ content: null, stopped: true });
      expect(accumulator.isStopped).toBe(true);
    });

    it("never holds more than marker length minus one characters", () => {
      const accumulator = new StopMarkerAccumulator(MARKER);

      for (const character of "END SUMMAR") {
        expect(accumulator.push(character).content).toBeNull();
        expect(accumulator.pendingLength).toBeLessThanOrEqual(MARKER.length - 1);
      }
      expect(accumulator.pendingLength).toBe(10);

      expect(accumulator.push("x")).toEqual({ content: "END SUMMARx", stopped: false });
      expect(accumulator.pendingLength).toBe(0);
    });

    it("emits text before the marker and drops text after it", () => {
      const accumulator = new StopMarkerAccumulator(MARKER);

      expect(accumulator.push("END END SUMMARY tail")).toEqual({
        content: "END ",
        stopped: true,
      });
      expect(accumulator.push("more")).toEqual({ content: null, stopped: true });
      expect(accumulator.flush()).toBeNull();
    });

    it("ignores empty fragments", () => {
      const accumulator = new StopMarkerAccumulator(MARKER);

      expect(accumulator.push("")).toEqual({ content: null, stopped: false });
      expect(accumulator.pendingLength).toBe(0);
    });
  });

  describe("flush()", () => {
    it("releases a pending partial marker when the source ends", () => {
      const accumulator = new StopMarkerAccumulator(MARKER);

      accumulator.push("see you at the END");
      expect(accumulator.flush()).toBe("END");
      expect(accumulator.flush()).toBeNull();
    });
  });
});

describe("StopMarkerAccumulator over arbitrary splits", () => {
  const CASES = 500;

  // Self-overlapping markers over a tiny alphabet hit partial matches often.
  it.each(["aab", "abab", "aba", "b", "ab\n"])("holds for marker %j", (marker) => {
    const random = seededRandom(marker.length * 7919 + marker.charCodeAt(0));

    for (let i = 0; i < CASES; i++) {
      const text = randomText(random, ["a", "b", "\n"], 24);
      const accumulator = new StopMarkerAccumulator(marker);
      const content: string[] = [];

      for (const fragment of randomSplit(random, text)) {
        const step = accumulator.push(fragment);
        expect(accumulator.pendingLength).toBeLessThanOrEqual(marker.length - 1);
        if (step.content !== null) {
          expect(step.content).not.toContain(marker);
          content.push(step.content);
        }
      }
      const rest = accumulator.flush();
      if (rest !== null) {
        content.push(rest);
      }

      const markerIndex = text.indexOf(marker);
      expect(accumulator.isStopped).toBe(markerIndex !== -1);
      expect(content.join("")).toBe(markerIndex === -1 ? text : text.slice(0, markerIndex));
    }
  });
});

describe("accumulateFragments()", () => {
  it("splits around a marker delivered across fragments", async () => {
    const chunks = await collect(
      accumulateFragments(fromArray(["foo ", "bar END SUM", "MARY"]), MARKER)
    );

    expect(chunks).toEqual(["foo ", "bar ", endOfStreamChunk(MARKER)]);
    expect(endOfStreamChunk(MARKER)).toBe("\nEND SUMMARY\n");
  });

  it("passes all content through when no marker arrives", async () => {
    const chunks = await collect(
      accumulateFragments(fromArray(["Hello wor", "ld. E", "ND"]), MARKER)
    );

    expect(chunks).toEqual(["Hello wor", "ld. ", "END"]);
    expect(chunks.join("")).toBe("Hello world. END");
  });

  it("stops pulling the source once the marker arrives", async () => {
    const generator = createMockTextGenerator({
      fragments: ["a ", "END SUMMARY", "never"],
    });
    await generator.initialize();

    const chunks = await collect(
      accumulateFragments(generator.generate("prompt", { maxTokens: 32, sampling: {} }), MARKER)
    );

    expect(chunks).toEqual(["a ", "\nEND SUMMARY\n"]);
    expect(generator.pulled).toBe(2);
    expect(generator.wasStoppedEarly).toBe(true);
  });

  it("propagates a source error and drops the pending text", async () => {
    const generator = createMockTextGenerator({ fragments: ["x END", "ing"], failAfter: 1 });
    await generator.initialize();

    const chunks: string[] = [];
    const run = async (): Promise<void> => {
      const source = generator.generate("prompt", { maxTokens: 32, sampling: {} });
      for await (const chunk of accumulateFragments(source, MARKER)) {
        chunks.push(chunk);
      }
    };

    await expect(run()).rejects.toThrow(GenerationSourceError);
    expect(chunks).toEqual(["x "]);
  });
});
