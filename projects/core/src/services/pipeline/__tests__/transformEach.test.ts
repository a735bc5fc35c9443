import { describe, it, expect } from "vitest";

import { transformEach, fromArray, type TransformedUnit } from "../transformEach.js";

describe("transformEach()", () => {
  it("transforms units in arrival order with their index", async () => {
    const results: TransformedUnit[] = [];
    for await (const result of transformEach(fromArray(["a", "b", "c"]), async (unit, index) =>
      `${unit.toUpperCase()}${index}`
    )) {
      results.push(result);
    }

    expect(results).toEqual([
      { index: 0, source: "a", text: "A0" },
      { index: 1, source: "b", text: "B1" },
      { index: 2, source: "c", text: "C2" },
    ]);
  });

  it("does not pull the next unit until the current one is delivered", async () => {
    const events: string[] = [];
    async function* units(): AsyncGenerator<string, void, undefined> {
      for (const unit of ["a", "b"]) {
        events.push(`pull ${unit}`);
        yield unit;
      }
    }

    for await (const result of transformEach(units(), async (unit) => {
      events.push(`transform ${unit}`);
      return unit;
    })) {
      events.push(`deliver ${result.text}`);
    }

    expect(events).toEqual([
      "pull a",
      "transform a",
      "deliver a",
      "pull b",
      "transform b",
      "deliver b",
    ]);
  });

  it("stops at the first failing transform", async () => {
    const pulled: string[] = [];
    async function* units(): AsyncGenerator<string, void, undefined> {
      for (const unit of ["ok", "bad", "never"]) {
        pulled.push(unit);
        yield unit;
      }
    }

    const delivered: string[] = [];
    const run = async (): Promise<void> => {
      for await (const result of transformEach(units(), async (unit) => {
        if (unit === "bad") {
          throw new Error(`cannot transform ${unit}`);
        }
        return unit;
      })) {
        delivered.push(result.text);
      }
    };

    await expect(run()).rejects.toThrow("cannot transform bad");
    expect(delivered).toEqual(["ok"]);
    expect(pulled).toEqual(["ok", "bad"]);
  });

  it("yields nothing for an empty source", async () => {
    const results: TransformedUnit[] = [];
    for await (const result of transformEach(fromArray([]), async (unit) => unit)) {
      results.push(result);
    }

    expect(results).toEqual([]);
  });
});
