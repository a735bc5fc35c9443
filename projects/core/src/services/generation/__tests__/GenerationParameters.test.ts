import { describe, it, expect } from "vitest";

import {
  parseGenerationParameters,
  stripUnset,
  hasSampling,
  DEFAULT_MAX_TOKENS,
  MAX_TOKENS_RANGE,
} from "../GenerationParameters.js";
import { ConfigurationError } from "../../../errors/PipelineError.js";

function settingOf(run: () => unknown): string | null {
  try {
    run();
    return null;
  } catch (error) {
    return error instanceof ConfigurationError ? error.setting : null;
  }
}

describe("parseGenerationParameters()", () => {
  it("defaults maxTokens and leaves sampling empty", () => {
    expect(parseGenerationParameters()).toEqual({
      maxTokens: DEFAULT_MAX_TOKENS,
      sampling: {},
    });
    expect(DEFAULT_MAX_TOKENS).toBe(200);
  });

  it("keeps only the sampling fields that were set", () => {
    const parameters = parseGenerationParameters({ maxTokens: 64, temperature: 0.7 });

    expect(parameters.maxTokens).toBe(64);
    expect(parameters.sampling).toEqual({ temperature: 0.7 });
    expect(Object.keys(parameters.sampling)).toEqual(["temperature"]);
  });

  it("accepts the range boundaries", () => {
    expect(parseGenerationParameters({ maxTokens: MAX_TOKENS_RANGE.min }).maxTokens).toBe(32);
    expect(parseGenerationParameters({ maxTokens: MAX_TOKENS_RANGE.max }).maxTokens).toBe(1024);
    expect(
      parseGenerationParameters({ temperature: 0, topP: 1, topK: 200, repeatPenalty: 0.5 }).sampling
    ).toEqual({ temperature: 0, topP: 1, topK: 200, repeatPenalty: 0.5 });
  });

  it("rejects maxTokens outside 32..1024", () => {
    expect(() => parseGenerationParameters({ maxTokens: 16 })).toThrow(ConfigurationError);
    expect(settingOf(() => parseGenerationParameters({ maxTokens: 2048 }))).toBe("maxTokens");
  });

  it("names the offending sampling field", () => {
    expect(settingOf(() => parseGenerationParameters({ temperature: 2.5 }))).toBe("temperature");
    expect(settingOf(() => parseGenerationParameters({ topP: -0.1 }))).toBe("topP");
    expect(settingOf(() => parseGenerationParameters({ topK: 1.5 }))).toBe("topK");
    expect(settingOf(() => parseGenerationParameters({ repeatPenalty: 3 }))).toBe("repeatPenalty");
  });
});

describe("stripUnset()", () => {
  it("drops keys whose value is undefined", () => {
    const stripped = stripUnset({ temperature: undefined, topP: 0.5 });

    expect(stripped).toEqual({ topP: 0.5 });
    expect("temperature" in stripped).toBe(false);
  });
});

describe("hasSampling()", () => {
  it("is false when nothing was set", () => {
    expect(hasSampling({})).toBe(false);
    expect(hasSampling({ topK: undefined })).toBe(false);
  });

  it("is true when any field was set", () => {
    expect(hasSampling({ topK: 5 })).toBe(true);
  });
});
