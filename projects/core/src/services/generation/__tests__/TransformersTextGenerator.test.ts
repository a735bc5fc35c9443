import { describe, it, expect, vi, beforeEach } from "vitest";

import {
  createTransformersTextGenerator,
  toTextGenerationKwargs,
} from "../TransformersTextGenerator.js";
import {
  GeneratorNotInitializedError,
  GenerationSourceError,
} from "../../../errors/GenerationError.js";

interface FakeKwargs {
  readonly max_new_tokens: number;
  readonly do_sample: boolean;
  readonly streamer?: { put(text: string): void };
  readonly stopping_criteria?: { readonly interrupted: boolean };
}

interface FakeState {
  script: string[];
  failAt: number | null;
  emitted: string[];
  calls: FakeKwargs[];
}

const state = vi.hoisted<FakeState>(() => ({
  script: [],
  failAt: null,
  emitted: [],
  calls: [],
}));

const pipelineMock = vi.hoisted(() => vi.fn());

// Stand-in for the ONNX-backed pipeline: the streamer forwards decoded text
// straight to its callback and the stopping criteria record interrupts.
vi.mock("@huggingface/transformers", () => {
  class TextStreamer {
    constructor(
      readonly tokenizer: unknown,
      readonly options: { readonly callback_function: (text: string) => void }
    ) {}

    put(text: string): void {
      this.options.callback_function(text);
    }
  }

  class InterruptableStoppingCriteria {
    interrupted = false;

    interrupt(): void {
      this.interrupted = true;
    }
  }

  return { pipeline: pipelineMock, TextStreamer, InterruptableStoppingCriteria };
});

async function fakeTextGeneration(
  _text: string,
  kwargs: FakeKwargs
): Promise<Array<{ generated_text: string }>> {
  state.calls.push(kwargs);
  for (const [index, fragment] of state.script.entries()) {
    if (kwargs.stopping_criteria?.interrupted) {
      break;
    }
    if (state.failAt === index) {
      throw new Error("onnx session crashed");
    }
    kwargs.streamer?.put(fragment);
    state.emitted.push(fragment);
    await new Promise((resolve) => setTimeout(resolve, 0));
  }
  return [{ generated_text: state.script.join("") }];
}

async function collect(source: AsyncIterable<string>): Promise<string[]> {
  const items: string[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}

describe("toTextGenerationKwargs()", () => {
  it("decodes greedily when no sampling field is set", () => {
    expect(toTextGenerationKwargs(200, {})).toEqual({
      max_new_tokens: 200,
      do_sample: false,
      return_full_text: false,
    });
  });

  it("maps only the sampling fields that were set", () => {
    expect(toTextGenerationKwargs(64, { temperature: 0.7, topK: 20 })).toEqual({
      max_new_tokens: 64,
      do_sample: true,
      return_full_text: false,
      temperature: 0.7,
      top_k: 20,
    });
    expect(toTextGenerationKwargs(64, { topP: 0.9, repeatPenalty: 1.2 })).toEqual({
      max_new_tokens: 64,
      do_sample: true,
      return_full_text: false,
      top_p: 0.9,
      repetition_penalty: 1.2,
    });
  });
});

describe("TransformersTextGenerator", () => {
  beforeEach(() => {
    state.script = ["• Hello", " world.\n", "END SUMMARY"];
    state.failAt = null;
    state.emitted = [];
    state.calls = [];
    pipelineMock.mockReset();
    pipelineMock.mockResolvedValue(Object.assign(fakeTextGeneration, { tokenizer: {} }));
  });

  it("throws when used before initialization", () => {
    const generator = createTransformersTextGenerator();

    expect(generator.isReady).toBe(false);
    expect(() => generator.generate("prompt", { maxTokens: 32, sampling: {} })).toThrow(
      GeneratorNotInitializedError
    );
  });

  it("loads the model once with the configured dtype and cache", async () => {
    const generator = createTransformersTextGenerator({
      modelId: "test/tiny-model",
      cacheDir: "/tmp/models",
    });
    await generator.initialize();
    await generator.initialize();

    expect(generator.isReady).toBe(true);
    expect(pipelineMock).toHaveBeenCalledTimes(1);
    expect(pipelineMock).toHaveBeenCalledWith("text-generation", "test/tiny-model", {
      dtype: "q4",
      cache_dir: "/tmp/models",
    });
  });

  it("streams fragments in the order the streamer decodes them", async () => {
    const generator = createTransformersTextGenerator();
    await generator.initialize();

    const fragments = await collect(
      generator.generate("prompt", { maxTokens: 64, sampling: {} })
    );

    expect(fragments).toEqual(["• Hello", " world.\n", "END SUMMARY"]);
    expect(state.calls[0]).toMatchObject({ max_new_tokens: 64, do_sample: false });
  });

  it("interrupts inference when the consumer stops early", async () => {
    const generator = createTransformersTextGenerator();
    await generator.initialize();

    for await (const fragment of generator.generate("prompt", { maxTokens: 64, sampling: {} })) {
      expect(fragment).toBe("• Hello");
      break;
    }
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(state.emitted).toEqual(["• Hello"]);
  });

  it("ends the stream when the signal aborts", async () => {
    const generator = createTransformersTextGenerator();
    await generator.initialize();
    const controller = new AbortController();

    const fragments: string[] = [];
    for await (const fragment of generator.generate("prompt", {
      maxTokens: 64,
      sampling: {},
      signal: controller.signal,
    })) {
      fragments.push(fragment);
      controller.abort();
    }

    expect(fragments).toEqual(["• Hello"]);
  });

  it("surfaces a mid-stream failure after the fragments already decoded", async () => {
    state.failAt = 1;
    const generator = createTransformersTextGenerator();
    await generator.initialize();

    const fragments: string[] = [];
    const run = async (): Promise<void> => {
      for await (const fragment of generator.generate("prompt", { maxTokens: 64, sampling: {} })) {
        fragments.push(fragment);
      }
    };
    const error = await run().then(
      () => null,
      (failure: unknown) => failure
    );

    expect(error).toBeInstanceOf(GenerationSourceError);
    expect(error).toHaveProperty(
      "message",
      "Generation via transformers failed: Error: onnx session crashed"
    );
    expect(fragments).toEqual(["• Hello"]);
  });

  it("returns the whole completion from complete()", async () => {
    const generator = createTransformersTextGenerator();
    await generator.initialize();

    await expect(generator.complete("prompt", { maxTokens: 64, sampling: {} })).resolves.toBe(
      "• Hello world.\nEND SUMMARY"
    );
  });

  it("is not ready after dispose", async () => {
    const generator = createTransformersTextGenerator();
    await generator.initialize();
    await generator.dispose();

    expect(generator.isReady).toBe(false);
  });
});
