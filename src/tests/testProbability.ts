import assert from "assert";
import { describe, it } from "node:test";
import { createProbabilityProvider, estimateProbability, type ProbabilityProvider } from "../core/probability";
import { readProbability } from "../utils/json";

function fixed(value: number): ProbabilityProvider {
  return { name: "fixed", estimate: async () => value };
}

describe("estimateProbability", () => {
  it("returns undefined without a provider", async () => {
    assert.strictEqual(await estimateProbability(null, "send money", 50), undefined);
  });

  it("passes through and clamps estimates", async () => {
    assert.strictEqual(await estimateProbability(fixed(0.8), "send money", 50), 0.8);
    assert.strictEqual(await estimateProbability(fixed(1.4), "send money", 50), 1);
    assert.strictEqual(await estimateProbability(fixed(Number.NaN), "send money", 50), undefined);
  });

  it("skips blank text", async () => {
    assert.strictEqual(await estimateProbability(fixed(0.8), "   ", 50), undefined);
  });

  it("turns provider errors into absence", async () => {
    const broken: ProbabilityProvider = {
      name: "broken",
      estimate: async () => {
        throw new Error("quota exceeded");
      }
    };
    assert.strictEqual(await estimateProbability(broken, "send money", 50), undefined);
  });

  it("gives up after the timeout", async () => {
    const hanging: ProbabilityProvider = {
      name: "hanging",
      estimate: () => new Promise<number>(() => undefined)
    };
    assert.strictEqual(await estimateProbability(hanging, "send money", 20), undefined);
  });
});

describe("createProbabilityProvider", () => {
  const base = { probabilityTimeoutMs: 500 };

  it("returns null when disabled or missing a key", () => {
    assert.strictEqual(createProbabilityProvider({ ...base, probabilityProvider: "none" }, {}), null);
    assert.strictEqual(createProbabilityProvider({ ...base, probabilityProvider: "openai" }, {}), null);
    assert.strictEqual(createProbabilityProvider({ ...base, probabilityProvider: "gemini" }, {}), null);
  });

  it("builds the selected provider", () => {
    const openai = createProbabilityProvider(
      { ...base, probabilityProvider: "openai" },
      { OPENAI_API_KEY: "test-secret" }
    );
    const gemini = createProbabilityProvider(
      { ...base, probabilityProvider: "gemini" },
      { GEMINI_API_KEY: "test-secret" }
    );
    assert.strictEqual(openai?.name, "openai");
    assert.strictEqual(gemini?.name, "gemini");
  });
});

describe("readProbability", () => {
  it("reads the probability out of model text", () => {
    assert.strictEqual(readProbability('Sure: {"probability": 0.72}'), 0.72);
    assert.strictEqual(readProbability('{"probability":"0.3"}'), 0.3);
    assert.strictEqual(readProbability("no json here"), null);
    assert.strictEqual(readProbability('{"score": 1}'), null);
  });
});
