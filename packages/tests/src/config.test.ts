import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect, Either } from "effect";
import {
  ConfigError,
  defaultTranslationConfig,
  loadTranslationConfig,
  mergeTranslationConfig,
  validateTranslationConfig,
} from "@tokbridge/core";

let dir = "";

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "tokbridge-config-"));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

function failure<A>(effect: Effect.Effect<A, ConfigError>): ConfigError {
  const result = Effect.runSync(Effect.either(effect));
  if (Either.isRight(result)) throw new Error("expected a ConfigError");
  return result.left;
}

describe("TranslationConfig", () => {
  it("defaults are valid", () => {
    expect(Effect.runSync(validateTranslationConfig(defaultTranslationConfig))).toEqual(defaultTranslationConfig);
    expect(defaultTranslationConfig.missPolicy).toBe("drop");
    expect(defaultTranslationConfig.renormalize).toBe(false);
  });

  it("coerces string overrides from CLI flags", () => {
    const merged = Effect.runSync(mergeTranslationConfig(defaultTranslationConfig, {
      topk: "64",
      renormalize: "true",
      skipEquivalent: "0",
      missPolicy: "floor",
      logLevel: "debug",
    }));
    expect(merged.topk).toBe(64);
    expect(merged.renormalize).toBe(true);
    expect(merged.skipEquivalent).toBe(false);
    expect(merged.missPolicy).toBe("floor");
    expect(merged.logLevel).toBe("debug");
    expect(merged.epsilon).toBe(1e-64);
  });

  it("ignores keys it does not know", () => {
    const merged = Effect.runSync(mergeTranslationConfig(defaultTranslationConfig, { std: "std.json" }));
    expect(merged).toEqual(defaultTranslationConfig);
  });

  it("rejects an unknown miss policy", () => {
    const err = failure(mergeTranslationConfig(defaultTranslationConfig, { missPolicy: "spread" }));
    expect(err.message).toBe('missPolicy must be one of drop, floor, error, got "spread"');
  });

  it("rejects a non-positive topk", () => {
    const err = failure(mergeTranslationConfig(defaultTranslationConfig, { topk: 0 }));
    expect(err.message).toBe("topk must be an integer >= 1, got 0");
  });

  it("rejects non-string probes", () => {
    const err = failure(mergeTranslationConfig(defaultTranslationConfig, { probes: [1, 2] }));
    expect(err.message).toBe("probes must be an array of strings");
  });

  it("loads defaults without a path", async () => {
    expect(await Effect.runPromise(loadTranslationConfig())).toEqual(defaultTranslationConfig);
  });

  it("merges a JSON file over the defaults", async () => {
    const path = join(dir, "translate.json");
    await writeFile(path, JSON.stringify({ topk: 16, missPolicy: "error", probes: ["hello"] }), "utf-8");
    const config = await Effect.runPromise(loadTranslationConfig(path));
    expect(config).toEqual({ ...defaultTranslationConfig, topk: 16, missPolicy: "error", probes: ["hello"] });
  });

  it("fails on invalid JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ topk: ", "utf-8");
    const result = await Effect.runPromise(Effect.either(loadTranslationConfig(path)));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(ConfigError);
      expect(result.left.message).toContain("invalid JSON");
    }
  });

  it("fails when the file holds an array", async () => {
    const path = join(dir, "array.json");
    await writeFile(path, "[]", "utf-8");
    const result = await Effect.runPromise(Effect.either(loadTranslationConfig(path)));
    expect(Either.isLeft(result)).toBe(true);
  });
});
