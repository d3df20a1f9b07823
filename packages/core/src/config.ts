/**
 * TranslationConfig: defaults, validation and loading from JSON.
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { ConfigError } from "./errors.js";

/**
 * What happens to probability mass that has no target id in the standard
 * vocabulary (or to a standard position no foreign token overlaps).
 *
 * - `drop`  -- the mass is discarded; rows may sum to less than 1
 * - `floor` -- the mass is spread uniformly over the standard vocabulary
 * - `error` -- the batch element fails with `TranslationMapMissError`
 */
export type MissPolicy = "drop" | "floor" | "error";

export type LogLevelName = "debug" | "info" | "warn" | "error";

export interface TranslationConfig {
  /** Entries kept per position by the top-k codec. */
  readonly topk: number;
  /** Added before every log and used as the remainder-mass floor. */
  readonly epsilon: number;
  readonly missPolicy: MissPolicy;
  /** Divide each translated row by its sum. */
  readonly renormalize: boolean;
  /** Copy rows straight through when both tokenizers are equivalent. */
  readonly skipEquivalent: boolean;
  /** Max memoised spans per split cache; 0 = unbounded. */
  readonly splitCacheLimit: number;
  /** Extra probe strings for the equivalence check. */
  readonly probes: readonly string[];
  readonly logLevel: LogLevelName;
}

export const defaultTranslationConfig: TranslationConfig = {
  topk: 128,
  epsilon: 1e-64,
  missPolicy: "drop",
  renormalize: false,
  skipEquivalent: true,
  splitCacheLimit: 0,
  probes: [],
  logLevel: "info",
};

const MISS_POLICIES: readonly string[] = ["drop", "floor", "error"];
const LOG_LEVELS: readonly string[] = ["debug", "info", "warn", "error"];

/** Validate a TranslationConfig, failing with the first offending field. */
export function validateTranslationConfig(
  config: TranslationConfig,
): Effect.Effect<TranslationConfig, ConfigError> {
  const fail = (message: string) => Effect.fail(new ConfigError({ message }));

  if (!Number.isInteger(config.topk) || config.topk < 1) {
    return fail(`topk must be an integer >= 1, got ${config.topk}`);
  }
  if (!(config.epsilon > 0) || config.epsilon >= 1) {
    return fail(`epsilon must be in (0,1), got ${config.epsilon}`);
  }
  if (!MISS_POLICIES.includes(config.missPolicy)) {
    return fail(`missPolicy must be one of ${MISS_POLICIES.join(", ")}, got "${config.missPolicy}"`);
  }
  if (!Number.isInteger(config.splitCacheLimit) || config.splitCacheLimit < 0) {
    return fail(`splitCacheLimit must be an integer >= 0, got ${config.splitCacheLimit}`);
  }
  if (!isStringArray(config.probes)) {
    return fail("probes must be an array of strings");
  }
  if (!LOG_LEVELS.includes(config.logLevel)) {
    return fail(`logLevel must be one of ${LOG_LEVELS.join(", ")}, got "${config.logLevel}"`);
  }
  return Effect.succeed(config);
}

function isMissPolicy(v: unknown): v is MissPolicy {
  return typeof v === "string" && MISS_POLICIES.includes(v);
}

function isLogLevel(v: unknown): v is LogLevelName {
  return typeof v === "string" && LOG_LEVELS.includes(v);
}

function isStringArray(v: unknown): v is readonly string[] {
  return Array.isArray(v) && v.every((p) => typeof p === "string");
}

/**
 * Merge loosely typed overrides (parsed JSON, CLI flags) over a base config.
 * Strings are coerced for numeric and boolean fields so `--topk=64` works.
 */
export function mergeTranslationConfig(
  base: TranslationConfig,
  overrides: Readonly<Record<string, unknown>>,
): Effect.Effect<TranslationConfig, ConfigError> {
  const num = (key: keyof TranslationConfig, fallback: number): number => {
    const v = overrides[key];
    if (v === undefined) return fallback;
    return typeof v === "number" ? v : Number(v);
  };
  const bool = (key: keyof TranslationConfig, fallback: boolean): boolean => {
    const v = overrides[key];
    if (v === undefined) return fallback;
    return typeof v === "boolean" ? v : v === "true" || v === "1";
  };

  const missPolicy = overrides.missPolicy ?? base.missPolicy;
  const logLevel = overrides.logLevel ?? base.logLevel;
  const probes = overrides.probes ?? base.probes;

  if (!isMissPolicy(missPolicy)) {
    return Effect.fail(new ConfigError({ message: `missPolicy must be one of ${MISS_POLICIES.join(", ")}, got "${String(missPolicy)}"` }));
  }
  if (!isLogLevel(logLevel)) {
    return Effect.fail(new ConfigError({ message: `logLevel must be one of ${LOG_LEVELS.join(", ")}, got "${String(logLevel)}"` }));
  }
  if (!isStringArray(probes)) {
    return Effect.fail(new ConfigError({ message: "probes must be an array of strings" }));
  }

  return validateTranslationConfig({
    topk: num("topk", base.topk),
    epsilon: num("epsilon", base.epsilon),
    missPolicy,
    renormalize: bool("renormalize", base.renormalize),
    skipEquivalent: bool("skipEquivalent", base.skipEquivalent),
    splitCacheLimit: num("splitCacheLimit", base.splitCacheLimit),
    probes,
    logLevel,
  });
}

/** Load a TranslationConfig from a JSON file path, merging with defaults. */
export function loadTranslationConfig(
  path?: string,
): Effect.Effect<TranslationConfig, ConfigError> {
  if (!path) return Effect.succeed(defaultTranslationConfig);

  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) => new ConfigError({ message: `Failed to read translation config at ${path}`, cause }),
  }).pipe(
    Effect.flatMap((raw) =>
      Effect.try({
        try: (): unknown => JSON.parse(raw),
        catch: (cause) => new ConfigError({ message: `Failed to parse translation config at ${path}: invalid JSON`, cause }),
      }),
    ),
    Effect.flatMap((parsed) =>
      typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)
        ? mergeTranslationConfig(defaultTranslationConfig, Object.fromEntries(Object.entries(parsed)))
        : Effect.fail(new ConfigError({ message: `Translation config at ${path} must be a JSON object` })),
    ),
  );
}
