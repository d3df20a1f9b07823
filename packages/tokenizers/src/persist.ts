/**
 * Persistence helpers for tokenizer artifacts.
 *
 * Saves and loads `TokenizerArtifacts` as JSON files using node:fs/promises,
 * with every I/O operation wrapped in `Effect.tryPromise` so callers get
 * typed `TokenizerError` failures instead of raw exceptions.
 */
import { readFile, writeFile, mkdir } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import {
  SPECIAL_TOKEN_ROLES,
  TokenizerError,
  type SpecialToken,
  type SpecialTokenRole,
  type TokenizerArtifacts,
} from "@tokbridge/core";

/**
 * Serialise tokenizer artifacts to a JSON file, creating parent directories
 * if they don't already exist.
 */
export function saveArtifacts(
  path: string,
  artifacts: TokenizerArtifacts,
): Effect.Effect<void, TokenizerError> {
  return Effect.tryPromise({
    try: async () => {
      await mkdir(dirname(path), { recursive: true });

      const json = JSON.stringify(
        {
          type: artifacts.type,
          vocabSize: artifacts.vocabSize,
          vocab: artifacts.vocab,
          ...(artifacts.merges ? { merges: artifacts.merges } : {}),
          ...(artifacts.specialTokens ? { specialTokens: artifacts.specialTokens } : {}),
        },
        null,
        2,
      );

      await writeFile(path, json, "utf-8");
    },
    catch: (cause) =>
      new TokenizerError({
        message: `Failed to save tokenizer artifacts to "${path}"`,
        cause,
      }),
  });
}

function isRole(v: unknown): v is SpecialTokenRole {
  return typeof v === "string" && SPECIAL_TOKEN_ROLES.some((r) => r === v);
}

function parseSpecial(v: unknown): SpecialToken {
  if (typeof v !== "object" || v === null) throw new Error("Invalid special token entry");
  const role: unknown = Reflect.get(v, "role");
  const id: unknown = Reflect.get(v, "id");
  const text: unknown = Reflect.get(v, "text");
  if (!isRole(role) || typeof id !== "number" || typeof text !== "string") {
    throw new Error(`Invalid special token entry: ${JSON.stringify(v)}`);
  }
  return { role, id, text };
}

function parseMerge(v: unknown): readonly [number, number] {
  if (!Array.isArray(v) || v.length !== 2 || typeof v[0] !== "number" || typeof v[1] !== "number") {
    throw new Error(`Invalid merge entry: ${JSON.stringify(v)}`);
  }
  return [v[0], v[1]];
}

/**
 * Validate a parsed JSON payload as `TokenizerArtifacts`.
 */
export function parseArtifacts(data: unknown): TokenizerArtifacts {
  if (typeof data !== "object" || data === null) {
    throw new Error("Artifacts must be a JSON object");
  }
  const type: unknown = Reflect.get(data, "type");
  const vocabSize: unknown = Reflect.get(data, "vocabSize");
  const vocab: unknown = Reflect.get(data, "vocab");
  const merges: unknown = Reflect.get(data, "merges");
  const specials: unknown = Reflect.get(data, "specialTokens");

  if (typeof type !== "string") {
    throw new Error("Missing or invalid 'type' field");
  }
  if (typeof vocabSize !== "number") {
    throw new Error("Missing or invalid 'vocabSize' field");
  }
  if (!Array.isArray(vocab) || !vocab.every((v): v is string => typeof v === "string")) {
    throw new Error("Missing or invalid 'vocab' field");
  }
  if (vocab.length !== vocabSize) {
    throw new Error(`'vocabSize' is ${vocabSize} but 'vocab' has ${vocab.length} entries`);
  }

  return {
    type,
    vocabSize,
    vocab,
    ...(Array.isArray(merges) ? { merges: merges.map(parseMerge) } : {}),
    ...(Array.isArray(specials) ? { specialTokens: specials.map(parseSpecial) } : {}),
  };
}

/** Load tokenizer artifacts from a JSON file. */
export function loadArtifacts(
  path: string,
): Effect.Effect<TokenizerArtifacts, TokenizerError> {
  return Effect.tryPromise({
    try: async () => parseArtifacts(JSON.parse(await readFile(path, "utf-8"))),
    catch: (cause) =>
      new TokenizerError({
        message: `Failed to load tokenizer artifacts from "${path}"`,
        cause,
      }),
  });
}
