/**
 * @tokbridge/tokenizers -- reference tokenizers with offsets and special
 * tokens, persistence helpers, and a registry keyed by artifact type.
 */
import { Effect } from "effect";
import {
  Registry,
  TokenizerError,
  type TrainableTokenizer,
  type TokenizerArtifacts,
} from "@tokbridge/core";
import { CharTokenizer } from "./char.js";
import { BpeTokenizer, type BpeOptions } from "./bpe.js";
import { WordTokenizer } from "./word.js";
import { loadArtifacts } from "./persist.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export { CharTokenizer } from "./char.js";
export { BpeTokenizer, type BpeOptions } from "./bpe.js";
export { WordTokenizer } from "./word.js";
export { saveArtifacts, loadArtifacts, parseArtifacts } from "./persist.js";
export {
  splitSpecialSegments,
  type SpecialTokenSpec,
  type TokenizerOptions,
  type TextSegment,
} from "./special.js";

// ── Tokenizer registry ────────────────────────────────────────────────────

/**
 * Tokenizer registry keyed by artifact `type`:
 * - `"char"` -- character-level tokenizer
 * - `"bpe"`  -- byte-pair encoding tokenizer (default vocab size 2000)
 * - `"word"` -- whitespace/word run tokenizer
 */
export const tokenizerRegistry = new Registry<TrainableTokenizer, [options?: BpeOptions]>("tokenizer");

tokenizerRegistry.register("char", (options) => new CharTokenizer(options));
tokenizerRegistry.register("bpe", (options) => new BpeTokenizer(options));
tokenizerRegistry.register("word", (options) => new WordTokenizer(options));

/** Instantiate the tokenizer an artifact describes and load it. */
export function restoreTokenizer(
  artifacts: TokenizerArtifacts,
): Effect.Effect<TrainableTokenizer, TokenizerError> {
  return tokenizerRegistry.resolve(artifacts.type).pipe(
    Effect.mapError((e) => new TokenizerError({ message: e.message, cause: e })),
    Effect.tap((tok) => Effect.sync(() => tok.loadArtifacts(artifacts))),
  );
}

/** Load artifacts from disk and restore the tokenizer they describe. */
export function loadTokenizer(path: string): Effect.Effect<TrainableTokenizer, TokenizerError> {
  return loadArtifacts(path).pipe(Effect.flatMap(restoreTokenizer));
}
