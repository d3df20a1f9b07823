/**
 * Capability interfaces (ports). The translation core only ever sees these
 * shapes, never a concrete tokenizer library or model runtime.
 */
import { Context, Effect } from "effect";
import type { TokenizerError } from "./errors.js";
import type { OffsetSpan, TensorData } from "./types.js";
import type { TranslationConfig } from "./config.js";

// ── Tokenizer ──────────────────────────────────────────────────────────────
export type SpecialTokenRole = "bos" | "eos" | "unk" | "pad" | "sep" | "cls" | "mask";

export const SPECIAL_TOKEN_ROLES: readonly SpecialTokenRole[] = [
  "bos", "eos", "unk", "pad", "sep", "cls", "mask",
];

export interface SpecialToken {
  readonly role: SpecialTokenRole;
  readonly id: number;
  readonly text: string;
}

export interface Encoding {
  readonly ids: Int32Array;
  /** One span per id, in source text coordinates. */
  readonly offsets: readonly OffsetSpan[];
}

export interface Tokenizer {
  readonly name: string;
  readonly vocabSize: number;
  readonly specialTokens: readonly SpecialToken[];
  encode(text: string): Int32Array;
  encodeWithOffsets(text: string): Encoding;
  decode(tokens: ArrayLike<number>): string;
}

export interface TokenizerArtifacts {
  readonly type: string;
  readonly vocabSize: number;
  readonly vocab: readonly string[];
  readonly merges?: readonly (readonly [number, number])[];
  readonly specialTokens?: readonly SpecialToken[];
}

/** A tokenizer that can learn its vocabulary from a corpus. */
export interface TrainableTokenizer extends Tokenizer {
  build(input: string): Effect.Effect<TokenizerArtifacts, TokenizerError>;
  loadArtifacts(artifacts: TokenizerArtifacts): void;
}

// ── Model ──────────────────────────────────────────────────────────────────
export interface LanguageModel {
  readonly name: string;
  readonly vocabSize: number;
  /** Next-token logits, shape `[ids.length, vocabSize]`. */
  forward(ids: Int32Array): TensorData;
}

// ── Services ───────────────────────────────────────────────────────────────

/** The fixed reference tokenizer every translation targets. */
export class StandardTokenizerService extends Context.Tag("StandardTokenizerService")<
  StandardTokenizerService,
  Tokenizer
>() {}

export class TranslationConfigService extends Context.Tag("TranslationConfigService")<
  TranslationConfigService,
  TranslationConfig
>() {}
