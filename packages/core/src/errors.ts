/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class TokenizerError extends Data.TaggedError("TokenizerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** k is not an integer in `[1, vocabSize]`. */
export class InvalidKError extends Data.TaggedError("InvalidKError")<{
  readonly message: string;
  readonly k: number;
  readonly vocabSize: number;
}> {}

/** Structurally invalid input: mismatched batch sizes, widths or vocabularies. */
export class ShapeMismatchError extends Data.TaggedError("ShapeMismatchError")<{
  readonly message: string;
  readonly expected?: readonly number[];
  readonly actual?: readonly number[];
}> {}

/** Probability mass with no target id, raised only under the "error" miss policy. */
export class TranslationMapMissError extends Data.TaggedError("TranslationMapMissError")<{
  readonly message: string;
  readonly position: number;
  readonly missedMass: number;
}> {}

/** Rewritten text or token offsets disagree with the correction table. */
export class OffsetMisalignmentError extends Data.TaggedError("OffsetMisalignmentError")<{
  readonly message: string;
  readonly element?: number;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
