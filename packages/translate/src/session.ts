/**
 * TranslationSession: owns every cache used to translate onto one standard
 * tokenizer. Build one per validator run (or request scope) and dispose it
 * when done; nothing is shared between sessions.
 */
import { Effect, Either } from "effect";
import {
  ShapeMismatchError,
  StandardTokenizerService,
  TranslationConfigService,
  type OffsetMisalignmentError,
  type OffsetSpan,
  type TensorData,
  type Tokenizer,
  type TranslationConfig,
} from "@tokbridge/core";
import { checkTokenizerEquivalence } from "./equivalence.js";
import {
  translateSpecialTokenText,
  verifyAlignment,
  remapOffsets,
  type SpecialTokenAlignment,
} from "./special-tokens.js";
import { SplitMapCache } from "./split-cache.js";
import { TranslationMapCache } from "./translation-map.js";
import {
  translateLogitsToProbsStd,
  type TranslationElement,
  type TranslationElementError,
  type TranslationResult,
} from "./redistribute.js";

/** Both tokenizations of one text, in original text coordinates. */
export interface PreparedElement {
  readonly text: string;
  readonly alignment: SpecialTokenAlignment;
  readonly stdIds: Int32Array;
  readonly stdOffsets: readonly OffsetSpan[];
  readonly foreignIds: Int32Array;
  readonly foreignOffsets: readonly OffsetSpan[];
}

export type PreparedBatch = readonly Either.Either<PreparedElement, OffsetMisalignmentError>[];

export class TranslationSession {
  private readonly _splitCaches = new Map<Tokenizer, SplitMapCache>();
  private readonly _equivalent = new Map<Tokenizer, boolean>();

  constructor(
    readonly std: Tokenizer,
    readonly config: TranslationConfig,
    readonly maps: TranslationMapCache = new TranslationMapCache(),
  ) {}

  /** Memoised equivalence of `foreign` with the standard tokenizer. */
  isEquivalent(foreign: Tokenizer): boolean {
    const known = this._equivalent.get(foreign);
    if (known !== undefined) return known;
    const eq = checkTokenizerEquivalence(foreign, this.std, this.config.probes);
    this._equivalent.set(foreign, eq);
    return eq;
  }

  splitCacheFor(foreign: Tokenizer): SplitMapCache {
    let cache = this._splitCaches.get(foreign);
    if (!cache) {
      cache = new SplitMapCache(foreign, this.std, this.config.splitCacheLimit);
      this._splitCaches.set(foreign, cache);
    }
    return cache;
  }

  /**
   * Rewrite special tokens for `foreign`, tokenize both ways and bring the
   * foreign offsets back to original coordinates. A text whose rewrite is
   * inconsistent fails alone.
   */
  prepare(texts: readonly string[], foreign: Tokenizer): Effect.Effect<PreparedBatch> {
    return Effect.forEach(texts, (text, i) => {
      const alignment = translateSpecialTokenText(text, this.std, foreign);
      return verifyAlignment(text, alignment, i).pipe(
        Effect.map((checked): PreparedElement => {
          const std = this.std.encodeWithOffsets(text);
          const enc = foreign.encodeWithOffsets(checked.text);
          return {
            text,
            alignment: checked,
            stdIds: std.ids,
            stdOffsets: std.offsets,
            foreignIds: enc.ids,
            foreignOffsets: remapOffsets(enc.offsets, checked.corrections),
          };
        }),
        Effect.either,
      );
    });
  }

  /**
   * Translate per-element foreign distributions (`[foreignLen, foreignVocab]`)
   * onto the standard vocabulary. Elements that failed to prepare keep their
   * error.
   */
  translate(
    prepared: PreparedBatch,
    probs: readonly TensorData[],
    foreign: Tokenizer,
    input: "probs" | "logits" = "probs",
  ): Effect.Effect<Either.Either<TranslationResult, TranslationElementError>[], ShapeMismatchError> {
    if (prepared.length !== probs.length) {
      return Effect.fail(new ShapeMismatchError({
        message: `batch has ${prepared.length} texts but ${probs.length} distributions`,
        expected: [prepared.length],
        actual: [probs.length],
      }));
    }

    const ready: TranslationElement[] = [];
    prepared.forEach((p, i) => {
      if (Either.isLeft(p)) return;
      ready.push({
        probs: probs[i],
        input,
        foreignIds: p.right.foreignIds,
        foreignOffsets: p.right.foreignOffsets,
        stdIds: p.right.stdIds,
        stdOffsets: p.right.stdOffsets,
      });
    });

    return Effect.all([this.maps.get(foreign, this.std), this.maps.get(this.std, foreign)]).pipe(
      Effect.flatMap(([toMap, fromMap]) =>
        translateLogitsToProbsStd(ready, {
          foreign,
          std: this.std,
          splitCache: this.splitCacheFor(foreign),
          toMap,
          fromMap,
          missPolicy: this.config.missPolicy,
          renormalize: this.config.renormalize,
          skipEquivalent: this.config.skipEquivalent,
          equivalent: this.config.skipEquivalent ? this.isEquivalent(foreign) : false,
        }),
      ),
      Effect.map((translated) => {
        // `translated` holds the prepared elements in batch order.
        let next = 0;
        return prepared.map((p): Either.Either<TranslationResult, TranslationElementError> =>
          Either.isLeft(p) ? Either.left(p.left) : translated[next++],
        );
      }),
    );
  }

  /** Drop every cache this session holds. */
  dispose(): void {
    for (const cache of this._splitCaches.values()) cache.clear();
    this._splitCaches.clear();
    this._equivalent.clear();
    this.maps.clear();
  }
}

/** Build a session from the standard tokenizer and config services. */
export const makeTranslationSession: Effect.Effect<
  TranslationSession,
  never,
  StandardTokenizerService | TranslationConfigService
> = Effect.all([StandardTokenizerService, TranslationConfigService]).pipe(
  Effect.map(([std, config]) => new TranslationSession(std, config)),
);
