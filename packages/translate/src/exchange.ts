/**
 * Emulates one validator <-> server round trip: the server runs its model
 * under its own (foreign) tokenizer and ships top-k encoded distributions;
 * the validator decodes them, translates onto the standard vocabulary and
 * scores all three stages.
 */
import { Effect, Either } from "effect";
import {
  ShapeMismatchError,
  type InvalidKError,
  type LanguageModel,
  type TensorData,
  type Tokenizer,
} from "@tokbridge/core";
import { causalNll, pooledLoss, type NllSum } from "@tokbridge/tensor";
import { encodeLogitsTopK, decodeTopK } from "@tokbridge/codec";
import type { TranslationSession } from "./session.js";
import type { TranslationElementError, TranslationStats } from "./redistribute.js";

export interface ExchangeElement {
  readonly text: string;
  /** Top-k encoded foreign rows, `[foreignLen, 2k]`; absent when preparation failed. */
  readonly encoded?: TensorData;
  readonly stats?: TranslationStats;
  readonly error?: TranslationElementError;
}

export interface ExchangeReport {
  /** Cross-entropy of the model's own logits on the foreign tokens. */
  readonly originalLoss: number;
  /** Same, after the top-k round trip. */
  readonly encodedLoss: number;
  /** Cross-entropy of the translated distributions on the standard tokens. */
  readonly translatedLoss: number;
  readonly elements: readonly ExchangeElement[];
}

interface Served {
  readonly encoded: TensorData;
  readonly decoded: TensorData;
  readonly original: NllSum;
  readonly roundTrip: NllSum;
}

export function emulateExchange(
  session: TranslationSession,
  texts: readonly string[],
  foreign: Tokenizer,
  model: LanguageModel,
  topk: number = session.config.topk,
): Effect.Effect<ExchangeReport, ShapeMismatchError | InvalidKError> {
  if (model.vocabSize !== foreign.vocabSize) {
    return Effect.fail(new ShapeMismatchError({
      message: `model ${model.name} has vocab ${model.vocabSize}, foreign tokenizer ${foreign.vocabSize}`,
      expected: [foreign.vocabSize],
      actual: [model.vocabSize],
    }));
  }
  const k = Math.min(topk, foreign.vocabSize);
  const eps = session.config.epsilon;

  return session.prepare(texts, foreign).pipe(
    Effect.flatMap((prepared) =>
      Effect.forEach(prepared, (p): Effect.Effect<Served | null, InvalidKError | ShapeMismatchError> => {
        if (Either.isLeft(p)) return Effect.succeed(null);
        const ids = p.right.foreignIds;
        const logits = model.forward(ids);
        return encodeLogitsTopK(logits, k).pipe(
          Effect.flatMap((encoded) =>
            decodeTopK(encoded, foreign.vocabSize, k, eps).pipe(
              Effect.map((decoded): Served => ({
                encoded,
                decoded,
                original: causalNll(logits, ids, { input: "logits" }),
                roundTrip: causalNll(decoded, ids, { epsilon: eps }),
              })),
            ),
          ),
        );
      }).pipe(
        Effect.flatMap((served) => {
          const empty = (): TensorData => ({ shape: [0, foreign.vocabSize], dtype: "f64", data: new Float64Array(0) });
          const decoded = served.map((s) => (s ? s.decoded : empty()));
          return session.translate(prepared, decoded, foreign).pipe(
            Effect.map((translated): ExchangeReport => {
              const original: NllSum[] = [];
              const roundTrip: NllSum[] = [];
              const std: NllSum[] = [];
              const elements = translated.map((t, i): ExchangeElement => {
                const s = served[i];
                if (s) {
                  original.push(s.original);
                  roundTrip.push(s.roundTrip);
                }
                const p = prepared[i];
                if (Either.isLeft(t)) return { text: texts[i], encoded: s?.encoded, error: t.left };
                if (Either.isRight(p)) std.push(causalNll(t.right.probs, p.right.stdIds, { epsilon: eps }));
                return { text: texts[i], encoded: s?.encoded, stats: t.right.stats };
              });
              return {
                originalLoss: pooledLoss(original),
                encodedLoss: pooledLoss(roundTrip),
                translatedLoss: pooledLoss(std),
                elements,
              };
            }),
          );
        }),
      ),
    ),
    Effect.tap((report) =>
      Effect.logInfo("exchange scored").pipe(
        Effect.annotateLogs({
          foreign: foreign.name,
          original: report.originalLoss.toFixed(4),
          encoded: report.encodedLoss.toFixed(4),
          translated: report.translatedLoss.toFixed(4),
        }),
      ),
    ),
  );
}
