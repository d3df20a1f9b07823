/**
 * Probability redistribution: move a foreign-vocabulary distribution onto
 * the standard vocabulary by character overlap.
 *
 * Rows are next-token distributions. Row i of the model output predicts
 * foreign token i+1, so the engine first re-indexes to token-aligned rows
 * (aligned row i = distribution of foreign token i, with row 0 one-hot on
 * the token actually observed), redistributes those onto each standard
 * token, and shifts back at the end.
 */
import { Effect, Either } from "effect";
import {
  OffsetMisalignmentError,
  ShapeMismatchError,
  TranslationMapMissError,
  type MissPolicy,
  type OffsetSpan,
  type TensorData,
  type Tokenizer,
  rowWidth,
  rowCount,
  spanLength,
  spanOverlap,
} from "@tokbridge/core";
import { softmaxRows } from "@tokbridge/tensor";
import { checkTokenizerEquivalence } from "./equivalence.js";
import type { SplitMapCache } from "./split-cache.js";
import type { TranslationMap } from "./translation-map.js";

export interface TranslationElement {
  /** `[foreignLen, foreignVocab]` probabilities, or logits when `input` says so. */
  readonly probs: TensorData;
  readonly input?: "probs" | "logits";
  readonly foreignIds: Int32Array;
  /** Foreign spans already remapped to original text coordinates. */
  readonly foreignOffsets: readonly OffsetSpan[];
  readonly stdIds: Int32Array;
  readonly stdOffsets: readonly OffsetSpan[];
}

export interface TranslationContext {
  readonly foreign: Tokenizer;
  readonly std: Tokenizer;
  readonly splitCache: SplitMapCache;
  /** foreign -> standard */
  readonly toMap: TranslationMap;
  /** standard -> foreign */
  readonly fromMap: TranslationMap;
  readonly missPolicy: MissPolicy;
  readonly renormalize: boolean;
  readonly skipEquivalent: boolean;
  /** Known equivalence of the pair; checked on demand when absent. */
  readonly equivalent?: boolean;
}

export interface TranslationStats {
  /** Mass with no standard target, summed over positions. */
  readonly missedMass: number;
  /** Standard positions no foreign token overlapped. */
  readonly unalignedPositions: number;
  /** Non-finite or negative inputs replaced by zero. */
  readonly recoveredValues: number;
  /** Rows were copied straight through. */
  readonly fastPath: boolean;
}

export interface TranslationResult {
  /** `[stdLen, stdVocab]` */
  readonly probs: TensorData;
  readonly stats: TranslationStats;
}

export type TranslationElementError = OffsetMisalignmentError | TranslationMapMissError;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Copy as probabilities, zeroing anything non-finite or negative. */
function sanitize(element: TranslationElement): { data: Float64Array; recovered: number } {
  const rows = element.input === "logits" ? softmaxRows(element.probs) : element.probs;
  const data = new Float64Array(rows.data.length);
  let recovered = 0;
  for (let i = 0; i < data.length; i++) {
    const v = rows.data[i];
    if (Number.isFinite(v) && v >= 0) {
      data[i] = v;
    } else {
      recovered++;
    }
  }
  return { data, recovered };
}

function checkLengths(element: TranslationElement, index: number): Effect.Effect<void, OffsetMisalignmentError> {
  const m = rowCount(element.probs);
  const n = element.stdIds.length;
  const fail = (message: string) => Effect.fail(new OffsetMisalignmentError({ message, element: index }));

  if (element.foreignIds.length !== m) {
    return fail(`element ${index}: ${m} foreign rows but ${element.foreignIds.length} foreign ids`);
  }
  if (element.foreignOffsets.length !== m) {
    return fail(`element ${index}: ${m} foreign rows but ${element.foreignOffsets.length} foreign offsets`);
  }
  if (element.stdOffsets.length !== n) {
    return fail(`element ${index}: ${n} standard ids but ${element.stdOffsets.length} standard offsets`);
  }
  if (n > 0 && m === 0) {
    return fail(`element ${index}: no foreign tokens to translate ${n} standard tokens from`);
  }
  return Effect.void;
}

/** Foreign positions overlapping `span`, in order. */
function overlapping(foreignOffsets: readonly OffsetSpan[], span: OffsetSpan, from: number): number[] {
  const hits: number[] = [];
  const [s0, s1] = span;
  for (let i = from; i < foreignOffsets.length; i++) {
    const f = foreignOffsets[i];
    if (f[0] > s1) break;
    if (s0 === s1) {
      // A zero-width standard token (inserted special) matches a zero-width
      // foreign token at the same point.
      if (f[0] === s0 && f[1] === s0) return [i];
      continue;
    }
    if (spanOverlap(f, span) > 0) hits.push(i);
  }
  return hits;
}

/** The hits sit fully inside `span` and tile it exactly. */
function tiles(foreignOffsets: readonly OffsetSpan[], hits: readonly number[], span: OffsetSpan): boolean {
  if (hits.length < 2) return false;
  let pos = span[0];
  for (const i of hits) {
    const [a, b] = foreignOffsets[i];
    if (a !== pos || b <= a) return false;
    pos = b;
  }
  return pos === span[1];
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

/** Translate one batch element. `index` only labels errors. */
export function translateSequence(
  element: TranslationElement,
  ctx: TranslationContext,
  index = 0,
): Effect.Effect<TranslationResult, TranslationElementError> {
  return checkLengths(element, index).pipe(
    Effect.flatMap((): Effect.Effect<TranslationResult, TranslationMapMissError> => {
      const vf = ctx.foreign.vocabSize;
      const vs = ctx.std.vocabSize;
      const m = element.foreignIds.length;
      const n = element.stdIds.length;
      const { data: p, recovered } = sanitize(element);
      const out = new Float64Array(n * vs);

      const equivalent = ctx.skipEquivalent && m === n
        && (ctx.equivalent ?? checkTokenizerEquivalence(ctx.foreign, ctx.std));
      if (equivalent) {
        out.set(p);
        if (ctx.renormalize) renormalizeRows(out, vs);
        return Effect.succeed(result(out, n, vs, {
          missedMass: 0,
          unalignedPositions: 0,
          recoveredValues: recovered,
          fastPath: true,
        }));
      }

      const firstId = element.foreignIds[0];
      // Aligned row i, entry v.
      const aligned = (i: number, v: number): number =>
        i === 0 ? (v === firstId ? 1 : 0) : p[(i - 1) * vf + v];

      const rowMass = (i: number): number => {
        if (i === 0) return 1;
        let sum = 0;
        for (let v = 0; v < vf; v++) sum += p[(i - 1) * vf + v];
        return sum;
      };

      const stdHeadToForeign = ctx.fromMap.heads();
      let missedMass = 0;
      let unaligned = 0;
      let cursor = 0;

      // Apply the miss policy to one output row; returns the failure under "error".
      const settle = (row: number, miss: number): TranslationMapMissError | undefined => {
        missedMass += miss;
        if (miss <= 0 || ctx.missPolicy === "drop") return undefined;
        if (ctx.missPolicy === "error") {
          return new TranslationMapMissError({
            message: `element ${index}, position ${row}: ${miss.toExponential(3)} probability mass has no standard token`,
            position: row,
            missedMass: miss,
          });
        }
        const share = miss / vs;
        for (let u = 0; u < vs; u++) out[row * vs + u] += share;
        return undefined;
      };

      // Accumulate foreign row i (weighted) onto standard row `row` through `heads`.
      const project = (row: number, i: number, heads: Int32Array, weight: number): number => {
        let miss = 0;
        const base = row * vs;
        if (i === 0) {
          const h = heads[firstId];
          if (h < 0) return weight;
          out[base + h] += weight;
          return 0;
        }
        for (let v = 0; v < vf; v++) {
          const pv = aligned(i, v);
          if (pv === 0) continue;
          const h = heads[v];
          if (h < 0) miss += weight * pv;
          else out[base + h] += weight * pv;
        }
        return miss;
      };

      // Several foreign tokens spell one standard token: the first foreign
      // row picks the leading foreign id, later rows decide between standard
      // ids that share it.
      const manyToOne = (row: number, hits: readonly number[]): number => {
        const base = row * vs;
        const score = new Float64Array(vs);
        const groupSum = new Float64Array(vf);
        const groupSize = new Int32Array(vf);
        for (let u = 0; u < vs; u++) {
          const f0 = stdHeadToForeign[u];
          if (f0 < 0) continue;
          const seq = ctx.fromMap.targets(u);
          let s = 1;
          const depth = Math.min(hits.length, seq.length);
          for (let t = 1; t < depth; t++) s *= aligned(hits[t], seq[t]);
          score[u] = s;
          groupSum[f0] += s;
          groupSize[f0]++;
        }

        let miss = 0;
        for (let f0 = 0; f0 < vf; f0++) {
          const mass = aligned(hits[0], f0);
          if (mass > 0 && groupSize[f0] === 0) miss += mass;
        }
        for (let u = 0; u < vs; u++) {
          const f0 = stdHeadToForeign[u];
          if (f0 < 0) continue;
          const mass = aligned(hits[0], f0);
          if (mass === 0) continue;
          const share = groupSum[f0] > 0 ? score[u] / groupSum[f0] : 1 / groupSize[f0];
          out[base + u] += mass * share;
        }
        return miss;
      };

      for (let j = 1; j < n; j++) {
        const row = j - 1;
        const span = element.stdOffsets[j];
        while (cursor < m && element.foreignOffsets[cursor][1] < span[0]) cursor++;
        const hits = overlapping(element.foreignOffsets, span, cursor);

        let miss: number;
        if (hits.length === 0) {
          unaligned++;
          miss = 1;
        } else if (tiles(element.foreignOffsets, hits, span)) {
          miss = manyToOne(row, hits);
        } else {
          const width = spanLength(span);
          miss = 0;
          let covered = 0;
          let coveredMass = 0;
          for (const i of hits) {
            const f = element.foreignOffsets[i];
            const overlap = spanOverlap(f, span);
            const weight = width === 0 ? 1 : overlap / width;
            const cut = Math.max(0, span[0] - f[0]);
            const heads = cut === 0 ? ctx.toMap.heads() : ctx.splitCache.headsAt(cut);
            miss += project(row, i, heads, weight);
            covered += overlap;
            coveredMass += overlap * rowMass(i);
          }
          // Characters no foreign token spells carry the covering rows' mean mass.
          if (width > 0 && covered > 0 && covered < width) {
            miss += (1 - covered / width) * (coveredMass / covered);
          }
        }
        const err = settle(row, miss);
        if (err) return Effect.fail(err);
      }

      // The last model row predicts past the text; project it directly.
      if (n > 0) {
        const err = settle(n - 1, project(n - 1, m, ctx.toMap.heads(), 1));
        if (err) return Effect.fail(err);
      }

      if (ctx.renormalize) renormalizeRows(out, vs);
      return Effect.succeed(result(out, n, vs, {
        missedMass,
        unalignedPositions: unaligned,
        recoveredValues: recovered,
        fastPath: false,
      }));
    }),
  );
}

function renormalizeRows(data: Float64Array, width: number): void {
  for (let base = 0; base < data.length; base += width) {
    let sum = 0;
    for (let u = 0; u < width; u++) sum += data[base + u];
    if (sum > 0) for (let u = 0; u < width; u++) data[base + u] /= sum;
  }
}

function result(data: Float64Array, n: number, vs: number, stats: TranslationStats): TranslationResult {
  return { probs: { shape: [n, vs], dtype: "f64", data }, stats };
}

/**
 * Translate a batch. Structural problems with the batch as a whole (maps or
 * rows of the wrong vocabulary) fail the call; anything wrong with a single
 * element is returned in that element's slot.
 */
export function translateLogitsToProbsStd(
  batch: readonly TranslationElement[],
  ctx: TranslationContext,
): Effect.Effect<Either.Either<TranslationResult, TranslationElementError>[], ShapeMismatchError> {
  const vf = ctx.foreign.vocabSize;
  const vs = ctx.std.vocabSize;
  const mismatch = (message: string, expected: number, actual: number) =>
    Effect.fail(new ShapeMismatchError({ message, expected: [expected], actual: [actual] }));

  if (ctx.toMap.sourceVocabSize !== vf || ctx.toMap.targetVocabSize !== vs) {
    return mismatch("foreign -> standard map does not match the tokenizer pair", vf, ctx.toMap.sourceVocabSize);
  }
  if (ctx.fromMap.sourceVocabSize !== vs || ctx.fromMap.targetVocabSize !== vf) {
    return mismatch("standard -> foreign map does not match the tokenizer pair", vs, ctx.fromMap.sourceVocabSize);
  }
  const bad = batch.findIndex((el) => rowCount(el.probs) > 0 && rowWidth(el.probs) !== vf);
  if (bad >= 0) {
    return mismatch(`element ${bad}: rows are not over the foreign vocabulary`, vf, rowWidth(batch[bad].probs));
  }

  // Decide equivalence once for the whole batch.
  const shared: TranslationContext = ctx.skipEquivalent && ctx.equivalent === undefined
    ? { ...ctx, equivalent: checkTokenizerEquivalence(ctx.foreign, ctx.std) }
    : ctx;

  return Effect.forEach(batch, (el, i) => translateSequence(el, shared, i).pipe(Effect.either)).pipe(
    Effect.tap((results) => {
      let missed = 0;
      let failed = 0;
      for (const r of results) {
        if (Either.isRight(r)) missed += r.right.stats.missedMass;
        else failed++;
      }
      if (missed === 0 && failed === 0) return Effect.void;
      return Effect.logDebug("translation batch had misses").pipe(
        Effect.annotateLogs({
          elements: results.length,
          failed,
          missedMass: missed.toExponential(3),
        }),
      );
    }),
  );
}
