/**
 * Top-k distribution codec.
 *
 * A `[..., vocab]` probability tensor is shipped as `[..., 2k]`: the k largest
 * probabilities (descending) followed by their ids stored as floats. Decoding
 * spreads the remaining mass uniformly over every id not in the top k.
 */
import { Effect } from "effect";
import {
  InvalidKError,
  ShapeMismatchError,
  type TensorData,
  rowWidth,
  rowCount,
} from "@tokbridge/core";
import { softmaxRows, topkIndices } from "@tokbridge/tensor";

/** Default floor for the remainder mass; also added before taking logs. */
export const EPSILON = 1e-64;

function checkK(k: number, vocabSize: number): Effect.Effect<void, InvalidKError> {
  if (!Number.isInteger(k) || k < 1 || k > vocabSize) {
    return Effect.fail(new InvalidKError({
      message: `k must be an integer in [1, ${vocabSize}], got ${k}`,
      k,
      vocabSize,
    }));
  }
  return Effect.void;
}

/**
 * Keep the top-k entries of every row. Ties keep the lower id first.
 */
export function encodeTopK(probs: TensorData, k: number): Effect.Effect<TensorData, InvalidKError> {
  const vocab = rowWidth(probs);
  return checkK(k, vocab).pipe(
    Effect.map(() => {
      const rows = rowCount(probs);
      const out = new Float64Array(rows * 2 * k);
      for (let r = 0; r < rows; r++) {
        const values = probs.data.subarray(r * vocab, (r + 1) * vocab);
        const top = topkIndices(values, k);
        const base = r * 2 * k;
        for (let j = 0; j < k; j++) {
          out[base + j] = values[top[j]];
          out[base + k + j] = top[j];
        }
      }
      const shape = [...probs.shape.slice(0, -1), 2 * k];
      return { shape, dtype: "f64", data: out } satisfies TensorData;
    }),
  );
}

/** Softmax unnormalised logits, then top-k encode. */
export function encodeLogitsTopK(logits: TensorData, k: number): Effect.Effect<TensorData, InvalidKError> {
  return encodeTopK(softmaxRows(logits), k);
}

interface DecodedRow {
  readonly floor: number;
  readonly values: Float64Array;
  readonly ids: Int32Array;
}

function splitRows(
  encoded: TensorData,
  vocabSize: number,
  k: number,
  epsilon: number,
): Effect.Effect<DecodedRow[], InvalidKError | ShapeMismatchError> {
  return checkK(k, vocabSize).pipe(
    Effect.flatMap((): Effect.Effect<DecodedRow[], ShapeMismatchError> => {
      const width = rowWidth(encoded);
      if (width !== 2 * k) {
        return Effect.fail(new ShapeMismatchError({
          message: `encoded rows must have width 2k = ${2 * k}, got ${width}`,
          expected: [2 * k],
          actual: [width],
        }));
      }

      const rows: DecodedRow[] = [];
      const n = rowCount(encoded);
      for (let r = 0; r < n; r++) {
        const base = r * 2 * k;
        const values = new Float64Array(k);
        const ids = new Int32Array(k);
        let topkMass = 0;
        for (let j = 0; j < k; j++) {
          const id = encoded.data[base + k + j];
          if (!Number.isInteger(id) || id < 0 || id >= vocabSize) {
            return Effect.fail(new ShapeMismatchError({
              message: `row ${r}: index ${id} is not a token id below ${vocabSize}`,
            }));
          }
          values[j] = encoded.data[base + j];
          ids[j] = id;
          topkMass += values[j];
        }
        // Float drift can push the top-k mass past 1; the floor stays positive.
        const remainder = Math.min(1, Math.max(epsilon, 1 - topkMass));
        const floor = vocabSize === k ? 0 : remainder / (vocabSize - k);
        rows.push({ floor, values, ids });
      }
      return Effect.succeed(rows);
    }),
  );
}

/**
 * Rebuild a full `[..., vocabSize]` distribution. Top-k entries are written
 * exactly (not added to the floor); the remainder mass is at least `epsilon`.
 */
export function decodeTopK(
  encoded: TensorData,
  vocabSize: number,
  k: number,
  epsilon: number = EPSILON,
): Effect.Effect<TensorData, InvalidKError | ShapeMismatchError> {
  return splitRows(encoded, vocabSize, k, epsilon).pipe(
    Effect.map((rows) => {
      const out = new Float64Array(rows.length * vocabSize);
      rows.forEach((row, r) => {
        const base = r * vocabSize;
        out.fill(row.floor, base, base + vocabSize);
        for (let j = 0; j < k; j++) out[base + row.ids[j]] = row.values[j];
      });
      const shape = [...encoded.shape.slice(0, -1), vocabSize];
      return { shape, dtype: "f64", data: out } satisfies TensorData;
    }),
  );
}

/**
 * Same reconstruction in log space: `log(floor)` everywhere and
 * `log(value + epsilon)` on the top-k ids, ready for a logits-based loss.
 */
export function decodeTopKLogits(
  encoded: TensorData,
  vocabSize: number,
  k: number,
  epsilon: number = EPSILON,
): Effect.Effect<TensorData, InvalidKError | ShapeMismatchError> {
  return splitRows(encoded, vocabSize, k, epsilon).pipe(
    Effect.map((rows) => {
      const out = new Float64Array(rows.length * vocabSize);
      rows.forEach((row, r) => {
        const base = r * vocabSize;
        out.fill(Math.log(row.floor), base, base + vocabSize);
        for (let j = 0; j < k; j++) out[base + row.ids[j]] = Math.log(row.values[j] + epsilon);
      });
      const shape = [...encoded.shape.slice(0, -1), vocabSize];
      return { shape, dtype: "f64", data: out } satisfies TensorData;
    }),
  );
}
