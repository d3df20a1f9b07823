/**
 * Row-wise tensor ops. Every tensor here is treated as `[rows, lastAxis]`:
 * distributions, logits and encodings all live on the last axis.
 *
 * Straightforward loops over typed arrays; float64 throughout so codec
 * round trips stay exact.
 */
import {
  type TensorData,
  type Shape,
  shapeSize,
  rowWidth,
  rowCount,
} from "@tokbridge/core";

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export function zeros(shape: Shape): TensorData {
  return { shape: [...shape], dtype: "f64", data: new Float64Array(shapeSize(shape)) };
}

/** Build a `[rows.length, width]` f64 tensor from nested arrays. */
export function fromRows(rows: readonly ArrayLike<number>[], width?: number): TensorData {
  const w = width ?? (rows.length > 0 ? rows[0].length : 0);
  const data = new Float64Array(rows.length * w);
  for (let i = 0; i < rows.length; i++) {
    const row = rows[i];
    if (row.length !== w) {
      throw new Error(`fromRows: row ${i} has width ${row.length}, expected ${w}`);
    }
    for (let j = 0; j < w; j++) data[i * w + j] = row[j];
  }
  return { shape: [rows.length, w], dtype: "f64", data };
}

/** Copy of row `i` as a float64 array. */
export function row(t: TensorData, i: number): Float64Array {
  const w = rowWidth(t);
  return Float64Array.from(t.data.subarray(i * w, (i + 1) * w));
}

/** Nested-array view, mostly for JSON output and assertions. */
export function toRows(t: TensorData): number[][] {
  const out: number[][] = [];
  const n = rowCount(t);
  for (let i = 0; i < n; i++) out.push(Array.from(row(t, i)));
  return out;
}

// ---------------------------------------------------------------------------
// Normalisation
// ---------------------------------------------------------------------------

export function softmaxRows(a: TensorData): TensorData {
  const w = rowWidth(a);
  const n = rowCount(a);
  const out = new Float64Array(a.data.length);

  for (let r = 0; r < n; r++) {
    const base = r * w;

    // Find max for numerical stability
    let max = -Infinity;
    for (let j = 0; j < w; j++) {
      const v = a.data[base + j];
      if (v > max) max = v;
    }

    let sumExp = 0;
    for (let j = 0; j < w; j++) {
      const e = Math.exp(a.data[base + j] - max);
      out[base + j] = e;
      sumExp += e;
    }

    for (let j = 0; j < w; j++) out[base + j] /= sumExp;
  }

  return { shape: [...a.shape], dtype: "f64", data: out };
}

export function logSoftmaxRows(a: TensorData): TensorData {
  // log(softmax(x)) = x - max - log(sum(exp(x - max)))
  const w = rowWidth(a);
  const n = rowCount(a);
  const out = new Float64Array(a.data.length);

  for (let r = 0; r < n; r++) {
    const base = r * w;
    let max = -Infinity;
    for (let j = 0; j < w; j++) {
      const v = a.data[base + j];
      if (v > max) max = v;
    }
    let sumExp = 0;
    for (let j = 0; j < w; j++) sumExp += Math.exp(a.data[base + j] - max);
    const logSumExp = max + Math.log(sumExp);
    for (let j = 0; j < w; j++) out[base + j] = a.data[base + j] - logSumExp;
  }

  return { shape: [...a.shape], dtype: "f64", data: out };
}

/** Sum of every row, shape `[rows]`. */
export function rowSums(a: TensorData): Float64Array {
  const w = rowWidth(a);
  const n = rowCount(a);
  const out = new Float64Array(n);
  for (let r = 0; r < n; r++) {
    let s = 0;
    for (let j = 0; j < w; j++) s += a.data[r * w + j];
    out[r] = s;
  }
  return out;
}

// ---------------------------------------------------------------------------
// Selection
// ---------------------------------------------------------------------------

/**
 * Indices of the k largest entries of `values`, largest first. Ties break
 * towards the lower index so the result is deterministic.
 */
export function topkIndices(values: ArrayLike<number>, k: number): Int32Array {
  const order = new Int32Array(values.length);
  for (let j = 0; j < order.length; j++) order[j] = j;
  order.sort((x, y) => {
    const d = values[y] - values[x];
    return d !== 0 ? d : x - y;
  });
  return order.slice(0, k);
}
