/**
 * Core types for the tokbridge system.
 */

// ── Dtype ──────────────────────────────────────────────────────────────────
export type Dtype = "f32" | "f64" | "i32";

export type NumericArray = Float32Array | Float64Array | Int32Array;

// ── Shape helpers ──────────────────────────────────────────────────────────
export type Shape = readonly number[];

export function shapeSize(shape: Shape): number {
  let s = 1;
  for (const d of shape) s *= d;
  return s;
}

// ── Tensor (lightweight handle) ────────────────────────────────────────────
export interface TensorData {
  readonly shape: Shape;
  readonly dtype: Dtype;
  readonly data: NumericArray;
}

/** Size of the last axis, i.e. the width of each row. */
export function rowWidth(t: TensorData): number {
  return t.shape.length === 0 ? 1 : t.shape[t.shape.length - 1];
}

/** Number of rows when the tensor is viewed as `[rows, lastAxis]`. */
export function rowCount(t: TensorData): number {
  const width = rowWidth(t);
  return width === 0 ? 0 : t.data.length / width;
}

// ── Offsets ────────────────────────────────────────────────────────────────

/** Half-open `[start, end)` span of UTF-16 code units in the source text. */
export type OffsetSpan = readonly [start: number, end: number];

export function spanLength(span: OffsetSpan): number {
  return span[1] - span[0];
}

/** Characters shared by two spans (0 when disjoint or touching). */
export function spanOverlap(a: OffsetSpan, b: OffsetSpan): number {
  return Math.max(0, Math.min(a[1], b[1]) - Math.max(a[0], b[0]));
}
