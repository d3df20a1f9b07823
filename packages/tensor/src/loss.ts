/**
 * Causal language-model loss over per-position distributions.
 *
 * Row i predicts token i+1, so the last row has no target and the first
 * token is never scored.
 */
import { type TensorData, rowWidth, rowCount } from "@tokbridge/core";
import { logSoftmaxRows } from "./ops.js";

export interface LossOptions {
  /** Whether rows hold probabilities (default) or unnormalised logits. */
  readonly input?: "probs" | "logits";
  /** Added to probabilities before the log. */
  readonly epsilon?: number;
}

export interface NllSum {
  readonly sum: number;
  readonly count: number;
}

/** Summed negative log-likelihood, for pooling several sequences. */
export function causalNll(rows: TensorData, targets: ArrayLike<number>, options: LossOptions = {}): NllSum {
  const n = rowCount(rows);
  if (targets.length !== n) {
    throw new Error(`causalNll: ${n} rows but ${targets.length} targets`);
  }
  const w = rowWidth(rows);
  const eps = options.epsilon ?? 1e-64;
  const logProbs = options.input === "logits" ? logSoftmaxRows(rows) : null;

  let sum = 0;
  for (let i = 0; i < n - 1; i++) {
    const idx = i * w + targets[i + 1];
    sum -= logProbs ? logProbs.data[idx] : Math.log(rows.data[idx] + eps);
  }
  return { sum, count: Math.max(0, n - 1) };
}

/** Mean next-token cross-entropy of one sequence. */
export function causalCrossEntropy(rows: TensorData, targets: ArrayLike<number>, options: LossOptions = {}): number {
  const { sum, count } = causalNll(rows, targets, options);
  return count === 0 ? 0 : sum / count;
}

/** Pool several sequences' losses the way a flattened batch would. */
export function pooledLoss(parts: readonly NllSum[]): number {
  let sum = 0;
  let count = 0;
  for (const p of parts) {
    sum += p.sum;
    count += p.count;
  }
  return count === 0 ? 0 : sum / count;
}
