/**
 * @tokbridge/tensor -- row-wise tensor ops and the loss adapter.
 */
export {
  zeros,
  fromRows,
  row,
  toRows,
  softmaxRows,
  logSoftmaxRows,
  rowSums,
  topkIndices,
} from "./ops.js";

export {
  causalNll,
  causalCrossEntropy,
  pooledLoss,
  type LossOptions,
  type NllSum,
} from "./loss.js";

export type { TensorData, Shape } from "@tokbridge/core";
