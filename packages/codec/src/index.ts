/**
 * @tokbridge/codec -- compact top-k transfer encoding for distributions.
 */
export {
  EPSILON,
  encodeTopK,
  encodeLogitsTopK,
  decodeTopK,
  decodeTopKLogits,
} from "./topk.js";
