/**
 * @tokbridge/translate -- cross-tokenizer alignment and probability
 * redistribution onto a standard vocabulary.
 */
export { checkTokenizerEquivalence, DEFAULT_PROBES } from "./equivalence.js";
export {
  translateSpecialTokenText,
  translateSpecialTokenBatch,
  verifyAlignment,
  remapOffsets,
  type OffsetCorrection,
  type SpecialTokenAlignment,
} from "./special-tokens.js";
export { TranslationMap, TranslationMapCache, buildTranslationMap } from "./translation-map.js";
export { SplitMapCache } from "./split-cache.js";
export {
  translateSequence,
  translateLogitsToProbsStd,
  type TranslationElement,
  type TranslationContext,
  type TranslationStats,
  type TranslationResult,
  type TranslationElementError,
} from "./redistribute.js";
export {
  TranslationSession,
  makeTranslationSession,
  type PreparedElement,
  type PreparedBatch,
} from "./session.js";
export { emulateExchange, type ExchangeElement, type ExchangeReport } from "./exchange.js";
