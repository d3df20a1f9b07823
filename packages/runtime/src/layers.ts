/**
 * Effect layers for the translation services.
 */
import { Layer } from "effect";
import {
  StandardTokenizerService,
  TranslationConfigService,
  loadTranslationConfig,
  type Tokenizer,
  type TranslationConfig,
} from "@tokbridge/core";

export const StandardTokenizerFrom = (tokenizer: Tokenizer) =>
  Layer.succeed(StandardTokenizerService, tokenizer);

export const TranslationConfigFrom = (config: TranslationConfig) =>
  Layer.succeed(TranslationConfigService, config);

/** Config read from a JSON file (defaults when `path` is absent). */
export const TranslationConfigLive = (path?: string) =>
  Layer.effect(TranslationConfigService, loadTranslationConfig(path));
