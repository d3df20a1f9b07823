export {
  StandardTokenizerFrom,
  TranslationConfigFrom,
  TranslationConfigLive,
} from "./layers.js";

export {
  prettyLogger,
  PrettyLoggerLive,
  withSpan,
  withLogging,
  parseLogLevel,
} from "./logging.js";
