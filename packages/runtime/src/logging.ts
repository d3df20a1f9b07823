/**
 * Console logging and tracing helpers.
 *
 * One line per entry: `[hh:mm:ss.mmm] LEVEL message key=value ...`, with log
 * annotations appended as key=value pairs.
 */
import { Effect, Logger, LogLevel } from "effect";
import type { LogLevelName } from "@tokbridge/core";

function render(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export const prettyLogger = Logger.make(({ logLevel, message, date, annotations }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  const parts: unknown[] = Array.isArray(message) ? message : [message];
  let line = `[${ts}] ${lvl} ${parts.map(render).join(" ")}`;
  for (const [key, value] of annotations) line += ` ${key}=${render(value)}`;
  console.log(line);
});

/** Swap Effect's default logger for `prettyLogger`. */
export const PrettyLoggerLive = Logger.replace(Logger.defaultLogger, prettyLogger);

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    default: return LogLevel.Info;
  }
}

/** Run `effect` with the pretty logger at the given minimum level. */
export function withLogging(level: LogLevelName | string) {
  return <A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    effect.pipe(
      Logger.withMinimumLogLevel(parseLogLevel(level)),
      Effect.provide(PrettyLoggerLive),
    );
}
