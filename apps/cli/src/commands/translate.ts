/**
 * Command: tokbridge translate
 *
 * Reads top-k encoded foreign distributions, translates them onto the
 * standard tokenizer and writes them back re-encoded at the same k.
 *
 * Input JSON: { texts: string[], topk: number, encoded: number[][][] }
 */
import { readFile, writeFile } from "node:fs/promises";
import { Effect, Either } from "effect";
import {
  ConfigError,
  ShapeMismatchError,
  type InvalidKError,
  loadTranslationConfig,
  mergeTranslationConfig,
} from "@tokbridge/core";
import { fromRows, toRows } from "@tokbridge/tensor";
import { decodeTopK, encodeTopK } from "@tokbridge/codec";
import { loadTokenizer } from "@tokbridge/tokenizers";
import { makeTranslationSession, type TranslationStats } from "@tokbridge/translate";
import { StandardTokenizerFrom, TranslationConfigFrom, withLogging, withSpan } from "@tokbridge/runtime";
import { parseKV, requireArg } from "../parse.js";

export interface TranslateRequest {
  readonly texts: readonly string[];
  readonly topk: number;
  readonly encoded: readonly (readonly (readonly number[])[])[];
}

function isNumberMatrix(v: unknown): v is number[][] {
  return Array.isArray(v) && v.every((r) => Array.isArray(r) && r.every((x) => typeof x === "number"));
}

/** Validate a parsed request body. */
export function parseTranslateRequest(data: unknown): Effect.Effect<TranslateRequest, ConfigError | ShapeMismatchError> {
  if (typeof data !== "object" || data === null) {
    return Effect.fail(new ConfigError({ message: "translate input must be a JSON object" }));
  }
  const texts: unknown = Reflect.get(data, "texts");
  const topk: unknown = Reflect.get(data, "topk");
  const encoded: unknown = Reflect.get(data, "encoded");
  if (!Array.isArray(texts) || !texts.every((t): t is string => typeof t === "string")) {
    return Effect.fail(new ConfigError({ message: "texts must be an array of strings" }));
  }
  if (typeof topk !== "number") {
    return Effect.fail(new ConfigError({ message: "topk must be a number" }));
  }
  if (!Array.isArray(encoded) || !encoded.every(isNumberMatrix)) {
    return Effect.fail(new ConfigError({ message: "encoded must be an array of number matrices" }));
  }
  if (encoded.length !== texts.length) {
    return Effect.fail(new ShapeMismatchError({
      message: `${texts.length} texts but ${encoded.length} encoded sequences`,
      expected: [texts.length],
      actual: [encoded.length],
    }));
  }
  return Effect.succeed({ texts, topk, encoded });
}

interface TranslatedSequence {
  readonly index: number;
  readonly encoded?: number[][];
  readonly stats?: TranslationStats;
  readonly error?: { readonly tag: string; readonly message: string };
}

export async function translateCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const stdPath = requireArg(kv, "std", "standard tokenizer artifacts");
  const foreignPath = requireArg(kv, "foreign", "foreign tokenizer artifacts");
  const inputPath = requireArg(kv, "input", "encoded distributions JSON");
  const outPath = requireArg(kv, "out", "output path");

  const config = await Effect.runPromise(
    loadTranslationConfig(kv["config"]).pipe(Effect.flatMap((base) => mergeTranslationConfig(base, kv))),
  );

  const program = Effect.all([
    loadTokenizer(stdPath),
    loadTokenizer(foreignPath),
    Effect.tryPromise({
      try: () => readFile(inputPath, "utf-8"),
      catch: (cause) => new ConfigError({ message: `Failed to read ${inputPath}`, cause }),
    }).pipe(
      Effect.flatMap((raw) => Effect.try({
        try: (): unknown => JSON.parse(raw),
        catch: (cause) => new ConfigError({ message: `${inputPath} is not valid JSON`, cause }),
      })),
      Effect.flatMap(parseTranslateRequest),
    ),
  ]).pipe(
    Effect.flatMap(([std, foreign, request]) => {
      const k = request.topk;
      return Effect.forEach(request.encoded, (rows, i) =>
        Effect.try({
          try: () => fromRows(rows, 2 * k),
          catch: (cause) => new ShapeMismatchError({ message: `encoded sequence ${i}: ${String(cause)}` }),
        }).pipe(Effect.flatMap((t) => decodeTopK(t, foreign.vocabSize, k, config.epsilon))),
      ).pipe(
        Effect.flatMap((decoded) =>
          makeTranslationSession.pipe(
            Effect.flatMap((session) =>
              session.prepare(request.texts, foreign).pipe(
                Effect.flatMap((prepared) => session.translate(prepared, decoded, foreign)),
                Effect.ensuring(Effect.sync(() => session.dispose())),
              ),
            ),
            Effect.provide(StandardTokenizerFrom(std)),
          ),
        ),
        Effect.flatMap((results) =>
          Effect.forEach(results, (r, i): Effect.Effect<TranslatedSequence, InvalidKError> =>
            Either.isLeft(r)
              ? Effect.succeed({ index: i, error: { tag: r.left._tag, message: r.left.message } })
              : encodeTopK(r.right.probs, Math.min(k, std.vocabSize)).pipe(
                Effect.map((enc) => ({ index: i, encoded: toRows(enc), stats: r.right.stats })),
              ),
          ),
        ),
        Effect.tap((out) => Effect.logInfo(`translated ${out.length} sequences ${foreign.name} -> ${std.name}`)),
        Effect.map((out) => ({ topk: Math.min(k, std.vocabSize), results: out })),
      );
    }),
    Effect.flatMap((output) =>
      Effect.tryPromise({
        try: () => writeFile(outPath, JSON.stringify(output), "utf-8"),
        catch: (cause) => new ConfigError({ message: `Failed to write ${outPath}`, cause }),
      }),
    ),
    Effect.provide(TranslationConfigFrom(config)),
    withLogging(config.logLevel),
  );

  await Effect.runPromise(withSpan("translate", program));
  console.log(`Wrote ${outPath}`);
}
