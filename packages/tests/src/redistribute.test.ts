import { describe, it, expect } from "vitest";
import { Effect, Either } from "effect";
import {
  OffsetMisalignmentError,
  SeededRng,
  ShapeMismatchError,
  TranslationMapMissError,
  type Tokenizer,
} from "@tokbridge/core";
import { fromRows } from "@tokbridge/tensor";
import {
  SplitMapCache,
  buildTranslationMap,
  translateLogitsToProbsStd,
  translateSequence,
  type TranslationContext,
  type TranslationElement,
  type TranslationResult,
} from "@tokbridge/translate";
import { GreedyTokenizer, charTokenizer, expectRowsClose, rowsOf, wordTokenizer } from "./fixtures.js";

function context(
  foreign: Tokenizer,
  std: Tokenizer,
  overrides: Partial<TranslationContext> = {},
): TranslationContext {
  return {
    foreign,
    std,
    splitCache: new SplitMapCache(foreign, std),
    toMap: buildTranslationMap(foreign, std),
    fromMap: buildTranslationMap(std, foreign),
    missPolicy: "drop",
    renormalize: false,
    skipEquivalent: false,
    ...overrides,
  };
}

function element(text: string, foreign: Tokenizer, std: Tokenizer, rows: number[][]): TranslationElement {
  const f = foreign.encodeWithOffsets(text);
  const s = std.encodeWithOffsets(text);
  return {
    probs: fromRows(rows, foreign.vocabSize),
    foreignIds: f.ids,
    foreignOffsets: f.offsets,
    stdIds: s.ids,
    stdOffsets: s.offsets,
  };
}

function run(el: TranslationElement, ctx: TranslationContext): TranslationResult {
  return Effect.runSync(translateSequence(el, ctx));
}

describe("one-to-one and one-to-many", () => {
  // foreign word vocab: " ", "ab", "c"      std char vocab: " ", "a", "b", "c"
  const foreign = wordTokenizer("ab c");
  const std = charTokenizer("abc ");
  const rows = [[0.5, 0.2, 0.3], [0.1, 0.2, 0.7], [0.6, 0.3, 0.1]];

  it("splits a foreign token across the standard tokens it spells", () => {
    const { probs, stats } = run(element("ab c", foreign, std, rows), context(foreign, std));
    expect(probs.shape).toEqual([4, 4]);
    // "b" is certain once "ab" was observed; later rows map one-to-one.
    expectRowsClose(probs, [
      [0, 0, 1, 0],
      [0.5, 0.2, 0, 0.3],
      [0.1, 0.2, 0, 0.7],
      [0.6, 0.3, 0, 0.1],
    ]);
    expect(stats).toEqual({ missedMass: 0, unalignedPositions: 0, recoveredValues: 0, fastPath: false });
  });
});

describe("many-to-one", () => {
  // foreign char vocab: " ", "a", "b", "c"    std word vocab: " ", "a", "ab", "c"
  const foreign = charTokenizer("abc ");
  const std = wordTokenizer("ab a c");
  const rows = [
    [0.6, 0.2, 0.1, 0.1],
    [0.1, 0.5, 0.3, 0.1],
    [0.2, 0.1, 0.6, 0.1],
    [0.25, 0.25, 0.25, 0.25],
  ];
  const el = element("c ab", foreign, std, rows);

  it("shares the leading foreign mass by the later rows' evidence", () => {
    const { probs, stats } = run(el, context(foreign, std));
    // P("a") = 0.5 is split between "a" (score 1) and "ab" (score 0.6).
    expectRowsClose(probs, [
      [0.6, 0.2, 0, 0.1],
      [0.1, 0.3125, 0.1875, 0.1],
      [0.25, 0.25, 0, 0.25],
    ]);
    expect(stats.missedMass).toBeCloseTo(0.65, 12);
  });

  it("floor spreads missed mass uniformly", () => {
    const { probs } = run(el, context(foreign, std, { missPolicy: "floor" }));
    expectRowsClose(probs, [
      [0.625, 0.225, 0.025, 0.125],
      [0.175, 0.3875, 0.2625, 0.175],
      [0.3125, 0.3125, 0.0625, 0.3125],
    ]);
  });

  it("error fails the element at the first position with a miss", () => {
    const result = Effect.runSync(Effect.either(translateSequence(el, context(foreign, std, { missPolicy: "error" }))));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(TranslationMapMissError);
      if (result.left instanceof TranslationMapMissError) {
        expect(result.left.position).toBe(0);
        expect(result.left.missedMass).toBeCloseTo(0.1, 12);
      }
    }
  });

  it("renormalizes rows on request", () => {
    const { probs } = run(el, context(foreign, std, { renormalize: true }));
    expectRowsClose(probs, [
      [0.6 / 0.9, 0.2 / 0.9, 0, 0.1 / 0.9],
      [0.1 / 0.7, 0.3125 / 0.7, 0.1875 / 0.7, 0.1 / 0.7],
      [1 / 3, 1 / 3, 0, 1 / 3],
    ]);
  });
});

describe("crossing tokens", () => {
  const std = new GreedyTokenizer("std", ["a", "bc", "d"]);
  const foreign = new GreedyTokenizer("foreign", ["ab", "cd"]);

  it("weights each overlapping foreign token by its share of the standard span", () => {
    const el = element("abcd", foreign, std, [[0.3, 0.7], [0.4, 0.6]]);
    const { probs, stats } = run(el, context(foreign, std));
    expectRowsClose(probs, [
      [0.15, 0, 0.35],
      [0, 0, 0.7],
      [0.4, 0, 0.6],
    ]);
    expect(stats.missedMass).toBeCloseTo(0.8, 12);
  });
});

describe("partly covered standard tokens", () => {
  // The foreign tokenizer skips "b", so only half of the standard "ab" is spelled.
  const std = new GreedyTokenizer("std", ["x", "ab", "a"]);
  const foreign = new GreedyTokenizer("foreign", ["x", "a"]);
  const el = element("xab", foreign, std, [[0.2, 0.8], [0.5, 0.5]]);

  it("drop counts the uncovered share as missed", () => {
    const { probs, stats } = run(el, context(foreign, std));
    expectRowsClose(probs, [[0.1, 0, 0.4], [0.5, 0, 0.5]]);
    expect(stats.missedMass).toBeCloseTo(0.5, 12);
    expect(stats.unalignedPositions).toBe(0);
  });

  it("floor spreads the uncovered share", () => {
    const { probs } = run(el, context(foreign, std, { missPolicy: "floor" }));
    expectRowsClose(probs, [[0.1 + 1 / 6, 1 / 6, 0.4 + 1 / 6], [0.5, 0, 0.5]]);
  });

  it("error fails on the uncovered share", () => {
    const result = Effect.runSync(Effect.either(translateSequence(el, context(foreign, std, { missPolicy: "error" }))));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result) && result.left instanceof TranslationMapMissError) {
      expect(result.left.position).toBe(0);
      expect(result.left.missedMass).toBeCloseTo(0.5, 12);
    } else {
      expect.fail("expected a TranslationMapMissError");
    }
  });
});

describe("unaligned positions", () => {
  // "c" is unknown to the foreign tokenizer, so nothing overlaps it.
  const std = charTokenizer("abc");
  const foreign = charTokenizer("ab");
  const el = element("acb", foreign, std, [[0.7, 0.3], [0.4, 0.6]]);

  it("drop leaves the row empty and counts it", () => {
    const { probs, stats } = run(el, context(foreign, std));
    expectRowsClose(probs, [[0, 0, 0], [0.7, 0.3, 0], [0.4, 0.6, 0]]);
    expect(stats.unalignedPositions).toBe(1);
    expect(stats.missedMass).toBe(1);
  });

  it("floor makes the row uniform", () => {
    const { probs } = run(el, context(foreign, std, { missPolicy: "floor" }));
    expectRowsClose(probs, [[1 / 3, 1 / 3, 1 / 3], [0.7, 0.3, 0], [0.4, 0.6, 0]]);
  });
});

describe("identical tokenizers", () => {
  const tok = charTokenizer("abc ");
  const rng = new SeededRng(17);
  const rows = Array.from({ length: 6 }, () => Array.from(rng.nextSimplex(4)));
  const el = element("abc ab", tok, tok, rows);

  it("reproduce the input without the fast path", () => {
    const { probs, stats } = run(el, context(tok, tok));
    expect(Array.from(probs.data)).toEqual(Array.from(el.probs.data));
    expect(stats.fastPath).toBe(false);
  });

  it("copy rows through on the fast path", () => {
    const { probs, stats } = run(el, context(tok, tok, { skipEquivalent: true }));
    expect(Array.from(probs.data)).toEqual(Array.from(el.probs.data));
    expect(stats.fastPath).toBe(true);
  });

  it("softmax logits first", () => {
    const ab = charTokenizer("ab");
    const logits = { ...element("ab", ab, ab, [[0, 0], [0, Math.log(3)]]), input: "logits" as const };
    expectRowsClose(run(logits, context(ab, ab)).probs, [[0.5, 0.5], [0.25, 0.75]]);
  });

  it("zero non-finite and negative inputs", () => {
    const ab = charTokenizer("ab");
    const el2 = element("ab", ab, ab, [[Number.NaN, 1], [-0.5, 1.5]]);
    const plain = run(el2, context(ab, ab));
    expect(rowsOf(plain.probs)).toEqual([[0, 1], [0, 1.5]]);
    expect(plain.stats.recoveredValues).toBe(2);

    const renormalized = run(el2, context(ab, ab, { renormalize: true }));
    expect(rowsOf(renormalized.probs)).toEqual([[0, 1], [0, 1]]);
  });
});

describe("translateLogitsToProbsStd", () => {
  const foreign = wordTokenizer("ab c");
  const std = charTokenizer("abc ");
  const ctx = context(foreign, std);
  const first = element("ab c", foreign, std, [[0.5, 0.2, 0.3], [0.1, 0.2, 0.7], [0.6, 0.3, 0.1]]);
  const second = element("c ab", foreign, std, [[0.3, 0.3, 0.4], [0.2, 0.7, 0.1], [0.1, 0.1, 0.8]]);

  const data = (r: Either.Either<TranslationResult, unknown>): number[] =>
    Either.isRight(r) ? Array.from(r.right.probs.data) : [];

  it("does not depend on batch order", () => {
    const forward = Effect.runSync(translateLogitsToProbsStd([first, second], ctx));
    const backward = Effect.runSync(translateLogitsToProbsStd([second, first], ctx));
    expect(data(forward[0])).toEqual(data(backward[1]));
    expect(data(forward[1])).toEqual(data(backward[0]));
    expect(data(forward[0]).length).toBe(16);
  });

  it("is idempotent with warm caches", () => {
    const once = Effect.runSync(translateLogitsToProbsStd([first, second], ctx));
    const twice = Effect.runSync(translateLogitsToProbsStd([first, second], ctx));
    expect(once.map(data)).toEqual(twice.map(data));
  });

  it("isolates a misaligned element", () => {
    const broken = { ...second, foreignOffsets: second.foreignOffsets.slice(1) };
    const results = Effect.runSync(translateLogitsToProbsStd([first, broken], ctx));
    expect(Either.isRight(results[0])).toBe(true);
    const bad = results[1];
    expect(Either.isLeft(bad)).toBe(true);
    if (Either.isLeft(bad)) {
      expect(bad.left).toBeInstanceOf(OffsetMisalignmentError);
      expect(bad.left.message).toBe("element 1: 3 foreign rows but 2 foreign offsets");
    }
  });

  it("fails the batch when rows are not over the foreign vocabulary", () => {
    const wide = { ...first, probs: fromRows([[0.2, 0.2, 0.2, 0.2, 0.2]]) };
    const result = Effect.runSync(Effect.either(translateLogitsToProbsStd([first, wide], ctx)));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) {
      expect(result.left).toBeInstanceOf(ShapeMismatchError);
      expect(result.left.actual).toEqual([5]);
    }
  });

  it("fails the batch when the maps belong to another pair", () => {
    const other = charTokenizer("wxyz");
    const result = Effect.runSync(Effect.either(
      translateLogitsToProbsStd([first], { ...ctx, toMap: buildTranslationMap(other, std) }),
    ));
    expect(Either.isLeft(result)).toBe(true);
  });

  it("keeps per-element miss errors in their slot", () => {
    const strict = context(charTokenizer("abc "), wordTokenizer("ab a c"), { missPolicy: "error" });
    const f = strict.foreign;
    const s = strict.std;
    const clean = element("a", f, s, [[0, 1, 0, 0]]);
    const missing = element("c ab", f, s, [
      [0.6, 0.2, 0.1, 0.1],
      [0.1, 0.5, 0.3, 0.1],
      [0.2, 0.1, 0.6, 0.1],
      [0.25, 0.25, 0.25, 0.25],
    ]);
    const results = Effect.runSync(translateLogitsToProbsStd([clean, missing], strict));
    expect(Either.isRight(results[0])).toBe(true);
    expect(Either.isLeft(results[1])).toBe(true);
  });
});
