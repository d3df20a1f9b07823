import { describe, it, expect } from "vitest";
import { Effect, Either } from "effect";
import { InvalidKError, SeededRng, ShapeMismatchError, type TensorData } from "@tokbridge/core";
import { fromRows, rowSums, topkIndices } from "@tokbridge/tensor";
import { decodeTopK, decodeTopKLogits, encodeLogitsTopK, encodeTopK } from "@tokbridge/codec";

function randomRows(rows: number, vocab: number, seed: number): TensorData {
  const rng = new SeededRng(seed);
  return fromRows(Array.from({ length: rows }, () => rng.nextSimplex(vocab, 3)));
}

describe("encodeTopK", () => {
  it("keeps values then indices, largest first", () => {
    const enc = Effect.runSync(encodeTopK(fromRows([[0.1, 0.4, 0.2, 0.3]]), 2));
    expect(enc.shape).toEqual([1, 4]);
    expect(Array.from(enc.data)).toEqual([0.4, 0.3, 1, 3]);
  });

  it("breaks ties by the lower id", () => {
    const enc = Effect.runSync(encodeTopK(fromRows([[0.25, 0.25, 0.25, 0.25]]), 2));
    expect(Array.from(enc.data)).toEqual([0.25, 0.25, 0, 1]);
  });

  it("keeps leading axes", () => {
    const rng = new SeededRng(3);
    const data = new Float64Array(2 * 3 * 5);
    for (let r = 0; r < 6; r++) data.set(rng.nextSimplex(5), r * 5);
    const enc = Effect.runSync(encodeTopK({ shape: [2, 3, 5], dtype: "f64", data }, 2));
    expect(enc.shape).toEqual([2, 3, 4]);
  });

  it("rejects k outside [1, vocab]", () => {
    const probs = fromRows([[0.5, 0.5]]);
    for (const k of [0, 3, 1.5]) {
      const result = Effect.runSync(Effect.either(encodeTopK(probs, k)));
      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) {
        expect(result.left).toBeInstanceOf(InvalidKError);
        expect(result.left.vocabSize).toBe(2);
      }
    }
  });

  it("encodes logits through softmax", () => {
    const enc = Effect.runSync(encodeLogitsTopK(fromRows([[0, Math.log(3)]]), 1));
    expect(enc.data[0]).toBeCloseTo(0.75, 12);
    expect(enc.data[1]).toBe(1);
  });
});

describe("decodeTopK", () => {
  it("spreads the remainder over the other ids", () => {
    const dec = Effect.runSync(decodeTopK(fromRows([[0.4, 0.3, 1, 3]]), 4, 2));
    expect(dec.shape).toEqual([1, 4]);
    expect(dec.data[0]).toBeCloseTo(0.15, 12);
    expect(dec.data[1]).toBe(0.4);
    expect(dec.data[2]).toBeCloseTo(0.15, 12);
    expect(dec.data[3]).toBe(0.3);
  });

  it("round trip keeps the top-k exactly and sums to 1", () => {
    const probs = randomRows(8, 40, 11);
    for (const k of [1, 5, 17, 39]) {
      const dec = Effect.runSync(encodeTopK(probs, k).pipe(Effect.flatMap((enc) => decodeTopK(enc, 40, k))));
      for (let r = 0; r < 8; r++) {
        const src = probs.data.subarray(r * 40, (r + 1) * 40);
        const out = dec.data.subarray(r * 40, (r + 1) * 40);
        for (const id of topkIndices(src, k)) expect(out[id]).toBe(src[id]);
      }
      for (const s of rowSums(dec)) expect(Math.abs(s - 1)).toBeLessThan(1e-6);
    }
  });

  it("k equal to the vocabulary is lossless", () => {
    const probs = randomRows(3, 12, 5);
    const dec = Effect.runSync(encodeTopK(probs, 12).pipe(Effect.flatMap((enc) => decodeTopK(enc, 12, 12))));
    expect(Array.from(dec.data)).toEqual(Array.from(probs.data));
  });

  it("clamps the remainder when the top-k mass exceeds 1", () => {
    const dec = Effect.runSync(decodeTopK(fromRows([[0.7, 0.6, 0, 1]]), 3, 2));
    expect(dec.data[2]).toBe(1e-64);
  });

  it("floors the remainder at the given epsilon", () => {
    const dec = Effect.runSync(decodeTopK(fromRows([[0.6, 0.4, 0, 1]]), 4, 2, 0.1));
    expect(Array.from(dec.data)).toEqual([0.6, 0.4, 0.05, 0.05]);
  });

  it("rejects a width other than 2k", () => {
    const result = Effect.runSync(Effect.either(decodeTopK(fromRows([[0.5, 0.3, 0, 1]]), 4, 1)));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) expect(result.left).toBeInstanceOf(ShapeMismatchError);
  });

  it("rejects indices that are not token ids", () => {
    for (const bad of [4, -1, 1.5]) {
      const result = Effect.runSync(Effect.either(decodeTopK(fromRows([[0.5, bad]]), 4, 1)));
      expect(Either.isLeft(result)).toBe(true);
      if (Either.isLeft(result)) expect(result.left._tag).toBe("ShapeMismatchError");
    }
  });

  it("rejects a bad k", () => {
    const result = Effect.runSync(Effect.either(decodeTopK(fromRows([[0.5, 0]]), 4, 0)));
    expect(Either.isLeft(result)).toBe(true);
    if (Either.isLeft(result)) expect(result.left._tag).toBe("InvalidKError");
  });
});

describe("decodeTopKLogits", () => {
  it("is the log of the decoded distribution", () => {
    const enc = fromRows([[0.4, 0.3, 1, 3]]);
    const logs = Effect.runSync(decodeTopKLogits(enc, 4, 2));
    expect(logs.data[0]).toBeCloseTo(Math.log(0.15), 12);
    expect(logs.data[1]).toBe(Math.log(0.4 + 1e-64));
    expect(logs.data[3]).toBe(Math.log(0.3));
  });

  it("stays finite for zero-probability entries", () => {
    const logs = Effect.runSync(decodeTopKLogits(fromRows([[1, 0, 0, 1]]), 2, 2));
    expect(Array.from(logs.data).every(Number.isFinite)).toBe(true);
    expect(logs.data[1]).toBe(Math.log(1e-64));
  });
});
