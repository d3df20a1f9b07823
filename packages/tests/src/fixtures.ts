/**
 * Small tokenizers and a fake model shared by the suites.
 */
import { expect } from "vitest";
import { Effect } from "effect";
import type { Encoding, LanguageModel, OffsetSpan, SpecialToken, TensorData, Tokenizer } from "@tokbridge/core";
import { CharTokenizer, WordTokenizer, type SpecialTokenSpec } from "@tokbridge/tokenizers";

/**
 * Longest-match tokenizer over a fixed vocabulary; unknown characters are
 * skipped. `maxLength` caps the entries it will match.
 */
export class GreedyTokenizer implements Tokenizer {
  readonly specialTokens: readonly SpecialToken[] = [];

  constructor(
    readonly name: string,
    private readonly vocab: readonly string[],
    private readonly maxLength = Infinity,
  ) {}

  get vocabSize(): number {
    return this.vocab.length;
  }

  encode(text: string): Int32Array {
    return this.encodeWithOffsets(text).ids;
  }

  encodeWithOffsets(text: string): Encoding {
    const ids: number[] = [];
    const offsets: OffsetSpan[] = [];
    let i = 0;
    while (i < text.length) {
      let best = -1;
      for (let id = 0; id < this.vocab.length; id++) {
        const v = this.vocab[id];
        if (v.length > this.maxLength || !text.startsWith(v, i)) continue;
        if (best < 0 || v.length > this.vocab[best].length) best = id;
      }
      if (best < 0) {
        i++;
        continue;
      }
      ids.push(best);
      offsets.push([i, i + this.vocab[best].length]);
      i += this.vocab[best].length;
    }
    return { ids: new Int32Array(ids), offsets };
  }

  decode(tokens: ArrayLike<number>): string {
    let out = "";
    for (let i = 0; i < tokens.length; i++) out += this.vocab[tokens[i]] ?? "";
    return out;
  }
}

export function charTokenizer(corpus: string, specials: SpecialTokenSpec[] = []): CharTokenizer {
  const tok = new CharTokenizer({ specials });
  Effect.runSync(tok.build(corpus));
  return tok;
}

export function wordTokenizer(corpus: string, specials: SpecialTokenSpec[] = []): WordTokenizer {
  const tok = new WordTokenizer({ specials });
  Effect.runSync(tok.build(corpus));
  return tok;
}

/**
 * Deterministic stand-in model: each row's logits depend only on the
 * current token, like a bigram table.
 */
export class BigramModel implements LanguageModel {
  readonly name = "bigram-fake";

  constructor(readonly vocabSize: number) {}

  forward(ids: Int32Array): TensorData {
    const v = this.vocabSize;
    const data = new Float64Array(ids.length * v);
    for (let i = 0; i < ids.length; i++) {
      for (let j = 0; j < v; j++) data[i * v + j] = 2 * Math.cos(ids[i] * 7 + j * 3);
    }
    return { shape: [ids.length, v], dtype: "f64", data };
  }
}

/**
 * Stand-in model that already knows the text: row i puts `confidence`
 * logits on the token that follows, the last row on the final token.
 */
export class OracleModel implements LanguageModel {
  readonly name = "oracle-fake";

  constructor(readonly vocabSize: number, private readonly confidence = 20) {}

  forward(ids: Int32Array): TensorData {
    const v = this.vocabSize;
    const data = new Float64Array(ids.length * v);
    for (let i = 0; i < ids.length; i++) {
      data[i * v + ids[Math.min(i + 1, ids.length - 1)]] = this.confidence;
    }
    return { shape: [ids.length, v], dtype: "f64", data };
  }
}

/** Rows of a tensor as plain arrays for `toEqual`. */
export function rowsOf(t: TensorData): number[][] {
  const w = t.shape[t.shape.length - 1];
  const out: number[][] = [];
  for (let i = 0; i < t.data.length; i += w) out.push(Array.from(t.data.subarray(i, i + w)));
  return out;
}

/** Every entry of `actual` close to `expected`. */
export function expectRowsClose(actual: TensorData, expected: readonly (readonly number[])[]): void {
  const rows = rowsOf(actual);
  expect(rows.length).toBe(expected.length);
  rows.forEach((row, i) => {
    expect(row.length).toBe(expected[i].length);
    row.forEach((v, j) => expect(v).toBeCloseTo(expected[i][j], 9));
  });
}
