/**
 * Byte-pair encoding tokenizer.
 *
 * Starts from a character-level vocabulary (after the special tokens) and
 * iteratively merges the most frequent adjacent pair until the target vocab
 * size is reached. The learned merges are applied at encode-time in the same
 * order they were discovered, carrying each token's character span along.
 */
import { Effect } from "effect";
import {
  TokenizerError,
  type Encoding,
  type OffsetSpan,
  type SpecialToken,
  type TrainableTokenizer,
  type TokenizerArtifacts,
} from "@tokbridge/core";
import {
  assignSpecialIds,
  encodeWithSpecials,
  plainRuns,
  unkId,
  type TokenizerOptions,
} from "./special.js";

/** A single learned merge: (left id, right id) -> new id. */
interface Merge {
  readonly left: number;
  readonly right: number;
  readonly newId: number;
}

export interface BpeOptions extends TokenizerOptions {
  /** Target vocabulary size (specials + base chars + merges). */
  readonly vocabSize?: number;
}

// Pair (a, b) packed as a * PAIR_BASE + b; stays exact below 2^53.
const PAIR_BASE = 1 << 20;

// Pair statistics stabilise well before this many characters.
const MAX_TRAIN_CHARS = 500_000;

/**
 * Replace every adjacent (left, right) in `ids` with `newId`. When `spans`
 * is given it is merged in lockstep. Returns new arrays.
 */
function applyMerge(
  ids: number[],
  spans: OffsetSpan[] | null,
  merge: Merge,
): { ids: number[]; spans: OffsetSpan[] | null } {
  const outIds: number[] = [];
  const outSpans: OffsetSpan[] | null = spans ? [] : null;
  let i = 0;
  while (i < ids.length) {
    if (i < ids.length - 1 && ids[i] === merge.left && ids[i + 1] === merge.right) {
      outIds.push(merge.newId);
      if (spans && outSpans) outSpans.push([spans[i][0], spans[i + 1][1]]);
      i += 2;
    } else {
      outIds.push(ids[i]);
      if (spans && outSpans) outSpans.push(spans[i]);
      i += 1;
    }
  }
  return { ids: outIds, spans: outSpans };
}

export class BpeTokenizer implements TrainableTokenizer {
  readonly name = "bpe";

  private readonly _targetVocabSize: number;

  /** id -> string token */
  private _vocab: string[] = [];

  /** base character -> id */
  private _charIds = new Map<string, number>();

  /** Ordered list of learned merges. */
  private _merges: Merge[] = [];

  private _specials: SpecialToken[] = [];

  constructor(options: BpeOptions = {}) {
    this._targetVocabSize = options.vocabSize ?? 2000;
    const { texts, tokens } = assignSpecialIds(options.specials ?? []);
    this._specials = tokens;
    this._vocab = texts;
  }

  // ── Public interface ─────────────────────────────────────────────────────

  get vocabSize(): number {
    return this._vocab.length;
  }

  get specialTokens(): readonly SpecialToken[] {
    return this._specials;
  }

  /**
   * Train BPE on raw text.
   *
   * 1. Initialise vocab with the specials and sorted unique characters.
   * 2. Tokenise every plain run at character level (merges never cross a
   *    special token).
   * 3. Repeatedly merge the most frequent adjacent pair (first seen wins
   *    ties) until the target size is hit or no pair occurs twice.
   */
  build(input: string): Effect.Effect<TokenizerArtifacts, TokenizerError> {
    return Effect.try({
      try: () => {
        const runs: string[] = [];
        let budget = MAX_TRAIN_CHARS;
        for (const run of plainRuns(input, this._specials)) {
          if (budget <= 0) break;
          runs.push(run.slice(0, budget));
          budget -= run.length;
        }

        const chars = new Set<string>();
        for (const run of plainRuns(input, this._specials)) {
          for (const ch of run) chars.add(ch);
        }
        if (chars.size === 0) {
          throw new Error("Cannot build BPE tokenizer from empty input");
        }

        const specialTexts = this._vocab.slice(0, this._specialCount());
        this._vocab = [...specialTexts, ...[...chars].sort()];
        this._rebuildCharIds();
        this._merges = [];

        let corpus: number[][] = runs.map((run) => {
          const ids: number[] = [];
          for (const ch of run) {
            const id = this._charIds.get(ch);
            if (id !== undefined) ids.push(id);
          }
          return ids;
        });

        const numMerges = this._targetVocabSize - this._vocab.length;
        for (let m = 0; m < numMerges; m++) {
          const pairCounts = new Map<number, number>();
          for (const seq of corpus) {
            for (let i = 0; i < seq.length - 1; i++) {
              const key = seq[i] * PAIR_BASE + seq[i + 1];
              pairCounts.set(key, (pairCounts.get(key) ?? 0) + 1);
            }
          }

          let bestKey = 0;
          let bestCount = 0;
          for (const [key, count] of pairCounts) {
            if (count > bestCount) {
              bestCount = count;
              bestKey = key;
            }
          }
          if (bestCount < 2) break;

          const merge: Merge = {
            left: Math.floor(bestKey / PAIR_BASE),
            right: bestKey % PAIR_BASE,
            newId: this._vocab.length,
          };
          this._vocab.push(this._vocab[merge.left] + this._vocab[merge.right]);
          this._merges.push(merge);
          corpus = corpus.map((seq) => applyMerge(seq, null, merge).ids);
        }

        return this._artifacts();
      },
      catch: (cause) => new TokenizerError({ message: String(cause), cause }),
    });
  }

  encode(text: string): Int32Array {
    return this.encodeWithOffsets(text).ids;
  }

  /**
   * Encode by applying the learned merges in order. Unknown characters
   * become the unk token (or are skipped) and act as merge boundaries.
   */
  encodeWithOffsets(text: string): Encoding {
    const unk = unkId(this._specials);
    return encodeWithSpecials(text, this._specials, (segment, ids, spans) => {
      let runIds: number[] = [];
      let runSpans: OffsetSpan[] = [];
      const flush = () => {
        const merged = this._mergeRun(runIds, runSpans);
        ids.push(...merged.ids);
        spans.push(...merged.spans);
        runIds = [];
        runSpans = [];
      };

      let pos = 0;
      for (const ch of segment) {
        const id = this._charIds.get(ch);
        if (id !== undefined) {
          runIds.push(id);
          runSpans.push([pos, pos + ch.length]);
        } else {
          flush();
          if (unk !== undefined) {
            ids.push(unk);
            spans.push([pos, pos + ch.length]);
          }
        }
        pos += ch.length;
      }
      flush();
    });
  }

  decode(tokens: ArrayLike<number>): string {
    const parts: string[] = [];
    for (let i = 0; i < tokens.length; i++) {
      const tok = this._vocab[tokens[i]];
      if (tok !== undefined) parts.push(tok);
    }
    return parts.join("");
  }

  // ── Restore from persisted artifacts ─────────────────────────────────────

  /**
   * Re-initialise from previously saved artifacts. Merge i produces id
   * `vocab.length - merges.length + i`.
   */
  loadArtifacts(artifacts: TokenizerArtifacts): void {
    this._specials = [...(artifacts.specialTokens ?? [])];
    this._vocab = [...artifacts.vocab];
    const merges = artifacts.merges ?? [];
    const baseSize = this._vocab.length - merges.length;
    this._merges = merges.map(([left, right], i) => ({ left, right, newId: baseSize + i }));
    this._rebuildCharIds(baseSize);
  }

  // ── Internal helpers ─────────────────────────────────────────────────────

  private _artifacts(): TokenizerArtifacts {
    return {
      type: "bpe",
      vocabSize: this._vocab.length,
      vocab: this._vocab,
      merges: this._merges.map((m) => [m.left, m.right] as const),
      specialTokens: this._specials,
    };
  }

  private _specialCount(): number {
    return new Set(this._specials.map((s) => s.id)).size;
  }

  /** Rebuild the char lookup from the base (non-special, non-merge) vocab. */
  private _rebuildCharIds(end = this._vocab.length): void {
    this._charIds.clear();
    for (let i = this._specialCount(); i < end; i++) {
      this._charIds.set(this._vocab[i], i);
    }
  }

  private _mergeRun(ids: number[], spans: OffsetSpan[]): { ids: number[]; spans: OffsetSpan[] } {
    let current = { ids, spans };
    for (const merge of this._merges) {
      if (current.ids.length <= 1) break;
      const next = applyMerge(current.ids, current.spans, merge);
      current = { ids: next.ids, spans: next.spans ?? current.spans };
    }
    return current;
  }
}
