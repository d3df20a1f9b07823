/**
 * Word-level tokenizer.
 *
 * Pre-tokenises text into alternating runs of whitespace and non-whitespace;
 * each unique run becomes one token. Whitespace runs are tokens too, so the
 * offsets of a known text tile it without gaps and decode is plain
 * concatenation.
 */
import { Effect } from "effect";
import {
  TokenizerError,
  type Encoding,
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

const RUN_PATTERN = /\s+|\S+/g;

function runsOf(text: string): RegExpMatchArray[] {
  return [...text.matchAll(RUN_PATTERN)];
}

export class WordTokenizer implements TrainableTokenizer {
  readonly name = "word";

  /** Special texts first, then sorted runs. */
  private _vocab: string[] = [];

  /** run -> token id */
  private _stoi = new Map<string, number>();

  private _specials: SpecialToken[] = [];

  constructor(options: TokenizerOptions = {}) {
    const { texts, tokens } = assignSpecialIds(options.specials ?? []);
    this._specials = tokens;
    this._setVocab(texts);
  }

  // ── Public interface ─────────────────────────────────────────────────────

  get vocabSize(): number {
    return this._vocab.length;
  }

  get specialTokens(): readonly SpecialToken[] {
    return this._specials;
  }

  build(input: string): Effect.Effect<TokenizerArtifacts, TokenizerError> {
    return Effect.try({
      try: () => {
        const words = new Set<string>();
        for (const run of plainRuns(input, this._specials)) {
          for (const m of runsOf(run)) words.add(m[0]);
        }
        if (words.size === 0) {
          throw new Error("Cannot build word tokenizer from empty input");
        }

        const specialTexts = this._vocab.slice(0, this._specialCount());
        this._setVocab([...specialTexts, ...[...words].sort()]);

        return {
          type: "word",
          vocabSize: this._vocab.length,
          vocab: this._vocab,
          specialTokens: this._specials,
        } satisfies TokenizerArtifacts;
      },
      catch: (cause) => new TokenizerError({ message: String(cause), cause }),
    });
  }

  encode(text: string): Int32Array {
    return this.encodeWithOffsets(text).ids;
  }

  /**
   * Unknown runs become the unk token when one is registered and are
   * skipped otherwise, leaving a gap in the offsets.
   */
  encodeWithOffsets(text: string): Encoding {
    const unk = unkId(this._specials);
    return encodeWithSpecials(text, this._specials, (segment, ids, spans) => {
      for (const m of runsOf(segment)) {
        const id = this._stoi.get(m[0]) ?? unk;
        const start = m.index ?? 0;
        if (id !== undefined) {
          ids.push(id);
          spans.push([start, start + m[0].length]);
        }
      }
    });
  }

  decode(tokens: ArrayLike<number>): string {
    const parts: string[] = [];
    for (let i = 0; i < tokens.length; i++) {
      const word = this._vocab[tokens[i]];
      if (word !== undefined) parts.push(word);
    }
    return parts.join("");
  }

  // ── Restore from persisted artifacts ─────────────────────────────────────

  loadArtifacts(artifacts: TokenizerArtifacts): void {
    this._specials = [...(artifacts.specialTokens ?? [])];
    this._setVocab([...artifacts.vocab]);
  }

  // ── Internal ─────────────────────────────────────────────────────────────

  private _specialCount(): number {
    return new Set(this._specials.map((s) => s.id)).size;
  }

  private _setVocab(vocab: string[]): void {
    this._vocab = vocab;
    this._stoi.clear();
    for (let i = this._specialCount(); i < vocab.length; i++) {
      this._stoi.set(vocab[i], i);
    }
  }
}
