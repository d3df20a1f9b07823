/**
 * Character-level tokenizer.
 *
 * Builds a vocabulary from the unique characters in the input text (sorted),
 * after the special tokens. Every character is one token, so offsets are
 * exact code-point spans.
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

export class CharTokenizer implements TrainableTokenizer {
  readonly name = "char";

  /** Special texts first, then sorted characters. */
  private _vocab: string[] = [];

  /** char -> token id */
  private _stoi = new Map<string, number>();

  private _specials: SpecialToken[] = [];

  constructor(options: TokenizerOptions = {}) {
    const { texts, tokens } = assignSpecialIds(options.specials ?? []);
    this._specials = tokens;
    this._setVocab(texts);
  }

  // ── Public interface ─────────────────────────────────────────────────────

  /** Number of tokens in the current vocabulary. */
  get vocabSize(): number {
    return this._vocab.length;
  }

  get specialTokens(): readonly SpecialToken[] {
    return this._specials;
  }

  /**
   * Build the vocabulary from raw input text.
   *
   * Special-token text in the corpus is skipped so its characters only
   * enter the vocabulary if they also occur elsewhere.
   */
  build(input: string): Effect.Effect<TokenizerArtifacts, TokenizerError> {
    return Effect.try({
      try: () => {
        const chars = new Set<string>();
        for (const run of plainRuns(input, this._specials)) {
          for (const ch of run) chars.add(ch);
        }
        if (chars.size === 0) {
          throw new Error("Cannot build char tokenizer from empty input");
        }

        const specialTexts = this._vocab.slice(0, this._specialCount());
        this._setVocab([...specialTexts, ...[...chars].sort()]);

        return {
          type: "char",
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
   * Encode with offsets. Unknown characters become the unk token when one is
   * registered and are skipped otherwise.
   */
  encodeWithOffsets(text: string): Encoding {
    const unk = unkId(this._specials);
    return encodeWithSpecials(text, this._specials, (segment, ids, spans) => {
      let pos = 0;
      for (const ch of segment) {
        const id = this._stoi.get(ch) ?? unk;
        if (id !== undefined) {
          ids.push(id);
          spans.push([pos, pos + ch.length]);
        }
        pos += ch.length;
      }
    });
  }

  /** Decode token ids back into a string. Unknown ids are ignored. */
  decode(tokens: ArrayLike<number>): string {
    const parts: string[] = [];
    for (let i = 0; i < tokens.length; i++) {
      const ch = this._vocab[tokens[i]];
      if (ch !== undefined) parts.push(ch);
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

  /** Set the vocabulary and rebuild the lookup table. */
  private _setVocab(vocab: string[]): void {
    this._vocab = vocab;
    this._stoi.clear();
    for (let i = this._specialCount(); i < vocab.length; i++) {
      this._stoi.set(vocab[i], i);
    }
  }
}
