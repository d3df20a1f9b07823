/**
 * Split-map cache: target tokenizations of arbitrary text spans, and per-cut
 * head tables for source tokens that straddle a target token boundary.
 */
import type { Tokenizer } from "@tokbridge/core";

export class SplitMapCache {
  private readonly _spans = new Map<string, Int32Array>();
  private readonly _heads = new Map<number, Int32Array>();

  /**
   * @param limit Maximum memoised spans; 0 means unbounded. Past the limit
   * results are still computed, just not stored.
   */
  constructor(
    readonly source: Tokenizer,
    readonly target: Tokenizer,
    readonly limit = 0,
  ) {}

  /** Memoised spans currently held. */
  get size(): number {
    return this._spans.size;
  }

  tokenize(span: string): Int32Array {
    const cached = this._spans.get(span);
    if (cached) return cached;
    const ids = this.target.encode(span);
    if (this.limit === 0 || this._spans.size < this.limit) this._spans.set(span, ids);
    return ids;
  }

  /**
   * For every source id: the first target id of its decoded text with the
   * first `cut` characters removed, or -1 when nothing is left.
   */
  headsAt(cut: number): Int32Array {
    const cached = this._heads.get(cut);
    if (cached) return cached;
    const heads = new Int32Array(this.source.vocabSize).fill(-1);
    for (let id = 0; id < heads.length; id++) {
      const rest = this.source.decode([id]).slice(cut);
      if (rest.length === 0) continue;
      const ids = this.tokenize(rest);
      if (ids.length > 0) heads[id] = ids[0];
    }
    this._heads.set(cut, heads);
    return heads;
  }

  clear(): void {
    this._spans.clear();
    this._heads.clear();
  }
}
