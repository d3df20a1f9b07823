/**
 * Vocabulary translation maps: for every source id, the target ids covering
 * the same text. Stored as CSR (`starts` of length V+1 into a flat `ids`).
 */
import { Effect } from "effect";
import type { Tokenizer } from "@tokbridge/core";

export class TranslationMap {
  private _heads: Int32Array | null = null;
  private _groups: { starts: Int32Array; ids: Int32Array } | null = null;

  constructor(
    readonly sourceVocabSize: number,
    readonly targetVocabSize: number,
    readonly starts: Int32Array,
    readonly ids: Int32Array,
  ) {}

  /** Target ids for source id `id` (empty when the text has no target tokens). */
  targets(id: number): Int32Array {
    return this.ids.subarray(this.starts[id], this.starts[id + 1]);
  }

  /** First target id per source id, or -1. */
  heads(): Int32Array {
    if (this._heads) return this._heads;
    const heads = new Int32Array(this.sourceVocabSize).fill(-1);
    for (let id = 0; id < this.sourceVocabSize; id++) {
      if (this.starts[id + 1] > this.starts[id]) heads[id] = this.ids[this.starts[id]];
    }
    this._heads = heads;
    return heads;
  }

  /** Source ids whose first target id is `targetId`, ascending. */
  sourcesWithHead(targetId: number): Int32Array {
    const groups = this._groupsByHead();
    return groups.ids.subarray(groups.starts[targetId], groups.starts[targetId + 1]);
  }

  private _groupsByHead(): { starts: Int32Array; ids: Int32Array } {
    if (this._groups) return this._groups;
    const heads = this.heads();
    const starts = new Int32Array(this.targetVocabSize + 1);
    for (const h of heads) if (h >= 0) starts[h + 1]++;
    for (let t = 0; t < this.targetVocabSize; t++) starts[t + 1] += starts[t];
    const fill = starts.slice(0, this.targetVocabSize);
    const ids = new Int32Array(starts[this.targetVocabSize]);
    for (let id = 0; id < heads.length; id++) {
      const h = heads[id];
      if (h >= 0) ids[fill[h]++] = id;
    }
    this._groups = { starts, ids };
    return this._groups;
  }
}

/**
 * Tokenize every decoded source token with `target`. Special source tokens
 * map to the target special of the same role when there is one.
 */
export function buildTranslationMap(source: Tokenizer, target: Tokenizer): TranslationMap {
  const specialTarget = new Map<number, number>();
  for (const s of source.specialTokens) {
    if (specialTarget.has(s.id)) continue;
    const match = target.specialTokens.find((t) => t.role === s.role);
    if (match) specialTarget.set(s.id, match.id);
  }

  const starts = new Int32Array(source.vocabSize + 1);
  const flat: number[] = [];
  for (let id = 0; id < source.vocabSize; id++) {
    const special = specialTarget.get(id);
    if (special !== undefined) {
      flat.push(special);
    } else {
      for (const t of target.encode(source.decode([id]))) flat.push(t);
    }
    starts[id + 1] = flat.length;
  }
  return new TranslationMap(source.vocabSize, target.vocabSize, starts, new Int32Array(flat));
}

/**
 * Maps per directed (source, target) pair, keyed by tokenizer identity.
 * A build runs to completion synchronously before anyone else can look the
 * pair up, so a pair is never built twice.
 */
export class TranslationMapCache {
  private _maps = new WeakMap<Tokenizer, Map<Tokenizer, TranslationMap>>();
  private _builds = 0;

  /** Number of maps built since construction or the last clear. */
  get builds(): number {
    return this._builds;
  }

  peek(source: Tokenizer, target: Tokenizer): TranslationMap | undefined {
    return this._maps.get(source)?.get(target);
  }

  get(source: Tokenizer, target: Tokenizer): Effect.Effect<TranslationMap> {
    return Effect.suspend(() => {
      const cached = this.peek(source, target);
      if (cached) return Effect.succeed(cached);

      const t0 = performance.now();
      const map = buildTranslationMap(source, target);
      const byTarget = this._maps.get(source) ?? new Map<Tokenizer, TranslationMap>();
      byTarget.set(target, map);
      this._maps.set(source, byTarget);
      this._builds++;

      const ms = performance.now() - t0;
      return Effect.logDebug(`built translation map ${source.name} -> ${target.name}`).pipe(
        Effect.annotateLogs({ entries: map.ids.length, ms: ms.toFixed(1) }),
        Effect.as(map),
      );
    });
  }

  clear(): void {
    this._maps = new WeakMap();
    this._builds = 0;
  }
}
