/**
 * Special-token handling shared by every tokenizer.
 *
 * Special tokens occupy the first ids of a vocabulary. Their literal text is
 * recognised in input before normal segmentation and emitted as a single id
 * covering its span.
 */
import type {
  Encoding,
  OffsetSpan,
  SpecialToken,
  SpecialTokenRole,
} from "@tokbridge/core";

export interface SpecialTokenSpec {
  readonly role: SpecialTokenRole;
  readonly text: string;
}

export interface TokenizerOptions {
  readonly specials?: readonly SpecialTokenSpec[];
}

/** A run of input text, either plain or one special token. */
export interface TextSegment {
  readonly text: string;
  readonly start: number;
  readonly special?: SpecialToken;
}

/**
 * Assign ids 0..n-1 to special token specs. Several roles may share one text
 * (GPT-2 uses `<|endoftext|>` for bos, eos and unk); they share one id.
 */
export function assignSpecialIds(specs: readonly SpecialTokenSpec[]): {
  texts: string[];
  tokens: SpecialToken[];
} {
  const texts: string[] = [];
  const tokens: SpecialToken[] = [];
  for (const spec of specs) {
    if (spec.text.length === 0) {
      throw new Error(`Special token "${spec.role}" has empty text`);
    }
    let id = texts.indexOf(spec.text);
    if (id < 0) {
      id = texts.length;
      texts.push(spec.text);
    }
    tokens.push({ role: spec.role, id, text: spec.text });
  }
  return { texts, tokens };
}

/** Cut `text` into plain runs and special-token matches, longest match first. */
export function splitSpecialSegments(text: string, specials: readonly SpecialToken[]): TextSegment[] {
  if (specials.length === 0) return text.length > 0 ? [{ text, start: 0 }] : [];

  const byLength = [...specials].sort((a, b) => b.text.length - a.text.length);
  const segments: TextSegment[] = [];
  let plainStart = 0;
  let i = 0;
  while (i < text.length) {
    const match = byLength.find((s) => text.startsWith(s.text, i));
    if (!match) {
      i++;
      continue;
    }
    if (i > plainStart) segments.push({ text: text.slice(plainStart, i), start: plainStart });
    segments.push({ text: match.text, start: i, special: match });
    i += match.text.length;
    plainStart = i;
  }
  if (plainStart < text.length) segments.push({ text: text.slice(plainStart), start: plainStart });
  return segments;
}

/**
 * Encode `text` by routing plain runs through `encodePlain` (which pushes
 * ids and segment-relative spans) and special matches straight to their id.
 */
export function encodeWithSpecials(
  text: string,
  specials: readonly SpecialToken[],
  encodePlain: (segment: string, ids: number[], spans: OffsetSpan[]) => void,
): Encoding {
  const ids: number[] = [];
  const offsets: OffsetSpan[] = [];
  for (const seg of splitSpecialSegments(text, specials)) {
    if (seg.special) {
      ids.push(seg.special.id);
      offsets.push([seg.start, seg.start + seg.text.length]);
      continue;
    }
    const spans: OffsetSpan[] = [];
    encodePlain(seg.text, ids, spans);
    for (const [s, e] of spans) offsets.push([seg.start + s, seg.start + e]);
  }
  return { ids: new Int32Array(ids), offsets };
}

/** Plain text of a corpus with every special-token occurrence cut out. */
export function plainRuns(text: string, specials: readonly SpecialToken[]): string[] {
  return splitSpecialSegments(text, specials)
    .filter((seg) => seg.special === undefined)
    .map((seg) => seg.text);
}

export function unkId(specials: readonly SpecialToken[]): number | undefined {
  return specials.find((s) => s.role === "unk")?.id;
}
