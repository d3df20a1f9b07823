/**
 * Special-token rewriting between tokenizers, and the offset correction
 * table that maps positions in the rewritten text back to the original.
 */
import { Effect } from "effect";
import {
  OffsetMisalignmentError,
  type OffsetSpan,
  type SpecialTokenRole,
  type Tokenizer,
} from "@tokbridge/core";

/** One substituted span: `[stdStart, stdEnd)` became `[foreignStart, foreignEnd)`. */
export interface OffsetCorrection {
  readonly stdStart: number;
  readonly stdEnd: number;
  readonly foreignStart: number;
  readonly foreignEnd: number;
}

export interface SpecialTokenAlignment {
  /** Text to feed the foreign tokenizer. */
  readonly text: string;
  /** Ordered by position; empty when nothing was substituted. */
  readonly corrections: readonly OffsetCorrection[];
}

interface Substitution {
  readonly from: string;
  readonly to: string;
}

/**
 * For every distinct standard special text, the foreign text of the first
 * foreign special sharing one of its roles ("" when there is none).
 */
function substitutions(std: Tokenizer, foreign: Tokenizer): Substitution[] {
  const rolesByText = new Map<string, SpecialTokenRole[]>();
  for (const s of std.specialTokens) {
    const roles = rolesByText.get(s.text) ?? [];
    roles.push(s.role);
    rolesByText.set(s.text, roles);
  }

  const subs: Substitution[] = [];
  for (const [from, roles] of rolesByText) {
    let to = "";
    for (const role of roles) {
      const match = foreign.specialTokens.find((f) => f.role === role);
      if (match) {
        to = match.text;
        break;
      }
    }
    subs.push({ from, to });
  }
  // Longest first so "<|end|>" never shadows "<|endoftext|>".
  return subs.sort((x, y) => y.from.length - x.from.length);
}

/**
 * Replace every standard special-token text in `text` with the foreign
 * equivalent, or remove it. Pure: returns the rewritten text together with
 * its correction table.
 */
export function translateSpecialTokenText(
  text: string,
  std: Tokenizer,
  foreign: Tokenizer,
): SpecialTokenAlignment {
  const subs = substitutions(std, foreign);
  if (subs.length === 0) return { text, corrections: [] };

  const parts: string[] = [];
  const corrections: OffsetCorrection[] = [];
  let delta = 0;
  let plainStart = 0;
  let i = 0;
  while (i < text.length) {
    const sub = subs.find((s) => text.startsWith(s.from, i));
    if (!sub) {
      i++;
      continue;
    }
    if (sub.to !== sub.from) {
      parts.push(text.slice(plainStart, i), sub.to);
      const foreignStart = i + delta;
      corrections.push({
        stdStart: i,
        stdEnd: i + sub.from.length,
        foreignStart,
        foreignEnd: foreignStart + sub.to.length,
      });
      delta += sub.to.length - sub.from.length;
      plainStart = i + sub.from.length;
    }
    i += sub.from.length;
  }
  parts.push(text.slice(plainStart));
  return { text: parts.join(""), corrections };
}

export function translateSpecialTokenBatch(
  texts: readonly string[],
  std: Tokenizer,
  foreign: Tokenizer,
): SpecialTokenAlignment[] {
  return texts.map((t) => translateSpecialTokenText(t, std, foreign));
}

/**
 * Check that `alignment` is a consistent rewrite of `original`: corrections
 * are ordered, shifts accumulate, untouched text is identical and the
 * rewritten length matches the table.
 */
export function verifyAlignment(
  original: string,
  alignment: SpecialTokenAlignment,
  element?: number,
): Effect.Effect<SpecialTokenAlignment, OffsetMisalignmentError> {
  const fail = (message: string) => Effect.fail(new OffsetMisalignmentError({ message, element }));

  let stdPos = 0;
  let foreignPos = 0;
  for (const c of alignment.corrections) {
    if (c.stdStart < stdPos || c.stdEnd < c.stdStart || c.foreignEnd < c.foreignStart) {
      return fail(`correction [${c.stdStart}, ${c.stdEnd}) is out of order or inverted`);
    }
    if (c.foreignStart - foreignPos !== c.stdStart - stdPos) {
      return fail(`correction at ${c.stdStart} expected foreign start ${foreignPos + c.stdStart - stdPos}, got ${c.foreignStart}`);
    }
    if (original.slice(stdPos, c.stdStart) !== alignment.text.slice(foreignPos, c.foreignStart)) {
      return fail(`unsubstituted text before ${c.stdStart} differs after rewrite`);
    }
    stdPos = c.stdEnd;
    foreignPos = c.foreignEnd;
  }

  const expectedLength = foreignPos + (original.length - stdPos);
  if (alignment.text.length !== expectedLength) {
    return fail(`rewritten text has length ${alignment.text.length}, correction table implies ${expectedLength}`);
  }
  if (original.slice(stdPos) !== alignment.text.slice(foreignPos)) {
    return fail("unsubstituted tail differs after rewrite");
  }
  return Effect.succeed(alignment);
}

function remapStart(p: number, corrections: readonly OffsetCorrection[]): number {
  for (const c of corrections) {
    if (p < c.foreignStart) return p + (c.stdStart - c.foreignStart);
    if (p >= c.foreignEnd) continue;
    return c.stdStart;
  }
  const last = corrections[corrections.length - 1];
  return last ? p + (last.stdEnd - last.foreignEnd) : p;
}

function remapEnd(p: number, corrections: readonly OffsetCorrection[]): number {
  for (const c of corrections) {
    // An end touching a removed span stays before it.
    if (p <= c.foreignStart) return p + (c.stdStart - c.foreignStart);
    if (p >= c.foreignEnd) continue;
    return c.stdEnd;
  }
  const last = corrections[corrections.length - 1];
  return last ? p + (last.stdEnd - last.foreignEnd) : p;
}

/**
 * Map spans measured on the rewritten text back to original coordinates.
 * A span inside a substituted special token widens to the whole original
 * special span.
 */
export function remapOffsets(
  offsets: readonly OffsetSpan[],
  corrections: readonly OffsetCorrection[],
): OffsetSpan[] {
  if (corrections.length === 0) return [...offsets];
  return offsets.map(([s, e]) => {
    const start = remapStart(s, corrections);
    return [start, Math.max(start, remapEnd(e, corrections))] as const;
  });
}
