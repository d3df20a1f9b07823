/**
 * Tokenizer equivalence: can a foreign distribution be used as-is under the
 * standard vocabulary?
 */
import { fingerprint, type Tokenizer } from "@tokbridge/core";

/** Strings every pair is compared on, in addition to caller probes. */
export const DEFAULT_PROBES: readonly string[] = [
  "",
  "Hello, world!",
  "The quick brown fox jumps over the lazy dog.",
  "  leading and trailing spaces  ",
  "line one\nline two\n\ttabbed",
  "numbers 0123456789 and 3.14159",
  "punctuation: ;:'\"()[]{}<>/?!@#$%^&*-_=+",
  "café naïve über straße",
  "mixedCASE snake_case kebab-case",
];

function vocabEntries(tok: Tokenizer): string[] {
  const entries: string[] = [];
  for (let id = 0; id < tok.vocabSize; id++) entries.push(tok.decode([id]));
  return entries;
}

function specialEntries(tok: Tokenizer): string[] {
  return tok.specialTokens
    .map((s) => `${s.role}:${s.id}:${s.text}`)
    .sort();
}

function sameIds(a: Int32Array, b: Int32Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * True when `a` and `b` tokenize identically: same vocabulary size, same
 * decoded vocabulary and special tokens, and the same ids on every probe.
 * Special-token texts of both sides are probed too.
 */
export function checkTokenizerEquivalence(
  a: Tokenizer,
  b: Tokenizer,
  probes: readonly string[] = [],
): boolean {
  if (a === b) return true;
  if (a.vocabSize !== b.vocabSize) return false;

  const vocabA = vocabEntries(a);
  const vocabB = vocabEntries(b);
  const specialsA = specialEntries(a);
  const specialsB = specialEntries(b);
  if (fingerprint([...vocabA, ...specialsA]) !== fingerprint([...vocabB, ...specialsB])) {
    return false;
  }
  // Fingerprints can collide; confirm entrywise.
  if (vocabA.some((v, i) => v !== vocabB[i])) return false;
  if (specialsA.length !== specialsB.length || specialsA.some((s, i) => s !== specialsB[i])) {
    return false;
  }

  const specialTexts = [...a.specialTokens, ...b.specialTokens].map((s) => `x${s.text}y`);
  for (const probe of [...DEFAULT_PROBES, ...specialTexts, ...probes]) {
    if (!sameIds(a.encode(probe), b.encode(probe))) return false;
  }
  return true;
}
