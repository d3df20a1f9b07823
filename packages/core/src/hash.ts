/**
 * FNV-1a fingerprints for cheap vocabulary comparison.
 */

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/** Feed a string into a running FNV-1a state. */
export function fnv1a(text: string, seed = FNV_OFFSET): number {
  let hash = seed;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Fingerprint an ordered list of strings. A noncharacter separator keeps
 * ["ab", "c"] and ["a", "bc"] apart.
 */
export function fingerprint(entries: Iterable<string>): string {
  let hash = FNV_OFFSET;
  for (const entry of entries) {
    hash = fnv1a(entry, hash);
    hash = fnv1a("\uffff", hash);
  }
  return (hash >>> 0).toString(16).padStart(8, "0");
}
