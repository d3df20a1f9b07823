/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { SPECIAL_TOKEN_ROLES, type SpecialTokenRole } from "@tokbridge/core";
import type { SpecialTokenSpec } from "@tokbridge/tokenizers";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(kv: Record<string, string>, key: string, label?: string): string {
  const val = kv[key];
  if (!val) {
    throw new Error(`Missing required argument: --${key}${label ? ` (${label})` : ""}`);
  }
  return val;
}

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  return val ? parseInt(val, 10) : defaultVal;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

function isRole(v: string): v is SpecialTokenRole {
  return SPECIAL_TOKEN_ROLES.some((r) => r === v);
}

/** `eos:<|endoftext|>,unk:<unk>` -> special token specs. */
export function parseSpecials(value: string | undefined): SpecialTokenSpec[] {
  if (!value) return [];
  return value.split(",").map((entry) => {
    const colon = entry.indexOf(":");
    const role = entry.slice(0, colon);
    const text = entry.slice(colon + 1);
    if (colon <= 0 || !isRole(role) || text.length === 0) {
      throw new Error(`Bad special token "${entry}": expected role:text with role one of ${SPECIAL_TOKEN_ROLES.join(", ")}`);
    }
    return { role, text };
  });
}
