/**
 * Command: tokbridge tokenizer equiv
 */
import { Effect } from "effect";
import { parseKV, requireArg } from "../parse.js";
import { loadTokenizer } from "@tokbridge/tokenizers";
import { checkTokenizerEquivalence } from "@tokbridge/translate";

export async function tokenizerEquivCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const aPath = requireArg(kv, "a", "first tokenizer artifacts");
  const bPath = requireArg(kv, "b", "second tokenizer artifacts");
  const probes = kv["probes"] ? kv["probes"].split(",") : [];

  const [a, b] = await Effect.runPromise(Effect.all([loadTokenizer(aPath), loadTokenizer(bPath)]));
  const equivalent = checkTokenizerEquivalence(a, b, probes);

  console.log(`${a.name} (${a.vocabSize}) vs ${b.name} (${b.vocabSize}): ${equivalent ? "equivalent" : "different"}`);
  if (!equivalent) process.exitCode = 1;
}
