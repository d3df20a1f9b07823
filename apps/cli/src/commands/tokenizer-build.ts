/**
 * Command: tokbridge tokenizer build
 */
import { readFile } from "node:fs/promises";
import { Effect } from "effect";
import { parseKV, requireArg, intArg, strArg, parseSpecials } from "../parse.js";
import { saveArtifacts, tokenizerRegistry } from "@tokbridge/tokenizers";

export async function tokenizerBuildCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const type = strArg(kv, "type", "bpe");
  const inputPath = requireArg(kv, "input", "path to training text");
  const vocabSize = intArg(kv, "vocabSize", 2000);
  const outPath = requireArg(kv, "out", "output path for artifacts");
  const specials = parseSpecials(kv["specials"]);

  console.log(`Building ${type} tokenizer from ${inputPath} (vocabSize=${vocabSize}, specials=${specials.length})`);

  const text = await readFile(inputPath, "utf-8");

  const artifacts = await Effect.runPromise(
    tokenizerRegistry.resolve(type, { vocabSize, specials }).pipe(
      Effect.flatMap((tokenizer) => tokenizer.build(text)),
      Effect.tap((built) => saveArtifacts(outPath, built)),
    ),
  );

  console.log(`Tokenizer built: vocab_size=${artifacts.vocabSize}`);
  console.log(`Artifacts saved to ${outPath}`);
}
