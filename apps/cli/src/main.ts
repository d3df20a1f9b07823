#!/usr/bin/env node
/**
 * tokbridge CLI -- the main entry point.
 *
 * Commands: tokenizer build, tokenizer equiv, translate
 */
import { tokenizerBuildCmd } from "./commands/tokenizer-build.js";
import { tokenizerEquivCmd } from "./commands/tokenizer-equiv.js";
import { translateCmd } from "./commands/translate.js";

const USAGE = `
tokbridge -- move token distributions between tokenizers

Commands:
  tokenizer build  Build tokenizer artifacts from text
  tokenizer equiv  Check whether two tokenizers tokenize identically
  translate        Translate top-k encoded distributions onto a standard tokenizer

Options:
  --help, -h       Show this help

Examples:
  tokbridge tokenizer build --type=bpe --input=data/train.txt --vocabSize=2000 --specials=eos:<|endoftext|> --out=artifacts/std.json
  tokbridge tokenizer equiv --a=artifacts/std.json --b=artifacts/foreign.json
  tokbridge translate --std=artifacts/std.json --foreign=artifacts/foreign.json --input=request.json --out=translated.json --missPolicy=floor
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "tokenizer" && args[1] === "build") {
    await tokenizerBuildCmd(args.slice(2));
  } else if (command === "tokenizer" && args[1] === "equiv") {
    await tokenizerEquivCmd(args.slice(2));
  } else if (command === "translate") {
    await translateCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
