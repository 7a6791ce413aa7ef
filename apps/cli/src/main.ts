#!/usr/bin/env node
/**
 * piecewise CLI — the main entry point.
 *
 * Commands: train, tokenize, encode, decode, bench
 */
import { trainCmd } from "./commands/train.js";
import { tokenizeCmd, encodeCmd } from "./commands/tokenize.js";
import { decodeCmd } from "./commands/decode.js";
import { benchCmd } from "./commands/bench.js";
import { listImplementations } from "./resolve.js";

const USAGE = `
piecewise — WordPiece tokenizer and vocabulary trainer

Commands:
  train            Learn a vocabulary from a text corpus (one text per line)
  tokenize         Print the tokens of --text or --input
  encode           Print the token ids of --text or --input
  decode           Rebuild text from --ids
  bench            Run tokenizer/trainer benchmarks

Options:
  --config=FILE    JSON file of defaults; flags override it
  --logLevel=LVL   debug | info | warn | error | none
  --help, -h       Show this help

Examples:
  piecewise train --input=data/corpus.txt --out=artifacts/vocab.json --vocabSize=8000 --minFrequency=2
  piecewise tokenize --vocab=artifacts/vocab.json --text="wanted to go home"
  piecewise encode --vocab=artifacts/vocab.json --input=data/sample.txt
  piecewise decode --vocab=artifacts/vocab.json --ids=3,4,5,6,7
  piecewise bench --sizes=10,100,1000,10000 --iters=5
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    console.log(`\n${listImplementations()}`);
    process.exit(0);
  }

  const command = args[0];
  const rest = args.slice(1);

  if (command === "train") {
    await trainCmd(rest);
  } else if (command === "tokenize") {
    await tokenizeCmd(rest);
  } else if (command === "encode") {
    await encodeCmd(rest);
  } else if (command === "decode") {
    await decodeCmd(rest);
  } else if (command === "bench") {
    await benchCmd(rest);
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error("Fatal:", err instanceof Error ? err.message : err);
  process.exit(1);
});
