#!/usr/bin/env node
import { readFileSync } from "node:fs";

import { parseRunArguments, runProgram } from "../src/cli/runProgram";

function main(): void {
  try {
    const args = parseRunArguments(process.argv.slice(2));
    const source = readFileSync(args.file, "utf8");
    console.log(runProgram(source, args));
  } catch (error) {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  }
}

main();
