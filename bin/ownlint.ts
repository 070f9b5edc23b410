#!/usr/bin/env npx tsx
// bin/ownlint.ts
// ownlint CLI entry point
//
// Run:  npx tsx bin/ownlint.ts [options] <declarations.json>

import * as fs from "fs";
import { EXIT_INTERNAL, runCli } from "./ownlint-cli-lib";

function main(): void {
  try {
    const code = runCli(process.argv.slice(2), {
      stdout: text => process.stdout.write(text + "\n"),
      stderr: text => process.stderr.write(text + "\n"),
      readFile: filePath => fs.readFileSync(filePath, "utf8"),
    });
    process.exitCode = code;
  } catch (e) {
    const message = e instanceof Error ? e.stack ?? e.message : String(e);
    process.stderr.write(`ownlint: internal error: ${message}\n`);
    process.exitCode = EXIT_INTERNAL;
  }
}

main();
