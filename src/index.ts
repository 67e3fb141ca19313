#!/usr/bin/env node
/**
 * @fileoverview article-skeptic CLI entry point.
 *
 * Loads `.env` into `process.env`, then hands the command line to
 * {@link runCli}. The exit code is set rather than forced with
 * `process.exit`, so pending output is flushed first.
 *
 * @module index
 */

import "dotenv/config";
import { runCli } from "./commands/analyze.js";

async function main(): Promise<number> {
  return runCli(process.argv.slice(2));
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  });
