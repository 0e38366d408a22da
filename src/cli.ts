#!/usr/bin/env node

import 'dotenv/config';
import { runCli } from './command.js';
import { formatError } from './utils/errors.js';

/**
 * CLI for analyzing a contract file.
 *
 * Usage:
 *   npx tsx src/cli.ts contract.pdf
 *   npx tsx src/cli.ts agreement.docx --parallel --model gpt-4o
 *   npx tsx src/cli.ts terms.txt --clauses-only --explain
 */

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(formatError(error));
    process.exitCode = 1;
  });
