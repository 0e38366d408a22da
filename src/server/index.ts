#!/usr/bin/env node

/**
 * Contract Analyzer HTTP server
 *
 * Usage:
 *   npx tsx src/server/index.ts --port 3000
 *   PORT=8080 npx tsx src/server/index.ts
 */

import 'dotenv/config';
import { resolveConfig, getConfigSummary } from '../config.js';
import { ContractAnalyzer } from '../pipeline.js';
import { formatError } from '../utils/errors.js';
import { createApp } from './app.js';
import { listen, parsePort } from './listen.js';

async function main(): Promise<void> {
  // Credentials are checked once, before the server accepts any upload
  const config = resolveConfig();
  const port = parsePort(process.argv.slice(2));
  const analyzer = new ContractAnalyzer(config);
  console.log(getConfigSummary(config));

  const app = createApp({
    analyzer,
    maxUploadSize: process.env.CONTRACT_ANALYZER_MAX_UPLOAD || '10mb',
  });

  await listen(app, port);
  console.log(`Contract Analyzer running on http://localhost:${port}`);
  console.log(`API endpoints available at http://localhost:${port}/api/*`);
}

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exitCode = 1;
});
