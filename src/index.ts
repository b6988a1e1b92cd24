#!/usr/bin/env node
import { runCLI } from './cli/index.js';
import { formatStartupError } from './errors.js';

runCLI().catch((error: unknown) => {
  const errorMessage = formatStartupError(error instanceof Error ? error : new Error(String(error)));
  process.stderr.write(`\n${errorMessage}\n`);
  process.exit(1);
});
