#!/usr/bin/env node
/**
 * Calendar availability CLI
 * Main entry point
 */

import { createProgram } from './cli.js';
import { formatError, wrapError } from './utils/error.js';

async function main(): Promise<void> {
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(formatError(wrapError(error)));
  process.exit(1);
});
