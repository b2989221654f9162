#!/usr/bin/env tsx

import { logger } from '@component-resolver/core';
import { runCli } from './program.js';

/**
 * resolver CLI - main entry point
 *
 * Invoked by the build, clear and rebuild scripts to decide what to build,
 * in what order, and what is already installed.
 */

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('An unexpected error occurred. Re-run with --debug for details.');
  process.exit(1);
});

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  logger.error('Resolver failed', error);
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
