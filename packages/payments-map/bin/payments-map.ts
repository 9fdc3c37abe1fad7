#!/usr/bin/env tsx
/**
 * Payments Map CLI Entry Point
 *
 * Reads the DPI payment systems table and writes a self-contained
 * interactive map. `payments-map` with no command runs `generate`.
 *
 * @module payments-map-cli
 */

import { EXIT_CODES, createProgram, type ExitCode } from '../src/cli/program.js';
import { ConfigError } from '../src/core/errors.js';

/**
 * Print a failed run's error and pick its exit code
 */
function reportFailure(error: unknown): ExitCode {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.getSummary()}`);
    return EXIT_CODES.CONFIG_ERROR;
  }
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  return EXIT_CODES.ERRORS;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    process.exit(reportFailure(error));
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
