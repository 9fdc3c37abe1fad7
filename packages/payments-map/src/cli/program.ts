/**
 * Payments Map CLI program definition
 *
 * @module cli/program
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { registerGenerateCommand } from './commands/generate.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 1,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  try {
    const packageJsonPath = new URL('../../package.json', import.meta.url);
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('payments-map')
    .description('Generate an interactive map of national digital payment systems')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .payments-maprc)');

  registerGenerateCommand(program);

  return program;
}
