/**
 * Generate Command
 *
 * Builds the interactive payment systems map from the CSV dataset.
 *
 * Usage:
 *   payments-map generate [options]
 *
 * Options:
 *   -i, --input <file>    Payment systems CSV (default: dpi-payments.csv)
 *   -o, --output <file>   HTML output path (default: index.html)
 *   --all-systems         Include every system, not only active + implemented
 *
 * Examples:
 *   payments-map generate
 *   payments-map generate --input data/payments.csv --output public/map.html
 *   payments-map --json generate --all-systems
 */

import type { Command } from 'commander';
import { LAYER_LABELS, LAYER_TYPES } from '../../core/layers.js';
import { findUnplacedCountries } from '../../data/loaders/country-coordinates-loader.js';
import { loadPaymentData, summarizeGroups } from '../../data/loaders/record-loader.js';
import { buildMapModel, renderMapHtml, writeMapHtml } from '../../render/map-document.js';
import { loadConfig, type CLIConfig } from '../lib/config.js';
import { createCLILogger, type CLILogger } from '../lib/logger.js';

/**
 * Generate options from CLI, merged with the global flags
 */
type GenerateOptions = {
  readonly input?: string;
  readonly output?: string;
  readonly allSystems?: boolean;
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
};

export interface GenerateResult {
  readonly input: string;
  readonly output: string;
  readonly filterToActiveImplemented: boolean;
  readonly countries: number;
  readonly systems: number;
  /** Countries left off the map for lack of coordinates */
  readonly unplacedCountries: readonly string[];
}

/**
 * Register the generate command. It is the default when no command is given.
 */
export function registerGenerateCommand(program: Command): void {
  program
    .command('generate', { isDefault: true })
    .description('Generate the interactive payment systems map')
    .option('-i, --input <file>', 'Payment systems CSV file')
    .option('-o, --output <file>', 'HTML output file')
    .option('--all-systems', 'Include all systems, not only active real-time implemented ones')
    .action(async (_options: GenerateOptions, command: Command) => {
      await executeGenerate(command.optsWithGlobals<GenerateOptions>());
    });
}

async function executeGenerate(options: GenerateOptions): Promise<void> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      input: options.input,
      output: options.output,
      allSystems: options.allSystems,
      verbose: options.verbose,
      json: options.json,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  logger.commandStart('generate', { configPath: config.configPath });
  const result = generateMap(config, logger);

  // Logs go to stderr in JSON mode; stdout holds only the result
  if (logger.isJson) {
    console.log(JSON.stringify(result, null, 2));
  }
  logger.commandEnd(true, { countries: result.countries, systems: result.systems });
}

/**
 * Load the dataset, render the map and write it to config.output.
 *
 * @throws the fs error when the input cannot be read or the output written
 */
export function generateMap(
  config: Pick<CLIConfig, 'input' | 'output' | 'filterToActiveImplemented' | 'map'>,
  logger: CLILogger
): GenerateResult {
  logger.info('Processing DPI payment systems data', { input: config.input });
  if (config.filterToActiveImplemented) {
    logger.info('Filtering: active real-time payment systems that are implemented');
  }

  const groups = loadPaymentData(config.input, {
    filterToActiveImplemented: config.filterToActiveImplemented,
  });
  const { countries, systems } = summarizeGroups(groups);
  logger.info(`Loaded ${countries} countries`, { systems });

  const unplacedCountries = findUnplacedCountries(groups);
  if (unplacedCountries.length > 0) {
    logger.warn(`${unplacedCountries.length} countries have no coordinates and are not shown`, {
      countries: unplacedCountries,
    });
  }

  const html = renderMapHtml(buildMapModel(groups), config.map);
  writeMapHtml(config.output, html);

  logger.info(`Map generated successfully: ${config.output}`);
  logger.info(`Total countries mapped: ${countries}`);
  logger.info(`Total payment systems: ${systems}`);
  logger.debug(`Generated interactive map with ${LAYER_TYPES.length} toggleable layers`, {
    layers: LAYER_TYPES.map((layerType) => LAYER_LABELS[layerType]),
  });

  return {
    input: config.input,
    output: config.output,
    filterToActiveImplemented: config.filterToActiveImplemented,
    countries,
    systems,
    unplacedCountries,
  };
}
