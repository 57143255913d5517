/**
 * Geocode Command
 *
 * Composes an address per CSV row, resolves every address with bounded
 * retry, and writes the CSV back out with `full_address` and `lat_lon`
 * appended. `lat_lon` stays empty for addresses that never resolved.
 *
 * Usage:
 *   address-geocoder geocode <file> --columns <a,b,...> [options]
 *
 * Options:
 *   -c, --columns <list>       Comma-separated address columns, in order
 *   -o, --output <file>        Output CSV (default: <file>.geocoded.csv)
 *   -p, --provider <name>      arcgis | nominatim
 *   --concurrency <n>          Parallel lookups per round
 *   --max-retries <n>          Retry rounds after the first (default: 10)
 *   --config <path>            Config file path
 *   -v, --verbose              Debug logging
 *   --json                     Output summary as JSON
 *
 * @module cli/commands/geocode
 */

import { InvalidArgumentError, Option, type Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import { FULL_ADDRESS_COLUMN, LAT_LON_COLUMN } from '../../core/constants.js';
import { formatCoordinatePair, type GeocodingProvider } from '../../core/types.js';
import type { Logger } from '../../core/utils/logger.js';
import { createGeocodingProvider, PROVIDER_NAMES, type ProviderName } from '../../providers/index.js';
import { findDuplicateAddresses } from '../../services/address-composer.js';
import { ResolutionEngine } from '../../services/resolution-engine.js';
import { loadConfig } from '../lib/config.js';
import { serializeCsv } from '../lib/csv.js';
import { exitCodeForError, EXIT_CODES } from '../lib/exit-codes.js';
import { appendColumns, composeFromCsv, parseColumnList } from './shared.js';

export interface GeocodeOptions {
  readonly columns: string;
  readonly output?: string;
  readonly provider?: ProviderName;
  readonly concurrency?: number;
  readonly maxRetries?: number;
  readonly config?: string;
  readonly verbose?: boolean;
  readonly json?: boolean;
}

export interface GeocodeSummary {
  readonly total: number;
  readonly resolved: number;
  readonly unresolved: number;
  readonly duplicates: number;
  readonly rounds: number;
  readonly provider: string;
  readonly outputPath: string;
}

export interface GeocodeDependencies {
  /** Replaces the configured provider (tests, embedding) */
  readonly provider?: GeocodingProvider;
}

/**
 * Default output path: `input.csv` -> `input.geocoded.csv`
 */
export function defaultOutputPath(file: string): string {
  return /\.csv$/i.test(file)
    ? file.replace(/\.csv$/i, '.geocoded.csv')
    : `${file}.geocoded.csv`;
}

/**
 * Execute the geocode command
 */
export async function runGeocode(
  file: string,
  options: GeocodeOptions,
  logger: Logger,
  deps: GeocodeDependencies = {}
): Promise<GeocodeSummary> {
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      provider: options.provider,
      concurrency: options.concurrency,
      maxRetries: options.maxRetries,
      verbose: options.verbose,
    },
  });
  // Info and debug lines share stdout with the JSON summary
  const quietForJson = options.json && (config.logLevel === 'debug' || config.logLevel === 'info');
  logger.setLevel(quietForJson ? 'warn' : config.logLevel);

  const columns = parseColumnList(options.columns);
  const { table, addresses } = await composeFromCsv(file, columns, logger);

  const provider = deps.provider ?? createGeocodingProvider(config.provider);
  let rounds = 0;
  const engine = new ResolutionEngine({
    provider,
    maxRetries: config.resolution.maxRetries,
    retryDelayMs: config.resolution.retryDelayMs,
    concurrency: config.resolution.concurrency,
    logger,
    onRound: (summary) => {
      rounds = summary.round + 1;
      logger.debug('Round complete', { ...summary });
    },
  });

  const coordinates = await engine.fetchCoordinates(addresses);

  const latLon = coordinates.map((pair) => (pair ? formatCoordinatePair(pair) : ''));
  const outputPath = options.output ?? defaultOutputPath(file);
  const output = appendColumns(table, [
    { header: FULL_ADDRESS_COLUMN, values: addresses },
    { header: LAT_LON_COLUMN, values: latLon },
  ]);
  await writeFile(outputPath, serializeCsv(output), 'utf-8');

  const resolved = coordinates.filter((pair) => pair !== null).length;
  return {
    total: addresses.length,
    resolved,
    unresolved: addresses.length - resolved,
    duplicates: findDuplicateAddresses(addresses).length,
    rounds,
    provider: provider.name,
    outputPath,
  };
}

function parseCount(flag: string, minimum: number): (value: string) => number {
  return (value) => {
    const num = Number(value);
    if (!Number.isInteger(num) || num < minimum) {
      throw new InvalidArgumentError(`${flag} must be an integer >= ${minimum}, got "${value}"`);
    }
    return num;
  };
}

function printSummary(summary: GeocodeSummary): void {
  console.log('\nGeocoding Summary');
  console.log('='.repeat(50));
  console.log(`Provider:    ${summary.provider}`);
  console.log(`Total:       ${summary.total}`);
  console.log(`Resolved:    ${summary.resolved}`);
  console.log(`Unresolved:  ${summary.unresolved}`);
  console.log(`Duplicates:  ${summary.duplicates}`);
  console.log(`Rounds:      ${summary.rounds}`);
  console.log(`Output:      ${summary.outputPath}`);
}

/**
 * Register the geocode command
 */
export function registerGeocodeCommand(parent: Command, logger: Logger): void {
  parent
    .command('geocode <file>')
    .description('Compose addresses from CSV columns and append lat,lon coordinates')
    .requiredOption('-c, --columns <list>', 'Comma-separated address columns, in order')
    .option('-o, --output <file>', 'Output CSV (default: <file>.geocoded.csv)')
    .addOption(
      new Option('-p, --provider <name>', 'Geocoding provider').choices([...PROVIDER_NAMES])
    )
    .option('--concurrency <n>', 'Parallel lookups per round', parseCount('--concurrency', 1))
    .option('--max-retries <n>', 'Retry rounds after the first', parseCount('--max-retries', 0))
    .option('--config <path>', 'Config file path')
    .option('-v, --verbose', 'Debug logging')
    .option('--json', 'Output summary as JSON')
    .action(async (file: string, options: GeocodeOptions) => {
      try {
        const summary = await runGeocode(file, options, logger);

        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
        } else {
          printSummary(summary);
        }

        process.exitCode =
          summary.unresolved > 0 ? EXIT_CODES.UNRESOLVED : EXIT_CODES.SUCCESS;
      } catch (error) {
        logger.error('Geocoding failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exitCode = exitCodeForError(error);
      }
    });
}
