/**
 * Compose Command
 *
 * Builds one address per CSV row from the chosen columns, without any
 * geocoding. Useful to preview what will be sent to the provider.
 *
 * Usage:
 *   address-geocoder compose <file> --columns <a,b,...> [options]
 *
 * Options:
 *   -c, --columns <list>     Comma-separated address columns, in order
 *   -o, --output <file>      Write the CSV with a full_address column
 *   --json                   Output as JSON
 *
 * @module cli/commands/compose
 */

import type { Command } from 'commander';
import { writeFile } from 'node:fs/promises';
import { FULL_ADDRESS_COLUMN } from '../../core/constants.js';
import type { Logger } from '../../core/utils/logger.js';
import { findDuplicateAddresses } from '../../services/address-composer.js';
import { serializeCsv } from '../lib/csv.js';
import { exitCodeForError, EXIT_CODES } from '../lib/exit-codes.js';
import { appendColumns, composeFromCsv, parseColumnList } from './shared.js';

export interface ComposeOptions {
  readonly columns: string;
  readonly output?: string;
  readonly json?: boolean;
}

export interface ComposeResult {
  readonly addresses: readonly string[];
  readonly duplicates: number;
  readonly outputPath: string | null;
}

/**
 * Execute the compose command
 */
export async function runCompose(
  file: string,
  options: ComposeOptions,
  logger: Logger
): Promise<ComposeResult> {
  const columns = parseColumnList(options.columns);
  const { table, addresses } = await composeFromCsv(file, columns, logger);

  let outputPath: string | null = null;
  if (options.output) {
    const output = appendColumns(table, [{ header: FULL_ADDRESS_COLUMN, values: addresses }]);
    await writeFile(options.output, serializeCsv(output), 'utf-8');
    outputPath = options.output;
  }

  return {
    addresses,
    duplicates: findDuplicateAddresses(addresses).length,
    outputPath,
  };
}

/**
 * Register the compose command
 */
export function registerComposeCommand(parent: Command, logger: Logger): void {
  parent
    .command('compose <file>')
    .description('Compose one address per CSV row from the given columns')
    .requiredOption('-c, --columns <list>', 'Comma-separated address columns, in order')
    .option('-o, --output <file>', 'Write the CSV with a full_address column appended')
    .option('--json', 'Output as JSON')
    .action(async (file: string, options: ComposeOptions) => {
      try {
        const result = await runCompose(file, options, logger);

        if (options.json) {
          console.log(JSON.stringify(result, null, 2));
        } else if (result.outputPath) {
          console.log(`Composed ${result.addresses.length} addresses -> ${result.outputPath}`);
          console.log(`Duplicates: ${result.duplicates}`);
        } else {
          for (const address of result.addresses) {
            console.log(address);
          }
        }
        process.exitCode = EXIT_CODES.SUCCESS;
      } catch (error) {
        logger.error('Compose failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exitCode = exitCodeForError(error);
      }
    });
}
