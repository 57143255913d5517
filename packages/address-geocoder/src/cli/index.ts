/**
 * Address Geocoder CLI
 *
 * @module cli
 */

import { Command } from 'commander';
import type { Logger } from '../core/utils/logger.js';
import { registerComposeCommand, registerGeocodeCommand } from './commands/index.js';

export * from './commands/index.js';
export { loadConfig, DEFAULT_CONFIG, type GeocoderConfig, type LoadConfigOptions } from './lib/config.js';
export { parseCsv, serializeCsv, getColumn, CsvParseError, type CsvTable } from './lib/csv.js';
export { EXIT_CODES, exitCodeForError, type ExitCode } from './lib/exit-codes.js';

export const CLI_VERSION = '1.0.0';
export const CLI_NAME = 'address-geocoder';

/**
 * Build the commander program with every subcommand registered
 */
export function createProgram(logger: Logger): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Compose addresses from CSV columns and resolve them to coordinates')
    .version(CLI_VERSION);

  registerComposeCommand(program, logger);
  registerGeocodeCommand(program, logger);

  return program;
}
