/**
 * Helpers shared by the compose and geocode commands.
 *
 * @module cli/commands/shared
 */

import { readFile } from 'node:fs/promises';
import { InvalidInputError } from '../../core/errors.js';
import { AddressComposer } from '../../services/address-composer.js';
import type { Logger } from '../../core/utils/logger.js';
import { getColumn, parseCsv, type CsvTable } from '../lib/csv.js';

/**
 * Split a `--columns a,b,c` value into column names
 */
export function parseColumnList(value: string): string[] {
  const columns = value
    .split(',')
    .map((column) => column.trim())
    .filter((column) => column.length > 0);

  if (columns.length === 0) {
    throw new InvalidInputError('--columns needs at least one column name');
  }
  return columns;
}

export async function readCsvFile(file: string): Promise<CsvTable> {
  let content: string;
  try {
    content = await readFile(file, 'utf-8');
  } catch (error) {
    throw new InvalidInputError(
      `Cannot read ${file}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return parseCsv(content);
}

export interface ComposedTable {
  readonly table: CsvTable;
  readonly addresses: string[];
}

/**
 * Read `file` and compose one address per row from `columns`
 */
export async function composeFromCsv(
  file: string,
  columns: readonly string[],
  logger: Logger
): Promise<ComposedTable> {
  const table = await readCsvFile(file);
  const composer = new AddressComposer({ logger });
  const addresses = composer.composeAddresses(columns.map((name) => getColumn(table, name)));
  return { table, addresses };
}

/**
 * Add columns to the right of every row
 */
export function appendColumns(
  table: CsvTable,
  columns: ReadonlyArray<{ readonly header: string; readonly values: readonly string[] }>
): CsvTable {
  return {
    headers: [...table.headers, ...columns.map((column) => column.header)],
    rows: table.rows.map((row, index) => [
      ...row,
      ...columns.map((column) => column.values[index] ?? ''),
    ]),
  };
}
