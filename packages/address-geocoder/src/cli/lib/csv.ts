/**
 * Minimal CSV reader/writer for the CLI.
 *
 * RFC 4180 quoting: fields may be wrapped in double quotes, embedded
 * quotes are doubled, quoted fields may contain commas and line breaks.
 * CRLF and LF line endings are both accepted; blank lines are skipped.
 *
 * @module cli/lib/csv
 */

import { InvalidInputError } from '../../core/errors.js';

export interface CsvTable {
  readonly headers: readonly string[];
  readonly rows: ReadonlyArray<readonly string[]>;
}

export class CsvParseError extends InvalidInputError {
  constructor(
    message: string,
    public readonly line: number
  ) {
    super(`CSV line ${line}: ${message}`);
    this.name = 'CsvParseError';
  }
}

/**
 * Split CSV text into records of raw field values
 */
function tokenize(content: string): Array<{ fields: string[]; line: number }> {
  const records: Array<{ fields: string[]; line: number }> = [];
  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;
  let fieldStarted = false;
  let afterClosingQuote = false;

  const endRecord = (): void => {
    fields.push(field);
    // A record holding one empty field is a blank line
    if (fields.length > 1 || fields[0] !== '' || fieldStarted) {
      records.push({ fields, line: recordLine });
    }
    fields = [];
    field = '';
    fieldStarted = false;
    afterClosingQuote = false;
  };

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
          afterClosingQuote = true;
        }
      } else {
        if (char === '\n') line++;
        field += char;
      }
      continue;
    }

    if (afterClosingQuote && char !== ',' && char !== '\n' && char !== '\r') {
      throw new CsvParseError('unexpected character after closing quote', line);
    }

    switch (char) {
      case '"':
        if (field.trim() !== '') {
          throw new CsvParseError('unexpected quote inside unquoted field', line);
        }
        field = '';
        inQuotes = true;
        fieldStarted = true;
        break;
      case ',':
        fields.push(field);
        field = '';
        fieldStarted = true;
        afterClosingQuote = false;
        break;
      case '\r':
        break;
      case '\n':
        endRecord();
        line++;
        recordLine = line;
        break;
      default:
        field += char;
    }
  }

  if (inQuotes) {
    throw new CsvParseError('unterminated quoted field', recordLine);
  }
  endRecord();

  return records;
}

/**
 * Parse CSV text whose first record is the header row
 *
 * @throws CsvParseError on malformed quoting or a record whose field
 *   count differs from the header
 */
export function parseCsv(content: string): CsvTable {
  const records = tokenize(content.replace(/^\uFEFF/, ''));
  const [header, ...body] = records;
  if (!header) {
    throw new CsvParseError('missing header row', 1);
  }

  const headers = header.fields.map((h) => h.trim());
  const rows = body.map(({ fields, line }) => {
    if (fields.length !== headers.length) {
      throw new CsvParseError(
        `expected ${headers.length} fields, found ${fields.length}`,
        line
      );
    }
    return fields;
  });

  return { headers, rows };
}

/**
 * Quote a field when it contains a delimiter, quote or line break
 */
function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize a table back to CSV text (LF line endings, trailing newline)
 */
export function serializeCsv(table: CsvTable): string {
  const lines = [table.headers, ...table.rows].map((record) =>
    record.map(escapeCsvField).join(',')
  );
  return `${lines.join('\n')}\n`;
}

/**
 * Values of the named column, one per row
 *
 * @throws InvalidInputError when the column does not exist
 */
export function getColumn(table: CsvTable, name: string): string[] {
  const position = table.headers.indexOf(name);
  if (position === -1) {
    throw new InvalidInputError(
      `Unknown column "${name}". Available columns: ${table.headers.join(', ')}`
    );
  }
  return table.rows.map((row) => row[position] ?? '');
}
