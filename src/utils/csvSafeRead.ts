/**
 * Safe delimited-text reading
 *
 * Handles:
 * - Quoted delimiters and multiline fields
 * - Broken quoting (falls back to the quote-tolerant reader)
 * - BOM removal
 * - Short and long rows (missing fields read as '')
 * - Lossy UTF-8 decoding (bad bytes become U+FFFD)
 */

import { readFileSync, existsSync } from 'fs';
import { CsvError } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import { InputNotFoundError } from './errors.js';
import { readFirstLine, stripBom } from './delimiter.js';
import { readQuoteTolerant } from './quoteTolerantReader.js';
import type { CsvRow, Delimiter } from '../types/Taxon.js';

export interface DelimitedTable {
  header: string[];
  /** Lazily built; each row maps header name → field. */
  rows: Iterable<CsvRow>;
}

/**
 * Read a text file as UTF-8, replacing undecodable bytes, with any BOM removed.
 */
export function readTextSafe(filePath: string): string {
  if (!existsSync(filePath)) {
    throw new InputNotFoundError(filePath);
  }
  return stripBom(readFileSync(filePath, 'utf-8'));
}

function* toRows(header: readonly string[], records: readonly string[][]): Generator<CsvRow> {
  for (const values of records) {
    // Later duplicates of a header name overwrite earlier ones
    yield Object.fromEntries(header.map((name, idx) => [name, values[idx] ?? '']));
  }
}

const QUOTING_ERRORS = new Set<string>([
  'CSV_QUOTE_NOT_CLOSED',
  'CSV_INVALID_CLOSING_QUOTE',
  'INVALID_OPENING_QUOTE',
]);

/**
 * Non-blank records of the text. Anything csv-parse rejects for its quoting
 * is read again by the quote-tolerant reader.
 */
export function readRecords(text: string, delimiter: Delimiter): string[][] {
  try {
    const records: string[][] = parse(text, {
      delimiter,
      bom: true,
      columns: false,
      skip_empty_lines: true,
      relax_column_count: true,
    });
    return records;
  } catch (err) {
    if (err instanceof CsvError && QUOTING_ERRORS.has(err.code)) {
      return readQuoteTolerant(stripBom(text), delimiter).filter((record) => record.length > 0);
    }
    throw err;
  }
}

/**
 * Split text into a header and rows. The header is always the first line:
 * a blank first line gives an empty header. Blank data lines are skipped.
 */
export function parseDelimited(text: string, delimiter: Delimiter): DelimitedTable {
  const records = readRecords(text, delimiter);

  if (readFirstLine(stripBom(text)) === '') {
    return { header: [], rows: toRows([], records) };
  }

  const [header = [], ...data] = records;
  return { header, rows: toRows(header, data) };
}
