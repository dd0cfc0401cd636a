/**
 * Fallback reader for exports with broken quoting.
 *
 * csv-parse rejects these outright; this reader keeps going instead:
 * - an unterminated quoted field runs to the end of the input
 * - text after a closing quote is appended to the field (`"Puma" concolor` → `Puma concolor`)
 * - a quote inside an unquoted field is kept as a literal character
 *
 * Line breaks are normalized to \n first. Blank lines come back as empty records.
 */

import type { Delimiter } from '../types/Taxon.js';

const QUOTE = '"';

type ReaderState =
  | 'startRecord'
  | 'startField'
  | 'inField'
  | 'inQuotedField'
  | 'quoteInQuotedField'
  | 'eatNewline';

function isNewline(c: string | null): boolean {
  return c === '\n' || c === '\r';
}

class QuoteTolerantReader {
  readonly records: string[][] = [];
  private fields: string[] = [];
  private field = '';
  private state: ReaderState = 'startRecord';

  constructor(private readonly delimiter: Delimiter) {}

  readLine(line: string): void {
    for (const c of line) {
      this.feed(c);
    }
    // null marks the end of the physical line
    this.feed(null);
    if (this.state === 'startRecord') {
      this.records.push(this.fields);
      this.fields = [];
    }
  }

  finish(): string[][] {
    if (this.state === 'inQuotedField') {
      this.saveField();
      this.records.push(this.fields);
      this.fields = [];
      this.state = 'startRecord';
    }
    return this.records;
  }

  private saveField(): void {
    this.fields.push(this.field);
    this.field = '';
  }

  private endField(c: string | null): void {
    this.saveField();
    this.state = c === null ? 'startRecord' : 'eatNewline';
  }

  private startField(c: string | null): void {
    this.state = 'startField';
    if (c === null || isNewline(c)) {
      this.endField(c);
    } else if (c === QUOTE) {
      this.state = 'inQuotedField';
    } else if (c === this.delimiter) {
      this.saveField();
    } else {
      this.field += c;
      this.state = 'inField';
    }
  }

  private feed(c: string | null): void {
    switch (this.state) {
      case 'startRecord':
        if (c === null) return;
        if (isNewline(c)) {
          this.state = 'eatNewline';
          return;
        }
        this.startField(c);
        return;

      case 'startField':
        this.startField(c);
        return;

      case 'inField':
        if (c === null || isNewline(c)) {
          this.endField(c);
        } else if (c === this.delimiter) {
          this.saveField();
          this.state = 'startField';
        } else {
          this.field += c;
        }
        return;

      case 'inQuotedField':
        if (c === null) return;
        if (c === QUOTE) {
          this.state = 'quoteInQuotedField';
        } else {
          this.field += c;
        }
        return;

      case 'quoteInQuotedField':
        if (c === QUOTE) {
          // doubled quote
          this.field += c;
          this.state = 'inQuotedField';
        } else if (c === this.delimiter) {
          this.saveField();
          this.state = 'startField';
        } else if (c === null || isNewline(c)) {
          this.endField(c);
        } else {
          this.field += c;
          this.state = 'inField';
        }
        return;

      case 'eatNewline':
        if (c === null) this.state = 'startRecord';
        return;
    }
  }
}

/**
 * Parse delimited text without ever failing on quoting.
 */
export function readQuoteTolerant(text: string, delimiter: Delimiter): string[][] {
  const reader = new QuoteTolerantReader(delimiter);
  const normalized = text.replace(/\r\n?/g, '\n');
  if (normalized.length === 0) return [];

  for (const line of normalized.split(/(?<=\n)/)) {
    reader.readLine(line);
  }
  return reader.finish();
}
