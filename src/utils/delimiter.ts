/**
 * Dialect sniffing for GBIF downloads.
 *
 * GBIF hands out both "simple CSV" (actually tab-separated) and true CSV
 * exports, so the header line decides which one we are reading.
 */

import { EmptyInputError } from './errors.js';
import type { Delimiter } from '../types/Taxon.js';

const BOM = '\uFEFF';

export function stripBom(text: string): string {
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

/**
 * First physical line without its line terminator, or null when there is
 * no line at all.
 */
export function readFirstLine(text: string): string | null {
  if (text.length === 0) return null;

  const end = text.indexOf('\n');
  const line = end === -1 ? text : text.slice(0, end);
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function countChar(line: string, char: string): number {
  let count = 0;
  for (const c of line) {
    if (c === char) count++;
  }
  return count;
}

/**
 * Tab-only → tab, comma-only → comma. Otherwise the more frequent of the
 * two wins, with ties going to tab.
 */
export function detectDelimiter(firstLine: string): Delimiter {
  const tabs = countChar(firstLine, '\t');
  const commas = countChar(firstLine, ',');

  if (tabs > 0 && commas === 0) return '\t';
  if (commas > 0 && tabs === 0) return ',';
  return tabs >= commas ? '\t' : ',';
}

/**
 * Detect the delimiter of already-decoded, BOM-stripped text.
 * `source` only labels the error.
 */
export function sniffDelimiter(text: string, source: string): Delimiter {
  const firstLine = readFirstLine(text);
  if (firstLine === null) {
    throw new EmptyInputError(source);
  }
  return detectDelimiter(firstLine);
}

export function describeDelimiter(delimiter: Delimiter): string {
  return delimiter === '\t' ? 'tab' : 'comma';
}
