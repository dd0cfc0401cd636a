/**
 * Collapse occurrence rows into the two lookup sets.
 */

import type { ResolvedColumns } from '../utils/columns.js';
import type { AggregationResult, CsvRow, InputRecord } from '../types/Taxon.js';

/** Unambiguous even when a field itself contains a tab. */
export function pairKey(species: string, kingdom: string): string {
  return JSON.stringify([species, kingdom]);
}

// Unicode whitespace incl. the U+001C-U+001F separators and NEL; U+FEFF is not whitespace here
const EDGE_WHITESPACE =
  /^[\t\n\v\f\r\x1c-\x20\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+|[\t\n\v\f\r\x1c-\x20\x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+$/g;

export function stripField(value: string): string {
  return value.replace(EDGE_WHITESPACE, '');
}

export function normalizeRecord(row: CsvRow, columns: ResolvedColumns): InputRecord {
  return {
    species: stripField(row[columns.species] ?? ''),
    genus: stripField(row[columns.genus] ?? ''),
    kingdom: stripField(row[columns.kingdom] ?? ''),
  };
}

/**
 * Search names: every species, plus the genus of rows with no species.
 * Pairs: species with kingdom only. Genus-only rows never get a kingdom
 * pairing, and blank rows are counted but otherwise ignored.
 */
export function aggregateRecords(rows: Iterable<CsvRow>, columns: ResolvedColumns): AggregationResult {
  const result: AggregationResult = {
    rowsRead: 0,
    searchNames: new Set<string>(),
    speciesKingdomPairs: new Map(),
  };

  for (const row of rows) {
    result.rowsRead++;
    const { species, genus, kingdom } = normalizeRecord(row, columns);

    if (species) {
      result.searchNames.add(species);
      if (kingdom) {
        result.speciesKingdomPairs.set(pairKey(species, kingdom), { species, kingdom });
      }
    } else if (genus) {
      result.searchNames.add(genus);
    }
  }

  return result;
}
