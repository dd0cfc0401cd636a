/**
 * Serialize the aggregated sets.
 *
 * Ordering is by Unicode code point, never locale, so repeated runs on the
 * same input produce byte-identical files on any machine.
 */

import { writeFileSync } from 'fs';
import { stringify } from 'csv-stringify/sync';
import type { AggregationResult, OutputPaths, SpeciesKingdomPair } from '../types/Taxon.js';

export const SPECIES_SEARCH_SUFFIX = '_species_search.txt';
export const SPECIES_KINGDOM_SUFFIX = '_species_kingdom.tsv';

export function outputPaths(prefix: string): OutputPaths {
  return {
    speciesSearchPath: `${prefix}${SPECIES_SEARCH_SUFFIX}`,
    speciesKingdomPath: `${prefix}${SPECIES_KINGDOM_SUFFIX}`,
  };
}

export function compareCodePoints(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(i) ?? 0;
    if (left !== right) return left - right;
    i += left > 0xffff ? 2 : 1;
  }
  return a.length - b.length;
}

export function sortSearchNames(names: Iterable<string>): string[] {
  return [...names].sort(compareCodePoints);
}

export function sortSpeciesKingdomPairs(pairs: Iterable<SpeciesKingdomPair>): SpeciesKingdomPair[] {
  return [...pairs].sort(
    (a, b) => compareCodePoints(a.species, b.species) || compareCodePoints(a.kingdom, b.kingdom),
  );
}

/** One name per line, each newline-terminated. */
export function formatSpeciesSearch(names: Iterable<string>): string {
  return sortSearchNames(names)
    .map((name) => `${name}\n`)
    .join('');
}

/** species<TAB>kingdom per line, CRLF-terminated, no header. */
export function formatSpeciesKingdom(pairs: Iterable<SpeciesKingdomPair>): string {
  const records = sortSpeciesKingdomPairs(pairs).map((pair) => [pair.species, pair.kingdom]);
  return stringify(records, { delimiter: '\t', record_delimiter: 'windows' });
}

/**
 * Write the search list, then the kingdom map. A failure on the second
 * write leaves the first file in place.
 */
export function writeOutputs(result: AggregationResult, prefix: string): OutputPaths {
  const paths = outputPaths(prefix);
  writeFileSync(paths.speciesSearchPath, formatSpeciesSearch(result.searchNames), 'utf-8');
  writeFileSync(paths.speciesKingdomPath, formatSpeciesKingdom(result.speciesKingdomPairs.values()), 'utf-8');
  return paths;
}
