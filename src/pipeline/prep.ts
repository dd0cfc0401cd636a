/**
 * GBIF prep: occurrence/checklist export → species search list + species↔kingdom map.
 */

import { readTextSafe, parseDelimited } from '../utils/csvSafeRead.js';
import { sniffDelimiter, stripBom } from '../utils/delimiter.js';
import { resolveColumns } from '../utils/columns.js';
import { aggregateRecords } from './aggregate.js';
import { sortSearchNames, writeOutputs } from './writeOutputs.js';
import type { PrepSummary } from '../types/Taxon.js';

/**
 * Run the whole pipeline on decoded text. Nothing is written unless the
 * header carries all required columns.
 */
export function prepFromText(text: string, outPrefix: string, source = '<input>'): PrepSummary {
  const content = stripBom(text);
  const delimiter = sniffDelimiter(content, source);
  const table = parseDelimited(content, delimiter);
  const columns = resolveColumns(table.header);

  const result = aggregateRecords(table.rows, columns);
  const paths = writeOutputs(result, outPrefix);

  return {
    ...paths,
    delimiter,
    rowsRead: result.rowsRead,
    uniqueSearchNames: result.searchNames.size,
    uniquePairs: result.speciesKingdomPairs.size,
    searchNames: sortSearchNames(result.searchNames),
  };
}

export function prepFromCsv(inputPath: string, outPrefix: string): PrepSummary {
  return prepFromText(readTextSafe(inputPath), outPrefix, inputPath);
}

export function formatReport(summary: PrepSummary): string {
  return [
    'GBIF prep complete.',
    `  Rows read from GBIF file : ${summary.rowsRead}`,
    `  Unique names for search : ${summary.uniqueSearchNames} -> ${summary.speciesSearchPath}`,
    `  Unique species↔kingdom  : ${summary.uniquePairs} -> ${summary.speciesKingdomPath}`,
  ].join('\n');
}
