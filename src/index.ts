export { prepFromCsv, prepFromText, formatReport } from './pipeline/prep.js';
export { aggregateRecords, normalizeRecord, pairKey, stripField } from './pipeline/aggregate.js';
export {
  compareCodePoints,
  formatSpeciesKingdom,
  formatSpeciesSearch,
  outputPaths,
  sortSearchNames,
  sortSpeciesKingdomPairs,
  writeOutputs,
} from './pipeline/writeOutputs.js';
export { detectDelimiter, describeDelimiter, readFirstLine, sniffDelimiter, stripBom } from './utils/delimiter.js';
export { buildHeaderLookup, resolveColumns, REQUIRED_COLUMNS } from './utils/columns.js';
export type { RequiredColumn, ResolvedColumns } from './utils/columns.js';
export { parseDelimited, readRecords, readTextSafe } from './utils/csvSafeRead.js';
export { readQuoteTolerant } from './utils/quoteTolerantReader.js';
export type { DelimitedTable } from './utils/csvSafeRead.js';
export { loadPrepConfig, DEFAULT_PREP_CONFIG } from './config/prepConfig.js';
export type { PrepConfig } from './config/prepConfig.js';
export * from './utils/errors.js';
export type * from './types/Taxon.js';
