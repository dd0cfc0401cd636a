export type Delimiter = ',' | '\t';

export interface CsvRow {
  [column: string]: string;
}

/** One data row after the three required columns have been trimmed. */
export interface InputRecord {
  species: string;
  genus: string;
  kingdom: string;
}

export interface SpeciesKingdomPair {
  species: string;
  kingdom: string;
}

export interface AggregationResult {
  rowsRead: number;
  /** Species names, plus genus names for rows without a species. */
  searchNames: Set<string>;
  /** Keyed by `pairKey(species, kingdom)`. */
  speciesKingdomPairs: Map<string, SpeciesKingdomPair>;
}

export interface OutputPaths {
  speciesSearchPath: string;
  speciesKingdomPath: string;
}

export interface PrepSummary extends OutputPaths {
  delimiter: Delimiter;
  rowsRead: number;
  uniqueSearchNames: number;
  uniquePairs: number;
  /** Search names in output order. */
  searchNames: string[];
}
