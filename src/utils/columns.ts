import { MissingColumnsError } from './errors.js';

export const REQUIRED_COLUMNS = ['species', 'genus', 'kingdom'] as const;

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

/** Original header names for each required column. */
export type ResolvedColumns = Record<RequiredColumn, string>;

/**
 * Lowercased header name → header name as written. A later duplicate wins.
 */
export function buildHeaderLookup(header: readonly string[]): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const name of header) {
    lookup.set(name.toLowerCase(), name);
  }
  return lookup;
}

export function resolveColumns(header: readonly string[]): ResolvedColumns {
  const lookup = buildHeaderLookup(header);
  const species = lookup.get('species');
  const genus = lookup.get('genus');
  const kingdom = lookup.get('kingdom');

  if (species === undefined || genus === undefined || kingdom === undefined) {
    const missing = REQUIRED_COLUMNS.filter((name) => !lookup.has(name));
    throw new MissingColumnsError(missing, header);
  }

  return { species, genus, kingdom };
}
