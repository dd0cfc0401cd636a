/**
 * prepConfig.ts
 *
 * Runtime knobs for the prep CLI, read from the environment (.env is loaded
 * by the CLI entry point through dotenv).
 */

import type { Logger } from '../utils/logger.js';

export interface PrepConfig {
  /** Suppress the sample listing after the report */
  quiet: boolean;
  /** How many sorted search names to echo after the report */
  sampleSize: number;
  /** Warn when no species↔kingdom pair was produced */
  requirePairs: boolean;
}

export const DEFAULT_PREP_CONFIG: PrepConfig = {
  quiet: false,
  sampleSize: 0,
  requirePairs: false,
};

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return TRUTHY.has(value.trim().toLowerCase());
}

function parseCount(name: string, value: string | undefined, fallback: number, logger: Logger): number {
  if (value === undefined || value.trim() === '') return fallback;

  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    logger.warn(`Ignoring ${name}=${value}: expected a non-negative integer, using ${fallback}`);
    return fallback;
  }
  return Number.parseInt(trimmed, 10);
}

export function loadPrepConfig(env: NodeJS.ProcessEnv, logger: Logger): PrepConfig {
  return {
    quiet: parseFlag(env.GBIF_PREP_QUIET, DEFAULT_PREP_CONFIG.quiet),
    sampleSize: parseCount('GBIF_PREP_SAMPLE_SIZE', env.GBIF_PREP_SAMPLE_SIZE, DEFAULT_PREP_CONFIG.sampleSize, logger),
    requirePairs: parseFlag(env.GBIF_PREP_REQUIRE_PAIRS, DEFAULT_PREP_CONFIG.requirePairs),
  };
}
