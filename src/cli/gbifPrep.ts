#!/usr/bin/env node
/**
 * GBIF prep
 *
 * Turns a GBIF occurrence or checklist download into:
 *   OUTPREFIX_species_search.txt   (names to search for)
 *   OUTPREFIX_species_kingdom.tsv  (species → kingdom, for the splitter)
 *
 * Usage:
 *   npx tsx src/cli/gbifPrep.ts GBIF_download.csv OUTPREFIX
 */

import 'dotenv/config';
import { runCli } from './run.js';

process.exit(runCli(process.argv.slice(2)));
