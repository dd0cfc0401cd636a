import { prepFromCsv, formatReport } from '../pipeline/prep.js';
import { loadPrepConfig } from '../config/prepConfig.js';
import { createLogger } from '../utils/logger.js';
import { describeDelimiter } from '../utils/delimiter.js';
import { PrepError, UsageError } from '../utils/errors.js';

export const USAGE = [
  'Usage: gbif-prep GBIF_download.csv OUTPREFIX',
  "  GBIF_download.csv : GBIF occurrence or checklist file (CSV or TSV; must contain columns 'species', 'genus', 'kingdom')",
  '  OUTPREFIX         : prefix for generated files',
].join('\n');

/**
 * Run the prep CLI and return the process exit code.
 */
export function runCli(args: readonly string[], env: NodeJS.ProcessEnv = process.env): number {
  try {
    if (args.length !== 2) {
      throw new UsageError(USAGE);
    }
    const [inputPath, outPrefix] = args;

    const config = loadPrepConfig(env, createLogger());
    const logger = createLogger({ quiet: config.quiet });

    const summary = prepFromCsv(inputPath, outPrefix);
    console.error(formatReport(summary));
    logger.info(`  Dialect detected        : ${describeDelimiter(summary.delimiter)}`);

    if (config.requirePairs && summary.uniquePairs === 0) {
      logger.warn(`No species↔kingdom pairs produced: ${summary.speciesKingdomPath} is empty`);
    }

    if (config.sampleSize > 0 && summary.searchNames.length > 0) {
      logger.info('\n📊 Sample names:');
      for (const name of summary.searchNames.slice(0, config.sampleSize)) {
        logger.info(`   - ${name}`);
      }
    }

    return 0;
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(err.message);
      return err.exitCode;
    }
    if (err instanceof PrepError) {
      createLogger().error(err.message);
      return err.exitCode;
    }
    const message = err instanceof Error ? err.message : String(err);
    createLogger().error(`GBIF prep failed: ${message}`);
    return 1;
  }
}
