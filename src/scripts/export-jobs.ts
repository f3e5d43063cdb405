import './load-env';

import { loadConfig } from '../config';
import { parseCliArgs, USAGE } from '../config/args';
import { createJobSources } from '../sources';
import { runJobExport } from '../services/pipeline';
import { logger } from '../utils/logger';

/**
 * Job export script
 * Collects matching postings from every enabled source and writes one export file
 */
async function main() {
  try {
    const args = parseCliArgs(process.argv.slice(2));
    if (args.help) {
      console.log(USAGE);
      process.exit(0);
    }

    const config = loadConfig({ cli: args.layer, configPath: args.configPath });
    const summary = await runJobExport(config, createJobSources(config));

    if (!summary.filePath) {
      logger.info('Nothing to export');
    }
    process.exit(0);
  } catch (error) {
    logger.error('Job export failed', error);
    process.exit(1);
  }
}

void main();
