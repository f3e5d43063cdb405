import { join } from 'path';
import type { Config } from '../config';
import type { JobSource } from '../sources/base';
import { fieldNamesFor } from '../types/job';
import { JobCollectorService } from './job-collector';
import { JobExporter } from './exporter';
import { exportFileName } from '../utils/filename';
import { logger } from '../utils/logger';

export interface RunSummary {
  collected: number;
  exported: number;
  filePath?: string;
  failedPairs: number;
  durationMs: number;
}

export interface RunOptions {
  exporter?: JobExporter;
  now?: Date;
}

/**
 * One complete run: collect from every source, then export once
 */
export async function runJobExport(
  config: Config,
  sources: JobSource[],
  options: RunOptions = {}
): Promise<RunSummary> {
  const startTime = Date.now();

  logger.info('Configuration loaded', {
    searchTerms: config.searchTerms,
    resultsWanted: config.resultsWanted,
    maxDaysOld: config.maxDaysOld,
    targetRegion: config.targetRegion,
    submitterIdentity: config.submitterIdentity ?? null,
    filters: config.filters,
    exportScheme: config.export.scheme,
    sourceNames: sources.map(s => s.name),
  });

  if (sources.length === 0) {
    logger.warn('No job sources enabled! Check the ENABLE_* toggles or the sources setting');
  }

  const collector = new JobCollectorService(sources, config);
  const { records, errors } = await collector.collect(options.now ?? new Date());

  const exporter = options.exporter ?? new JobExporter(config.export);
  const filePath = join(config.outputDir, exportFileName(config.submitterIdentity, config.runId));
  const result = await exporter.export(records, fieldNamesFor(config.submitterIdentity), filePath);

  const summary: RunSummary = {
    collected: records.length,
    exported: result.entries,
    filePath: result.path,
    failedPairs: errors.length,
    durationMs: Date.now() - startTime,
  };

  logger.info('Job export completed', {
    ...summary,
    duration: `${summary.durationMs}ms`,
  });

  return summary;
}
