import type { JobSource } from '../sources/base';
import type { JobPosting, NormalizedRecord } from '../types/job';
import type { Config } from '../config';
import { JobFilter } from '../filters/job-filter';
import { toNormalizedRecord, type NormalizeOptions } from './normalizer';
import { activeDelimiter } from './exporter';
import { CollectionFailedError, FetchError } from '../utils/errors';
import { logger } from '../utils/logger';

export type PairResult =
  | { ok: true; postings: JobPosting[] }
  | { ok: false; error: FetchError };

export interface PairStats {
  term: string;
  source: string;
  fetched: number;
  accepted: number;
  rejectedKeyword: number;
  rejectedTooOld: number;
  rejectedLocation: number;
  failed: boolean;
}

export interface CollectionResult {
  records: NormalizedRecord[];
  errors: FetchError[];
  stats: PairStats[];
}

/**
 * Runs every search term against every source and keeps the postings that pass the filters
 */
export class JobCollectorService {
  private readonly normalizeOptions: NormalizeOptions;

  constructor(
    private sources: JobSource[],
    private config: Config
  ) {
    this.normalizeOptions = {
      descriptionMode: config.description.mode,
      descriptionMaxLength: config.description.maxLength,
      delimiter: activeDelimiter(config.export),
      submitterIdentity: config.submitterIdentity,
    };
  }

  /**
   * Calls one source, capturing its failure instead of throwing
   */
  async fetchPair(source: JobSource, term: string): Promise<PairResult> {
    try {
      const postings = await source.scrape(term, this.config.resultsWanted);
      return { ok: true, postings };
    } catch (error) {
      return { ok: false, error: new FetchError(source.name, term, error) };
    }
  }

  /**
   * Terms are processed in the order given, sources in declared order.
   * Records keep the order each source returned them in.
   */
  async collect(today: Date = new Date()): Promise<CollectionResult> {
    const filter = new JobFilter(this.config, today);
    const records: NormalizedRecord[] = [];
    const errors: FetchError[] = [];
    const stats: PairStats[] = [];

    logger.info(`Collecting jobs`, {
      searchTerms: this.config.searchTerms,
      sources: this.sources.map(s => s.name),
    });

    for (const term of this.config.searchTerms) {
      for (const source of this.sources) {
        const pairStats: PairStats = {
          term,
          source: source.name,
          fetched: 0,
          accepted: 0,
          rejectedKeyword: 0,
          rejectedTooOld: 0,
          rejectedLocation: 0,
          failed: false,
        };
        stats.push(pairStats);

        logger.info(`Scraping "${term}" from ${source.name}`);
        const result = await this.fetchPair(source, term);

        if (!result.ok) {
          pairStats.failed = true;
          errors.push(result.error);
          logger.error(`Source ${source.name} failed`, result.error.cause, { term });
          // Continue with other pairs - isolated failures
          continue;
        }

        pairStats.fetched = result.postings.length;

        for (const posting of result.postings) {
          switch (filter.evaluate(posting)) {
            case 'keyword':
              pairStats.rejectedKeyword++;
              break;
            case 'too-old':
              pairStats.rejectedTooOld++;
              break;
            case 'location':
              pairStats.rejectedLocation++;
              break;
            case 'accepted':
              pairStats.accepted++;
              records.push(toNormalizedRecord(posting, source.name, this.normalizeOptions));
              break;
          }
        }

        logger.info(`Source ${source.name} completed`, {
          term,
          fetched: pairStats.fetched,
          accepted: pairStats.accepted,
          rejectedKeyword: pairStats.rejectedKeyword,
          rejectedTooOld: pairStats.rejectedTooOld,
          rejectedLocation: pairStats.rejectedLocation,
        });
      }
    }

    if (stats.length > 0 && errors.length === stats.length) {
      throw new CollectionFailedError(errors);
    }

    logger.info(`${records.length} jobs retrieved`, {
      targetRegion: this.config.targetRegion,
      failedPairs: errors.length,
    });

    return { records, errors, stats };
  }
}
