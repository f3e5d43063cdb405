import type { JobPosting } from '../types/job';
import type { Config } from '../config';
import { calendarDaysBetween } from '../utils/dates';
import { logger } from '../utils/logger';

export type FilterVerdict = 'accepted' | 'keyword' | 'too-old' | 'location';

/**
 * Upper-cased, trimmed state/region; `Unknown` when absent
 */
export function normalizeState(state: string | undefined): string {
  return state && state.trim() ? state.trim().toUpperCase() : 'Unknown';
}

/**
 * Filters postings based on configuration.
 * Checks run in a fixed order (keyword, recency, location); the first failure decides.
 */
export class JobFilter {
  private readonly terms: string[];
  private readonly targetRegion: string;

  constructor(
    private config: Config,
    private today: Date
  ) {
    this.terms = config.searchTerms.map(term => term.toLowerCase());
    this.targetRegion = config.targetRegion.trim().toUpperCase();
  }

  /**
   * Title contains at least one search term (case-insensitive)
   */
  matchesKeywords(posting: JobPosting): boolean {
    const title = posting.title.toLowerCase();
    return this.terms.some(term => title.includes(term));
  }

  isRecent(posting: JobPosting): boolean {
    if (!posting.datePosted) {
      return !this.config.filters.requirePostingDate;
    }
    return calendarDaysBetween(this.today, posting.datePosted) <= this.config.maxDaysOld;
  }

  /**
   * Remote postings pass regardless of region
   */
  matchesLocation(posting: JobPosting): boolean {
    return posting.isRemote || normalizeState(posting.location?.state) === this.targetRegion;
  }

  evaluate(posting: JobPosting): FilterVerdict {
    if (this.config.filters.keywordMatch && !this.matchesKeywords(posting)) {
      logger.debug(`Job filtered out: no matching search term`, { job: posting.title });
      return 'keyword';
    }

    if (!this.isRecent(posting)) {
      logger.debug(`Job filtered out: too old`, {
        job: posting.title,
        datePosted: posting.datePosted?.toISOString() ?? null,
      });
      return 'too-old';
    }

    if (!this.matchesLocation(posting)) {
      logger.debug(`Job filtered out: location mismatch`, {
        job: posting.title,
        state: normalizeState(posting.location?.state),
      });
      return 'location';
    }

    return 'accepted';
  }

  matches(posting: JobPosting): boolean {
    return this.evaluate(posting) === 'accepted';
  }

  /**
   * Filters an array of postings, keeping their order
   */
  filter(postings: JobPosting[]): JobPosting[] {
    return postings.filter(posting => this.matches(posting));
  }
}
