import type { JobPosting } from '../types/job';

/**
 * Base interface for all job sources
 * Each source adapter must implement this interface
 */
export interface JobSource {
  /**
   * Unique identifier for the source, written to the Job Source column
   */
  readonly name: string;

  /**
   * Searches the source for a term
   * @param term - Search term as entered by the user
   * @param count - Upper bound on the number of postings returned
   */
  scrape(term: string, count: number): Promise<JobPosting[]>;
}
