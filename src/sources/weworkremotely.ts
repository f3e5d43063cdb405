import Parser from 'rss-parser';
import type { JobSource } from './base';
import type { JobPosting, JobType } from '../types/job';
import { parseLocationText } from './location';
import { extractSeniority } from './seniority';
import { parseDate } from '../utils/dates';
import { logger } from '../utils/logger';

interface WWRFeedItem {
  region?: string;
  category?: string;
  type?: string;
}

const JOB_TYPES: Record<string, JobType> = {
  'full-time': 'FULL_TIME',
  'part-time': 'PART_TIME',
  contract: 'CONTRACT',
  internship: 'INTERNSHIP',
};

/**
 * WeWorkRemotely RSS adapter
 * Search feed: https://weworkremotely.com/remote-jobs/search.rss?term=<term>
 */
export class WeWorkRemotelySource implements JobSource {
  readonly name = 'weworkremotely';
  private readonly searchUrl = 'https://weworkremotely.com/remote-jobs/search.rss';
  private readonly parser: Parser<Record<string, unknown>, WWRFeedItem>;

  constructor() {
    this.parser = new Parser<Record<string, unknown>, WWRFeedItem>({
      customFields: {
        item: ['region', 'category', 'type'],
      },
    });
  }

  async scrape(term: string, count: number): Promise<JobPosting[]> {
    const url = `${this.searchUrl}?term=${encodeURIComponent(term)}`;

    try {
      logger.info(`Searching ${this.name} for "${term}"`, { url, count });

      const feed = await this.parser.parseURL(url);
      const items = feed.items || [];

      const postings: JobPosting[] = [];
      let skippedInvalid = 0;

      for (const item of items) {
        if (postings.length >= count) break;

        if (!item.title || !item.link) {
          skippedInvalid++;
          logger.debug(`Skipping item with missing title or link`, {
            hasTitle: !!item.title,
            hasLink: !!item.link,
          });
          continue;
        }

        const { company, title } = this.splitTitle(item.title);

        postings.push({
          id: item.guid || item.link,
          title,
          companyName: company,
          companyIndustry: item.category,
          jobLevel: extractSeniority(title),
          jobTypes: this.toJobTypes(item.type),
          isRemote: true,
          datePosted: parseDate(item.isoDate) ?? parseDate(item.pubDate),
          location: parseLocationText(item.region),
          description: item.contentSnippet || item.content,
          jobUrl: item.link,
        });
      }

      logger.info(`Fetched ${postings.length} postings from ${this.name}`, {
        term,
        totalItems: items.length,
        skippedInvalid,
      });
      return postings;
    } catch (error) {
      logger.error(`Error fetching jobs from ${this.name}`, error, { term });
      throw error;
    }
  }

  /**
   * Feed titles read "Company Name: Job Title"
   */
  private splitTitle(raw: string): { company?: string; title: string } {
    const colonMatch = raw.match(/^(.+?):\s*(.+)$/);
    if (colonMatch) {
      return { company: colonMatch[1].trim(), title: colonMatch[2].trim() };
    }
    return { title: raw.trim() };
  }

  private toJobTypes(type: string | undefined): JobType[] | undefined {
    if (!type) return undefined;
    const jobType = JOB_TYPES[type.trim().toLowerCase()];
    return jobType ? [jobType] : ['OTHER'];
  }
}
