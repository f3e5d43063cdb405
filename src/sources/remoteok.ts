import fetch from 'node-fetch';
import type { JobSource } from './base';
import type { Compensation, JobPosting } from '../types/job';
import { parseLocationText } from './location';
import { extractSeniority } from './seniority';
import { parseDate } from '../utils/dates';
import { logger } from '../utils/logger';

const USER_AGENT = 'Mozilla/5.0 (compatible; jobsift/1.0)';

type RawItem = Record<string, unknown>;

function isRawItem(value: unknown): value is RawItem {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim() || undefined;
  if (typeof value === 'number') return String(value);
  return undefined;
}

function amount(value: unknown): number | undefined {
  return typeof value === 'number' && value > 0 ? value : undefined;
}

/**
 * RemoteOK API adapter
 * API Documentation: https://remoteok.com/api
 */
export class RemoteOKSource implements JobSource {
  readonly name = 'remoteok';
  private readonly apiUrl = 'https://remoteok.com/api';

  async scrape(term: string, count: number): Promise<JobPosting[]> {
    const url = `${this.apiUrl}?tag=${encodeURIComponent(term)}`;

    try {
      logger.info(`Searching ${this.name} for "${term}"`, { url, count });

      const response = await fetch(url, { headers: { 'User-Agent': USER_AGENT } });
      if (!response.ok) {
        throw new Error(`RemoteOK API returned ${response.status}`);
      }

      const data: unknown = await response.json();

      if (!Array.isArray(data)) {
        logger.warn(`RemoteOK API returned non-array data: ${typeof data}`);
        return [];
      }

      const postings: JobPosting[] = [];
      let skippedInvalid = 0;

      for (const item of data) {
        if (postings.length >= count) break;

        // The first element is a legal notice without an id
        const posting = isRawItem(item) ? this.toPosting(item) : undefined;
        if (!posting) {
          skippedInvalid++;
          continue;
        }
        postings.push(posting);
      }

      logger.info(`Fetched ${postings.length} postings from ${this.name}`, {
        term,
        totalItems: data.length,
        skippedInvalid,
      });
      return postings;
    } catch (error) {
      logger.error(`Error fetching jobs from ${this.name}`, error, { term });
      throw error;
    }
  }

  private toPosting(item: RawItem): JobPosting | undefined {
    const id = text(item.id);
    const title = text(item.position) ?? text(item.title);
    if (!id || !title) return undefined;

    const epoch = typeof item.epoch === 'number' ? item.epoch * 1000 : undefined;

    return {
      id,
      title,
      companyName: text(item.company),
      jobLevel: extractSeniority(title),
      isRemote: true,
      compensation: this.toCompensation(item),
      datePosted: parseDate(item.date) ?? parseDate(epoch),
      location: parseLocationText(text(item.location)),
      description: text(item.description),
      jobUrl: text(item.url) ?? text(item.apply_url) ?? `https://remoteok.com/remote-jobs/${id}`,
    };
  }

  private toCompensation(item: RawItem): Compensation | undefined {
    const minAmount = amount(item.salary_min);
    const maxAmount = amount(item.salary_max);
    if (minAmount === undefined && maxAmount === undefined) return undefined;
    return { currency: 'USD', minAmount, maxAmount };
  }
}
