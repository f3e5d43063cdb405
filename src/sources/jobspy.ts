import { scrapeJobs } from 'ts-jobspy';
import { z } from 'zod';
import type { JobSource } from './base';
import type { Compensation, JobLocation, JobPosting, JobType } from '../types/job';
import { parseLocationText } from './location';
import { parseDate } from '../utils/dates';
import { logger } from '../utils/logger';

export const JOBSPY_SITES = ['google', 'linkedin', 'indeed'] as const;
export type JobSpySite = (typeof JOBSPY_SITES)[number];

const JOB_TYPES: Record<string, JobType> = {
  fulltime: 'FULL_TIME',
  parttime: 'PART_TIME',
  contract: 'CONTRACT',
  temporary: 'TEMPORARY',
  internship: 'INTERNSHIP',
  perdiem: 'PER_DIEM',
  nights: 'NIGHTS',
  summer: 'SUMMER',
  volunteer: 'VOLUNTEER',
};

const optionalText = z.string().nullish().catch(undefined);
const optionalAmount = z.number().nullish().catch(undefined);

const jobPostSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish().catch(undefined),
  title: z.string().trim().min(1),
  jobUrl: z.string().trim().min(1),
  companyName: optionalText,
  companyIndustry: optionalText,
  jobLevel: optionalText,
  jobType: z.array(z.string()).nullish().catch(undefined),
  isRemote: z.boolean().nullish().catch(undefined),
  datePosted: z.union([z.string(), z.number(), z.date()]).nullish().catch(undefined),
  location: z
    .union([
      z.string(),
      z.object({ city: optionalText, state: optionalText, country: z.unknown() }),
    ])
    .nullish()
    .catch(undefined),
  compensation: z
    .object({ currency: optionalText, minAmount: optionalAmount, maxAmount: optionalAmount })
    .nullish()
    .catch(undefined),
  description: optionalText,
});

type JobPost = z.infer<typeof jobPostSchema>;

const responseSchema = z.union([
  z.array(z.unknown()),
  z.object({ jobs: z.array(z.unknown()) }).transform(response => response.jobs),
]);

function text(value: string | null | undefined): string | undefined {
  return value && value.trim() ? value.trim() : undefined;
}

function countryName(value: unknown): string | undefined {
  if (typeof value === 'string') return text(value);
  if (typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string') {
    return text(value.name);
  }
  return undefined;
}

/**
 * Job board adapter backed by ts-jobspy (Google, LinkedIn, Indeed).
 * Unlike the remote-only feeds, these boards return on-site postings with a state.
 */
export class JobSpySource implements JobSource {
  readonly name: JobSpySite;

  constructor(site: JobSpySite) {
    this.name = site;
  }

  async scrape(term: string, count: number): Promise<JobPosting[]> {
    try {
      logger.info(`Searching ${this.name} for "${term}"`, { count });

      const response: unknown = await scrapeJobs({
        siteName: [this.name],
        searchTerm: term,
        resultsWanted: count,
      });

      const parsed = responseSchema.safeParse(response);
      if (!parsed.success) {
        logger.warn(`${this.name} returned an unexpected response shape`);
        return [];
      }

      const postings: JobPosting[] = [];
      let skippedInvalid = 0;

      for (const item of parsed.data) {
        if (postings.length >= count) break;

        const job = jobPostSchema.safeParse(item);
        if (!job.success) {
          skippedInvalid++;
          continue;
        }
        postings.push(this.toPosting(job.data));
      }

      logger.info(`Fetched ${postings.length} postings from ${this.name}`, {
        term,
        totalItems: parsed.data.length,
        skippedInvalid,
      });
      return postings;
    } catch (error) {
      logger.error(`Error fetching jobs from ${this.name}`, error, { term });
      throw error;
    }
  }

  private toPosting(job: JobPost): JobPosting {
    const datePosted = job.datePosted instanceof Date ? job.datePosted : parseDate(job.datePosted);

    return {
      id: job.id === null || job.id === undefined ? job.jobUrl : String(job.id),
      title: job.title,
      companyName: text(job.companyName),
      companyIndustry: text(job.companyIndustry),
      jobLevel: text(job.jobLevel),
      jobTypes: this.toJobTypes(job.jobType),
      isRemote: job.isRemote ?? false,
      compensation: this.toCompensation(job.compensation),
      datePosted: datePosted && !isNaN(datePosted.getTime()) ? datePosted : undefined,
      location: this.toLocation(job.location),
      description: text(job.description),
      jobUrl: job.jobUrl,
    };
  }

  private toJobTypes(types: string[] | null | undefined): JobType[] | undefined {
    if (!types || types.length === 0) return undefined;
    return types.map(type => JOB_TYPES[type.toLowerCase().replace(/[^a-z]/g, '')] ?? 'OTHER');
  }

  private toLocation(location: JobPost['location']): JobLocation | undefined {
    if (!location) return undefined;
    if (typeof location === 'string') return parseLocationText(location);

    const result: JobLocation = {
      city: text(location.city),
      state: text(location.state),
      country: countryName(location.country),
    };
    return result.city || result.state || result.country ? result : undefined;
  }

  private toCompensation(compensation: JobPost['compensation']): Compensation | undefined {
    if (!compensation) return undefined;
    const minAmount = compensation.minAmount ?? undefined;
    const maxAmount = compensation.maxAmount ?? undefined;
    if (minAmount === undefined && maxAmount === undefined) return undefined;
    return { currency: text(compensation.currency) ?? 'USD', minAmount, maxAmount };
  }
}
