import { vi } from 'vitest';
import { buildConfig, type Config, type ConfigLayer } from '../src/config';
import type { JobSource } from '../src/sources/base';
import type { JobPosting } from '../src/types/job';

export const TODAY = new Date('2026-03-10T12:00:00.000Z');

export function daysAgo(days: number): Date {
  return new Date(TODAY.getTime() - days * 24 * 60 * 60 * 1000);
}

export function makeConfig(layer: ConfigLayer = {}): Config {
  return buildConfig({ searchTerms: ['CRM Manager'], ...layer });
}

export function makePosting(overrides: Partial<JobPosting> = {}): JobPosting {
  return {
    id: 'job-1',
    title: 'CRM Manager',
    isRemote: false,
    datePosted: TODAY,
    location: { state: 'NY' },
    jobUrl: 'https://example.com/jobs/1',
    ...overrides,
  };
}

export function fakeSource(
  name: string,
  scrape: JobSource['scrape']
) {
  return { name, scrape: vi.fn(scrape) };
}
