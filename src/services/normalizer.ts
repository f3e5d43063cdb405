import type { DescriptionMode } from '../config';
import { USER_FIELD_NAME, type JobPosting, type NormalizedRecord } from '../types/job';
import { normalizeState } from '../filters/job-filter';
import { formatCalendarDate } from '../utils/dates';

const UNKNOWN = 'Unknown';
const NOT_PROVIDED = 'Not Provided';
const NO_DESCRIPTION = 'No description available';

export interface NormalizeOptions {
  descriptionMode: DescriptionMode;
  descriptionMaxLength: number;
  /** Character removed from descriptions in sanitize mode */
  delimiter: string;
  submitterIdentity?: string;
}

function orDefault(value: string | undefined, fallback: string): string {
  return value && value.trim() ? value : fallback;
}

function amountOrDefault(value: number | undefined): string {
  return value === undefined ? NOT_PROVIDED : String(value);
}

export function normalizeDescription(
  description: string | undefined,
  options: Pick<NormalizeOptions, 'descriptionMode' | 'descriptionMaxLength' | 'delimiter'>
): string {
  if (!description) return NO_DESCRIPTION;
  if (options.descriptionMode === 'sanitize') {
    return description.split(options.delimiter).join('');
  }
  // Code points, so a surrogate pair is never split
  const chars = Array.from(description);
  return chars.length > options.descriptionMaxLength
    ? chars.slice(0, options.descriptionMaxLength).join('')
    : description;
}

/**
 * Flattens a posting into export fields, filling absent values with placeholders
 */
export function toNormalizedRecord(
  posting: JobPosting,
  sourceName: string,
  options: NormalizeOptions
): NormalizedRecord {
  const { compensation, location } = posting;

  const record: NormalizedRecord = {
    'Job ID': posting.id,
    'Job Title (Primary)': posting.title,
    'Company Name': orDefault(posting.companyName, UNKNOWN),
    'Industry': orDefault(posting.companyIndustry, NOT_PROVIDED),
    'Experience Level': orDefault(posting.jobLevel, NOT_PROVIDED),
    'Job Type': posting.jobTypes?.[0] ?? NOT_PROVIDED,
    'Is Remote': String(posting.isRemote),
    'Currency': orDefault(compensation?.currency, NOT_PROVIDED),
    'Salary Min': amountOrDefault(compensation?.minAmount),
    'Salary Max': amountOrDefault(compensation?.maxAmount),
    'Date Posted': posting.datePosted ? formatCalendarDate(posting.datePosted) : NOT_PROVIDED,
    'Location City': location?.city?.trim() || UNKNOWN,
    'Location State': normalizeState(location?.state),
    'Location Country': location?.country?.trim() || UNKNOWN,
    'Job URL': posting.jobUrl,
    'Job Description': normalizeDescription(posting.description, options),
    'Job Source': sourceName,
  };

  if (options.submitterIdentity) {
    record[USER_FIELD_NAME] = options.submitterIdentity;
  }

  return record;
}
