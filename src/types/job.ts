/**
 * Job posting schema
 * All job sources must map their results to this structure
 */
export type JobType =
  | 'FULL_TIME'
  | 'PART_TIME'
  | 'CONTRACT'
  | 'TEMPORARY'
  | 'INTERNSHIP'
  | 'PER_DIEM'
  | 'NIGHTS'
  | 'SUMMER'
  | 'VOLUNTEER'
  | 'OTHER';

export interface Compensation {
  currency?: string;
  minAmount?: number;
  maxAmount?: number;
}

export interface JobLocation {
  city?: string;
  state?: string;
  country?: string;
}

export interface JobPosting {
  id: string;
  title: string;
  companyName?: string;
  companyIndustry?: string;
  jobLevel?: string;
  jobTypes?: JobType[];
  isRemote: boolean;
  compensation?: Compensation;
  datePosted?: Date;
  location?: JobLocation;
  description?: string;
  jobUrl: string;
}

/**
 * Export columns, in header order
 */
export const BASE_FIELD_NAMES = [
  'Job ID',
  'Job Title (Primary)',
  'Company Name',
  'Industry',
  'Experience Level',
  'Job Type',
  'Is Remote',
  'Currency',
  'Salary Min',
  'Salary Max',
  'Date Posted',
  'Location City',
  'Location State',
  'Location Country',
  'Job URL',
  'Job Description',
  'Job Source',
] as const;

export const USER_FIELD_NAME = 'User Email';

export type FieldName = (typeof BASE_FIELD_NAMES)[number] | typeof USER_FIELD_NAME;

/**
 * Flattened, placeholder-filled posting ready for export
 */
export type NormalizedRecord = Partial<Record<FieldName, string>>;

/**
 * Field list for a run; the user column only exists when an identity is set
 */
export function fieldNamesFor(submitterIdentity?: string): FieldName[] {
  return submitterIdentity ? [...BASE_FIELD_NAMES, USER_FIELD_NAME] : [...BASE_FIELD_NAMES];
}
