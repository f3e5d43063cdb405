import { z } from 'zod';

export const SOURCE_NAMES = ['google', 'linkedin', 'indeed', 'remoteok', 'weworkremotely'] as const;
const UNQUOTABLE_DELIMITERS = ['"', '\r', '\n'];

export const exportSchemeSchema = z.enum(['standard', 'flattened']);
export const descriptionModeSchema = z.enum(['truncate', 'sanitize']);

/** Per-identity configuration file (snake_case keys, unknown keys rejected). */
export const configFileSchema = z
  .object({
    search_terms: z.array(z.string()).optional(),
    results_wanted: z.number().optional(),
    max_days_old: z.number().optional(),
    target_state: z.string().optional(),
    target_region: z.string().optional(),
    user_email: z.string().optional(),
    run_id: z.string().optional(),
    output_dir: z.string().optional(),
    export_scheme: z.string().optional(),
    delimiter: z.string().optional(),
    field_delimiter: z.string().optional(),
    record_delimiter: z.string().optional(),
    placeholder: z.string().optional(),
    keyword_filter: z.boolean().optional(),
    require_posting_date: z.boolean().optional(),
    description_mode: z.string().optional(),
    description_max_length: z.number().optional(),
    sources: z.array(z.enum(SOURCE_NAMES)).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

const exportSchema = z
  .object({
    scheme: exportSchemeSchema.default('standard'),
    delimiter: z
      .string()
      .length(1, 'Delimiter must be a single character')
      .refine((d) => !UNQUOTABLE_DELIMITERS.includes(d), 'Delimiter must not be a quote or a line break')
      .default(','),
    fieldDelimiter: z.string().min(1).default('~|~'),
    recordDelimiter: z.string().length(1, 'Record delimiter must be a single character').default(','),
    placeholder: z.string().default('N/A'),
  })
  .strict()
  .refine((e) => !e.fieldDelimiter.includes(e.recordDelimiter), {
    message: 'Field delimiter must not contain the record delimiter',
    path: ['fieldDelimiter'],
  });

/** Effective run configuration, after all layers are merged. */
export const configSchema = z
  .object({
    searchTerms: z
      .array(z.string().trim().min(1))
      .min(1, 'At least one search term is required'),
    resultsWanted: z.number().int().positive().default(100),
    maxDaysOld: z.number().int().nonnegative().default(2),
    targetRegion: z
      .string()
      .trim()
      .min(1)
      .transform((region) => region.toUpperCase())
      .default('NY'),
    submitterIdentity: z.string().trim().min(1).optional(),
    runId: z.string().trim().min(1).optional(),
    outputDir: z.string().min(1).default('output'),
    enableGoogle: z.boolean().default(true),
    enableLinkedIn: z.boolean().default(true),
    enableIndeed: z.boolean().default(true),
    enableRemoteOK: z.boolean().default(false),
    enableWWR: z.boolean().default(false),
    filters: z
      .object({
        keywordMatch: z.boolean().default(true),
        requirePostingDate: z.boolean().default(true),
      })
      .strict()
      .default({}),
    description: z
      .object({
        mode: descriptionModeSchema.default('truncate'),
        maxLength: z.number().int().positive().default(500),
      })
      .strict()
      .default({}),
    export: exportSchema.default({}),
  })
  .strict();

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    .join('; ');
}
