/**
 * Configuration management
 * Layers, lowest precedence first: built-in defaults, environment variables,
 * the JSON configuration file, command-line arguments
 */
import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { ConfigError } from '../utils/errors';
import { configFileSchema, configSchema, formatIssues, type ConfigFile } from './schema';

export type ExportScheme = 'standard' | 'flattened';
export type DescriptionMode = 'truncate' | 'sanitize';

export interface ExportOptions {
  readonly scheme: ExportScheme;
  /** Single-character field delimiter for the standard scheme */
  readonly delimiter: string;
  /** Multi-character field delimiter for the flattened scheme */
  readonly fieldDelimiter: string;
  /** Single-character record delimiter for the flattened scheme */
  readonly recordDelimiter: string;
  readonly placeholder: string;
}

export interface Config {
  // Search
  readonly searchTerms: readonly string[];
  readonly resultsWanted: number;

  // Job Filtering
  readonly maxDaysOld: number;
  readonly targetRegion: string;
  readonly filters: {
    readonly keywordMatch: boolean;
    readonly requirePostingDate: boolean;
  };

  // Submitter
  readonly submitterIdentity?: string;
  readonly runId?: string;

  // Normalization
  readonly description: {
    readonly mode: DescriptionMode;
    readonly maxLength: number;
  };

  // Export
  readonly outputDir: string;
  readonly export: ExportOptions;

  // Platform Toggles
  readonly enableGoogle: boolean;
  readonly enableLinkedIn: boolean;
  readonly enableIndeed: boolean;
  readonly enableRemoteOK: boolean;
  readonly enableWWR: boolean;
}

/**
 * One layer of unvalidated settings
 */
export interface ConfigLayer {
  searchTerms?: string[];
  resultsWanted?: number;
  maxDaysOld?: number;
  targetRegion?: string;
  submitterIdentity?: string;
  runId?: string;
  outputDir?: string;
  enableGoogle?: boolean;
  enableLinkedIn?: boolean;
  enableIndeed?: boolean;
  enableRemoteOK?: boolean;
  enableWWR?: boolean;
  filters?: { keywordMatch?: boolean; requirePostingDate?: boolean };
  description?: { mode?: string; maxLength?: number };
  export?: {
    scheme?: string;
    delimiter?: string;
    fieldDelimiter?: string;
    recordDelimiter?: string;
    placeholder?: string;
  };
}

export const DEFAULT_CONFIG_FILE = 'config.json';

export function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

export function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value && value.trim() ? value : undefined;
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  return {
    outputDir: blankToUndefined(env.OUTPUT_DIR),
    enableGoogle: env.ENABLE_GOOGLE ? parseBoolean(env.ENABLE_GOOGLE) : undefined,
    enableLinkedIn: env.ENABLE_LINKEDIN ? parseBoolean(env.ENABLE_LINKEDIN) : undefined,
    enableIndeed: env.ENABLE_INDEED ? parseBoolean(env.ENABLE_INDEED) : undefined,
    enableRemoteOK: env.ENABLE_REMOTEOK ? parseBoolean(env.ENABLE_REMOTEOK) : undefined,
    enableWWR: env.ENABLE_WWR ? parseBoolean(env.ENABLE_WWR) : undefined,
    export: { scheme: blankToUndefined(env.EXPORT_SCHEME) },
  };
}

export function configFromFile(file: ConfigFile): ConfigLayer {
  return {
    searchTerms: file.search_terms?.map(term => term.trim()).filter(term => term.length > 0),
    resultsWanted: file.results_wanted,
    maxDaysOld: file.max_days_old,
    targetRegion: file.target_region ?? file.target_state,
    submitterIdentity: blankToUndefined(file.user_email),
    runId: blankToUndefined(file.run_id),
    outputDir: file.output_dir,
    enableGoogle: file.sources ? file.sources.includes('google') : undefined,
    enableLinkedIn: file.sources ? file.sources.includes('linkedin') : undefined,
    enableIndeed: file.sources ? file.sources.includes('indeed') : undefined,
    enableRemoteOK: file.sources ? file.sources.includes('remoteok') : undefined,
    enableWWR: file.sources ? file.sources.includes('weworkremotely') : undefined,
    filters: {
      keywordMatch: file.keyword_filter,
      requirePostingDate: file.require_posting_date,
    },
    description: {
      mode: file.description_mode,
      maxLength: file.description_max_length,
    },
    export: {
      scheme: file.export_scheme,
      delimiter: file.delimiter,
      fieldDelimiter: file.field_delimiter,
      recordDelimiter: file.record_delimiter,
      placeholder: file.placeholder,
    },
  };
}

export function readConfigFile(path: string): ConfigLayer {
  if (!existsSync(path)) {
    throw new ConfigError(`Configuration file not found: ${path}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Configuration file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = configFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration file ${path}: ${formatIssues(result.error)}`);
  }
  return configFromFile(result.data);
}

/**
 * Later layers win; an undefined setting never overrides
 */
export function mergeLayers(layers: ConfigLayer[]): ConfigLayer {
  return layers.reduce<ConfigLayer>((base, over) => ({
    searchTerms: over.searchTerms ?? base.searchTerms,
    resultsWanted: over.resultsWanted ?? base.resultsWanted,
    maxDaysOld: over.maxDaysOld ?? base.maxDaysOld,
    targetRegion: over.targetRegion ?? base.targetRegion,
    submitterIdentity: over.submitterIdentity ?? base.submitterIdentity,
    runId: over.runId ?? base.runId,
    outputDir: over.outputDir ?? base.outputDir,
    enableGoogle: over.enableGoogle ?? base.enableGoogle,
    enableLinkedIn: over.enableLinkedIn ?? base.enableLinkedIn,
    enableIndeed: over.enableIndeed ?? base.enableIndeed,
    enableRemoteOK: over.enableRemoteOK ?? base.enableRemoteOK,
    enableWWR: over.enableWWR ?? base.enableWWR,
    filters: {
      keywordMatch: over.filters?.keywordMatch ?? base.filters?.keywordMatch,
      requirePostingDate: over.filters?.requirePostingDate ?? base.filters?.requirePostingDate,
    },
    description: {
      mode: over.description?.mode ?? base.description?.mode,
      maxLength: over.description?.maxLength ?? base.description?.maxLength,
    },
    export: {
      scheme: over.export?.scheme ?? base.export?.scheme,
      delimiter: over.export?.delimiter ?? base.export?.delimiter,
      fieldDelimiter: over.export?.fieldDelimiter ?? base.export?.fieldDelimiter,
      recordDelimiter: over.export?.recordDelimiter ?? base.export?.recordDelimiter,
      placeholder: over.export?.placeholder ?? base.export?.placeholder,
    },
  }), {});
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested !== null && typeof nested === 'object') {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Applies defaults and validates a merged layer
 */
export function buildConfig(layer: ConfigLayer): Config {
  const result = configSchema.safeParse(layer);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`);
  }
  const config: Config = result.data;
  return deepFreeze(config);
}

export interface LoadConfigOptions {
  /** Settings taken from the command line */
  cli?: ConfigLayer;
  /** Explicit configuration file; relative paths resolve against cwd */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Loads the run configuration.
 * Without search terms on the command line, a configuration file is required:
 * the explicit one, or config.json in the working directory.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const cli = options.cli ?? {};
  const layers: ConfigLayer[] = [configFromEnv(env)];

  const hasCliTerms = (cli.searchTerms?.length ?? 0) > 0;
  if (options.configPath) {
    layers.push(readConfigFile(resolve(cwd, options.configPath)));
  } else if (!hasCliTerms) {
    const defaultPath = resolve(cwd, DEFAULT_CONFIG_FILE);
    if (!existsSync(defaultPath)) {
      throw new ConfigError(
        `No search terms given and no configuration file found at ${defaultPath}`
      );
    }
    layers.push(readConfigFile(defaultPath));
  }

  layers.push(cli);
  return buildConfig(mergeLayers(layers));
}
