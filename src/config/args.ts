import { parseArgs } from 'util';
import { ConfigError } from '../utils/errors';
import { parseStringArray, type ConfigLayer } from './index';

export interface CliArgs {
  help: boolean;
  configPath?: string;
  layer: ConfigLayer;
}

export const USAGE = `
Usage:
  npm run export -- [options]

Options:
  -t, --term <terms>          Search term; repeat or comma-separate for several
  -n, --results <count>       Results wanted per term and source (default: 100)
  -d, --max-days-old <days>   Maximum posting age in days (default: 2)
  -r, --region <code>         Target state/region code; remote jobs always pass (default: NY)
  -u, --identity <email>      Submitter identity; names the output file
      --run-id <id>           Run identifier appended to the output file name
  -c, --config <path>         Configuration file (default: ./config.json when no --term)
  -o, --output-dir <dir>      Output directory (default: output)
      --scheme <scheme>       Export scheme: standard | flattened
      --delimiter <char>      Field delimiter for the standard scheme (default: ,)
      --description-mode <m>  truncate | sanitize
      --no-keyword-filter     Keep postings whose title matches no search term
      --allow-undated         Keep postings without a posting date
  -h, --help                  Show this help
`.trim();

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

const CLI_OPTIONS = {
  term: { type: 'string', short: 't', multiple: true },
  results: { type: 'string', short: 'n' },
  'max-days-old': { type: 'string', short: 'd' },
  region: { type: 'string', short: 'r' },
  identity: { type: 'string', short: 'u' },
  'run-id': { type: 'string' },
  config: { type: 'string', short: 'c' },
  'output-dir': { type: 'string', short: 'o' },
  scheme: { type: 'string' },
  delimiter: { type: 'string' },
  'description-mode': { type: 'string' },
  'no-keyword-filter': { type: 'boolean' },
  'allow-undated': { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const;

function readArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: CLI_OPTIONS, strict: true, allowPositionals: false });
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parses command-line arguments into a configuration layer.
 * Unknown options and stray positionals are configuration errors.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const parsed = readArgs(argv);
  const { values } = parsed;
  const terms = (values.term ?? []).flatMap(value => parseStringArray(value));

  return {
    help: values.help ?? false,
    configPath: values.config,
    layer: {
      searchTerms: terms.length > 0 ? terms : undefined,
      resultsWanted: toNumber(values.results),
      maxDaysOld: toNumber(values['max-days-old']),
      targetRegion: values.region,
      submitterIdentity: values.identity,
      runId: values['run-id'],
      outputDir: values['output-dir'],
      filters: {
        keywordMatch: values['no-keyword-filter'] ? false : undefined,
        requirePostingDate: values['allow-undated'] ? false : undefined,
      },
      description: { mode: values['description-mode'] },
      export: {
        scheme: values.scheme,
        delimiter: values.delimiter,
      },
    },
  };
}
