import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { buildConfig, configFromEnv, loadConfig, mergeLayers } from '../../src/config';
import { ConfigError } from '../../src/utils/errors';

describe('buildConfig', () => {
  it('applies defaults', () => {
    const config = buildConfig({ searchTerms: ['CRM Manager'] });

    expect(config).toEqual({
      searchTerms: ['CRM Manager'],
      resultsWanted: 100,
      maxDaysOld: 2,
      targetRegion: 'NY',
      outputDir: 'output',
      enableGoogle: true,
      enableLinkedIn: true,
      enableIndeed: true,
      enableRemoteOK: false,
      enableWWR: false,
      filters: { keywordMatch: true, requirePostingDate: true },
      description: { mode: 'truncate', maxLength: 500 },
      export: {
        scheme: 'standard',
        delimiter: ',',
        fieldDelimiter: '~|~',
        recordDelimiter: ',',
        placeholder: 'N/A',
      },
    });
  });

  it('normalizes the target region', () => {
    expect(buildConfig({ searchTerms: ['x'], targetRegion: ' ca ' }).targetRegion).toBe('CA');
  });

  it('returns a frozen value', () => {
    const config = buildConfig({ searchTerms: ['x'] });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.export)).toBe(true);
    expect(Object.isFrozen(config.searchTerms)).toBe(true);
  });

  it('requires at least one search term', () => {
    expect(() => buildConfig({})).toThrow(ConfigError);
    expect(() => buildConfig({ searchTerms: [] })).toThrow(/At least one search term is required/);
  });

  it('rejects an unknown export scheme', () => {
    expect(() => buildConfig({ searchTerms: ['x'], export: { scheme: 'xml' } })).toThrow(/export\.scheme/);
  });

  it('rejects a multi-character standard delimiter', () => {
    expect(() => buildConfig({ searchTerms: ['x'], export: { delimiter: '||' } })).toThrow(
      /Delimiter must be a single character/
    );
  });

  it.each(['"', '\r', '\n'])('rejects %j as the standard delimiter', delimiter => {
    expect(() => buildConfig({ searchTerms: ['x'], export: { delimiter } })).toThrow(
      /Delimiter must not be a quote or a line break/
    );
  });

  it('rejects a field delimiter containing the record delimiter', () => {
    expect(() =>
      buildConfig({ searchTerms: ['x'], export: { fieldDelimiter: ',,', recordDelimiter: ',' } })
    ).toThrow(/Field delimiter must not contain the record delimiter/);
  });

  it('rejects a non-numeric result count', () => {
    expect(() => buildConfig({ searchTerms: ['x'], resultsWanted: Number('abc') })).toThrow(ConfigError);
  });
});

describe('mergeLayers', () => {
  it('lets later layers win without undefined overriding', () => {
    const merged = mergeLayers([
      { resultsWanted: 100, targetRegion: 'NY', export: { scheme: 'flattened' } },
      { resultsWanted: 5, targetRegion: undefined, export: { delimiter: ';' } },
    ]);

    expect(merged.resultsWanted).toBe(5);
    expect(merged.targetRegion).toBe('NY');
    expect(merged.export?.scheme).toBe('flattened');
    expect(merged.export?.delimiter).toBe(';');
  });
});

describe('configFromEnv', () => {
  it('reads platform toggles and export settings', () => {
    const layer = configFromEnv({
      ENABLE_WWR: 'false',
      ENABLE_LINKEDIN: 'false',
      OUTPUT_DIR: 'exports',
      EXPORT_SCHEME: 'flattened',
    });

    expect(layer.enableWWR).toBe(false);
    expect(layer.enableLinkedIn).toBe(false);
    expect(layer.enableGoogle).toBeUndefined();
    expect(layer.enableRemoteOK).toBeUndefined();
    expect(layer.outputDir).toBe('exports');
    expect(layer.export?.scheme).toBe('flattened');
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'jobsift-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, contents: unknown): void {
    writeFileSync(join(dir, name), typeof contents === 'string' ? contents : JSON.stringify(contents));
  }

  it('falls back to config.json in the working directory', () => {
    writeConfig('config.json', {
      search_terms: ['Automation Engineer', ' '],
      results_wanted: 50,
      max_days_old: 3,
      target_state: 'nj',
      user_email: 'jane@example.com',
    });

    const config = loadConfig({ cwd: dir, env: {} });

    expect(config.searchTerms).toEqual(['Automation Engineer']);
    expect(config.resultsWanted).toBe(50);
    expect(config.maxDaysOld).toBe(3);
    expect(config.targetRegion).toBe('NJ');
    expect(config.submitterIdentity).toBe('jane@example.com');
  });

  it('reads an explicit per-identity file', () => {
    writeConfig('jane.json', { search_terms: ['CRM'], sources: ['indeed', 'remoteok'] });

    const config = loadConfig({ cwd: dir, env: {}, configPath: 'jane.json' });

    expect(config.searchTerms).toEqual(['CRM']);
    expect(config.enableGoogle).toBe(false);
    expect(config.enableLinkedIn).toBe(false);
    expect(config.enableIndeed).toBe(true);
    expect(config.enableRemoteOK).toBe(true);
    expect(config.enableWWR).toBe(false);
  });

  it('lets command-line settings override the file and the file override the environment', () => {
    writeConfig('config.json', { search_terms: ['CRM'], results_wanted: 100, output_dir: 'from-file' });

    const config = loadConfig({
      cwd: dir,
      env: { OUTPUT_DIR: 'from-env', ENABLE_WWR: 'false' },
      configPath: 'config.json',
      cli: { resultsWanted: 5 },
    });

    expect(config.resultsWanted).toBe(5);
    expect(config.outputDir).toBe('from-file');
    expect(config.enableWWR).toBe(false);
  });

  it('needs no file when terms come from the command line', () => {
    const config = loadConfig({ cwd: dir, env: {}, cli: { searchTerms: ['CRM'] } });
    expect(config.searchTerms).toEqual(['CRM']);
  });

  it('fails when there are no terms and no configuration file', () => {
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/No search terms given/);
  });

  it('fails when the named file does not exist', () => {
    expect(() => loadConfig({ cwd: dir, env: {}, configPath: 'missing.json' })).toThrow(
      /Configuration file not found/
    );
  });

  it('fails on malformed JSON', () => {
    writeConfig('config.json', '{ not json');
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/is not valid JSON/);
  });

  it('fails on unknown keys', () => {
    writeConfig('config.json', { search_terms: ['CRM'], target_city: 'Albany' });
    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(/Invalid configuration file/);
  });
});
