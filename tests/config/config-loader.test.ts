import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { parsePipelineConfig, loadConfigFile, resolveConfig } from '../../src/config/config-loader.js';
import { ConfigError } from '../../src/errors.js';
import { DEFAULT_DATE_PATTERN, DEFAULT_EXCLUSIONS } from '../../src/utils/constants.js';

describe('parsePipelineConfig', () => {
  it('should fill defaults', () => {
    expect(parsePipelineConfig({})).toEqual({
      exclusions: [...DEFAULT_EXCLUSIONS],
      exclusionPatterns: [],
      datePattern: DEFAULT_DATE_PATTERN,
      uncategorizedLabel: 'uncategorized',
      ingestionOrder: 'filename',
      sort: 'date',
      strict: false,
    });
  });

  it('should reject unknown options', () => {
    expect(() => parsePipelineConfig({ verbose: true })).toThrow(ConfigError);
  });

  it('should reject a date pattern that does not compile', () => {
    expect(() => parsePipelineConfig({ datePattern: '([' })).toThrow(
      'Invalid configuration:\n  datePattern: Invalid regular expression'
    );
  });

  it('should reject an unknown ingestion order', () => {
    expect(() => parsePipelineConfig({ ingestionOrder: 'random' }, 'test config')).toThrow(
      /^Invalid test config:\n {2}ingestionOrder: /
    );
  });
});

describe('config files and environment', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `ledger-config-${Date.now()}-${Math.random().toString(16).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should resolve a relative rules file against the config file', async () => {
    const configPath = join(testDir, 'ledger.json');
    await writeFile(configPath, JSON.stringify({ categoryRulesFile: 'my-rules.json', defaultYear: 2022 }));

    expect(await loadConfigFile(configPath)).toEqual({
      categoryRulesFile: join(testDir, 'my-rules.json'),
      defaultYear: 2022,
    });
  });

  it('should reject a config file that is not an object', async () => {
    const configPath = join(testDir, 'ledger.json');
    await writeFile(configPath, '[]');

    await expect(loadConfigFile(configPath)).rejects.toThrow(`Config file must contain a JSON object: ${configPath}`);
  });

  it('should reject a missing config file', async () => {
    await expect(loadConfigFile(join(testDir, 'nope.json'))).rejects.toBeInstanceOf(ConfigError);
  });

  it('should layer CLI over environment over file over defaults', async () => {
    const configPath = join(testDir, 'ledger.json');
    await writeFile(
      configPath,
      JSON.stringify({ ingestionOrder: 'given', defaultYear: 2020, uncategorizedLabel: 'Other', strict: true })
    );

    const config = await resolveConfig(
      { defaultYear: '2024' },
      { LEDGER_CONFIG: configPath, LEDGER_DEFAULT_YEAR: '2022', LEDGER_INGESTION_ORDER: 'filename' }
    );

    expect(config.defaultYear).toBe(2024);
    expect(config.ingestionOrder).toBe('filename');
    expect(config.uncategorizedLabel).toBe('Other');
    expect(config.strict).toBe(true);
  });

  it('should read boolean environment flags', async () => {
    expect((await resolveConfig({}, { LEDGER_STRICT: 'true' })).strict).toBe(true);
    expect((await resolveConfig({}, { LEDGER_STRICT: '0' })).strict).toBe(false);
    expect((await resolveConfig({}, { LEDGER_STRICT: '' })).strict).toBe(false);
  });

  it('should ignore unset overrides', async () => {
    const config = await resolveConfig(
      { ingestionOrder: undefined, strict: undefined },
      { LEDGER_INGESTION_ORDER: 'given', LEDGER_STRICT: '1' }
    );

    expect(config.ingestionOrder).toBe('given');
    expect(config.strict).toBe(true);
  });

  it('should report a non-numeric default year', async () => {
    await expect(resolveConfig({ defaultYear: 'last year' }, {})).rejects.toThrow(/defaultYear/);
  });
});
