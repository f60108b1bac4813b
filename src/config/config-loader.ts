import { readFile } from 'fs/promises';
import { resolve, dirname, isAbsolute } from 'path';
import { PipelineConfigSchema, type PipelineConfig } from '../schemas/index.js';
import { ConfigError } from '../errors.js';

export interface ConfigOverrides {
  configPath?: string | undefined;
  ingestionOrder?: string | undefined;
  defaultYear?: string | undefined;
  datePattern?: string | undefined;
  categoryRulesFile?: string | undefined;
  strict?: boolean | undefined;
}

export type Environment = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const envBool = (value: string | undefined): boolean | undefined => {
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1';
};

const toYear = (value: string | undefined): number | undefined => {
  if (value === undefined || value === '') return undefined;
  return Number(value);
};

function compact(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined && value !== ''));
}

/**
 * Validate a configuration object, filling defaults.
 */
export function parsePipelineConfig(input: unknown, source = 'configuration'): PipelineConfig {
  const result = PipelineConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid ${source}:\n${details}`);
  }
  return result.data;
}

/**
 * Read a JSON config file. A relative `categoryRulesFile` in it is taken
 * relative to the config file.
 */
export async function loadConfigFile(filePath: string): Promise<Record<string, unknown>> {
  const configPath = resolve(filePath);

  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${configPath}`, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${configPath}`, { cause: error });
  }

  if (!isRecord(data)) {
    throw new ConfigError(`Config file must contain a JSON object: ${configPath}`);
  }

  const rulesFile = data['categoryRulesFile'];
  if (typeof rulesFile === 'string' && !isAbsolute(rulesFile)) {
    return { ...data, categoryRulesFile: resolve(dirname(configPath), rulesFile) };
  }
  return data;
}

/**
 * Resolve the pipeline configuration from multiple sources with precedence:
 * 1. Explicit overrides (CLI flags)
 * 2. Environment variables: LEDGER_INGESTION_ORDER, LEDGER_DEFAULT_YEAR,
 *    LEDGER_DATE_PATTERN, LEDGER_CATEGORY_RULES, LEDGER_STRICT
 * 3. Config file (overrides.configPath, else LEDGER_CONFIG)
 * 4. Defaults
 */
export async function resolveConfig(
  overrides: ConfigOverrides = {},
  env: Environment = process.env
): Promise<PipelineConfig> {
  const configPath = overrides.configPath ?? env['LEDGER_CONFIG'];
  const fromFile = configPath !== undefined && configPath !== '' ? await loadConfigFile(configPath) : {};

  const fromEnv = compact({
    ingestionOrder: env['LEDGER_INGESTION_ORDER'],
    defaultYear: toYear(env['LEDGER_DEFAULT_YEAR']),
    datePattern: env['LEDGER_DATE_PATTERN'],
    categoryRulesFile: env['LEDGER_CATEGORY_RULES'],
    strict: envBool(env['LEDGER_STRICT']),
  });

  const fromCli = compact({
    ingestionOrder: overrides.ingestionOrder,
    defaultYear: toYear(overrides.defaultYear),
    datePattern: overrides.datePattern,
    categoryRulesFile: overrides.categoryRulesFile,
    strict: overrides.strict,
  });

  return parsePipelineConfig(
    { ...fromFile, ...fromEnv, ...fromCli },
    configPath !== undefined && configPath !== '' ? `configuration (${configPath})` : 'configuration'
  );
}
