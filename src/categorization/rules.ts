import { readFileSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { CategoryRuleListSchema, type CategoryRule, type PipelineConfig } from '../schemas/index.js';
import { ConfigError } from '../errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const rulesCache = new Map<string, CategoryRule[]>();

/**
 * Path of the bundled rule list.
 */
export function getDefaultRulesPath(): string {
  return resolve(__dirname, '../../rules/category-rules.json');
}

/**
 * Validate rule data. List order is preserved: it is the match priority.
 */
export function parseCategoryRules(data: unknown, source = 'category rules'): CategoryRule[] {
  const result = CategoryRuleListSchema.safeParse(data);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  /${issue.path.join('/')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid ${source}:\n${details}`);
  }
  return result.data;
}

function parseRulesJson(content: string, filePath: string): CategoryRule[] {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Category rules file is not valid JSON: ${filePath}`, { cause: error });
  }
  return parseCategoryRules(data, `category rules in ${filePath}`);
}

/**
 * Load a rule list from disk. Results are cached per path.
 */
export function loadCategoryRulesSync(filePath: string = getDefaultRulesPath()): CategoryRule[] {
  const cached = rulesCache.get(filePath);
  if (cached !== undefined) {
    return cached;
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read category rules file: ${filePath}`, { cause: error });
  }

  const rules = parseRulesJson(content, filePath);
  rulesCache.set(filePath, rules);
  return rules;
}

export async function loadCategoryRules(filePath: string = getDefaultRulesPath()): Promise<CategoryRule[]> {
  const cached = rulesCache.get(filePath);
  if (cached !== undefined) {
    return cached;
  }

  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read category rules file: ${filePath}`, { cause: error });
  }

  const rules = parseRulesJson(content, filePath);
  rulesCache.set(filePath, rules);
  return rules;
}

/**
 * Rules for a pipeline run: inline rules, then the configured file, then the bundled list.
 */
export function resolveCategoryRules(config: Pick<PipelineConfig, 'categoryRules' | 'categoryRulesFile'>): CategoryRule[] {
  if (config.categoryRules !== undefined) {
    return config.categoryRules;
  }
  return loadCategoryRulesSync(config.categoryRulesFile ?? getDefaultRulesPath());
}
