export { compileRules, createCategorizer, categorizeTransaction } from './categorizer.js';
export type { CategorizationResult, CompiledRule, Categorizer } from './categorizer.js';

export {
  getDefaultRulesPath,
  parseCategoryRules,
  loadCategoryRules,
  loadCategoryRulesSync,
  resolveCategoryRules,
} from './rules.js';
