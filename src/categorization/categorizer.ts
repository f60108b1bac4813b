import type { CategoryRule, CategoryRuleType } from '../schemas/index.js';
import { UNCATEGORIZED } from '../utils/constants.js';

export interface CategorizationResult {
  category: string;
  /** Id of the rule that matched, null for the fallback label */
  ruleId: string | null;
}

export interface CompiledRule {
  id: string;
  category: string;
  type: CategoryRuleType;
  matches: (normalizedDescription: string) => boolean;
}

export type Categorizer = (description: string) => CategorizationResult;

export function compileRules(rules: readonly CategoryRule[]): CompiledRule[] {
  return rules.map((rule) => {
    if (rule.type === 'regex') {
      const pattern = new RegExp(rule.pattern, 'i');
      return {
        id: rule.id,
        category: rule.category,
        type: rule.type,
        matches: (desc: string) => pattern.test(desc),
      };
    }

    const keyword = rule.pattern.toLowerCase();
    return {
      id: rule.id,
      category: rule.category,
      type: rule.type,
      matches: (desc: string) => desc.includes(keyword),
    };
  });
}

/**
 * Build a categorizer over an ordered rule list. The first matching rule
 * wins; descriptions no rule matches get the fallback label.
 */
export function createCategorizer(
  rules: readonly CategoryRule[],
  options: { uncategorizedLabel?: string } = {}
): Categorizer {
  const compiled = compileRules(rules);
  const fallback = options.uncategorizedLabel ?? UNCATEGORIZED;

  return (description: string): CategorizationResult => {
    const normalizedDesc = description.toLowerCase().trim();

    for (const rule of compiled) {
      if (rule.matches(normalizedDesc)) {
        return { category: rule.category, ruleId: rule.id };
      }
    }

    return { category: fallback, ruleId: null };
  };
}

export function categorizeTransaction(
  description: string,
  rules: readonly CategoryRule[],
  uncategorizedLabel: string = UNCATEGORIZED
): CategorizationResult {
  return createCategorizer(rules, { uncategorizedLabel })(description);
}
