import { z } from 'zod';
import { DEFAULT_DATE_PATTERN, DEFAULT_EXCLUSIONS, UNCATEGORIZED } from '../utils/constants.js';

function isCompilableRegex(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const RegexSourceSchema = z.string().min(1).refine(isCompilableRegex, {
  message: 'Invalid regular expression',
});

export const CategoryRuleTypeSchema = z.enum(['keyword', 'regex']);
export type CategoryRuleType = z.infer<typeof CategoryRuleTypeSchema>;

export const CategoryRuleSchema = z.object({
  id: z.string().min(1),
  pattern: z.string().min(1),
  category: z.string().min(1),
  type: CategoryRuleTypeSchema.default('keyword'),
});
export type CategoryRule = z.infer<typeof CategoryRuleSchema>;
export type CategoryRuleInput = z.input<typeof CategoryRuleSchema>;

export const CategoryRuleListSchema = z.array(CategoryRuleSchema).superRefine((rules, ctx) => {
  const seen = new Set<string>();
  rules.forEach((rule, index) => {
    if (seen.has(rule.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `Duplicate rule id "${rule.id}"`,
      });
    }
    seen.add(rule.id);

    if (rule.type === 'regex' && !isCompilableRegex(rule.pattern)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'pattern'],
        message: `Invalid regular expression in rule "${rule.id}"`,
      });
    }
  });
});

export const IngestionOrderSchema = z.enum(['filename', 'given']);
export type IngestionOrder = z.infer<typeof IngestionOrderSchema>;

export const LedgerSortSchema = z.enum(['date', 'ingestion']);
export type LedgerSort = z.infer<typeof LedgerSortSchema>;

export const PipelineConfigSchema = z
  .object({
    /** Line prefixes treated as noise */
    exclusions: z.array(z.string().min(1)).default([...DEFAULT_EXCLUSIONS]),
    /** Regex sources treated as noise, tested against the trimmed line */
    exclusionPatterns: z.array(RegexSourceSchema).default([]),
    datePattern: RegexSourceSchema.default(DEFAULT_DATE_PATTERN),
    categoryRules: CategoryRuleListSchema.optional(),
    categoryRulesFile: z.string().min(1).optional(),
    uncategorizedLabel: z.string().min(1).default(UNCATEGORIZED),
    ingestionOrder: IngestionOrderSchema.default('filename'),
    defaultYear: z.number().int().min(1900).max(2999).optional(),
    sort: LedgerSortSchema.default('date'),
    strict: z.boolean().default(false),
  })
  .strict();
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;
