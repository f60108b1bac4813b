export {
  CategoryRuleTypeSchema,
  CategoryRuleSchema,
  CategoryRuleListSchema,
  IngestionOrderSchema,
  LedgerSortSchema,
  PipelineConfigSchema,
} from './config.js';

export type {
  CategoryRuleType,
  CategoryRule,
  CategoryRuleInput,
  IngestionOrder,
  LedgerSort,
  PipelineConfig,
  PipelineConfigInput,
} from './config.js';

export { LedgerRecordSchema, LedgerSchema } from './ledger.js';
