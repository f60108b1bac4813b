export {
  runPipeline,
  processStatement,
  orderStatements,
  createStatementContext,
} from './pipeline.js';
export type { PipelineOptions, PipelineResult, StatementContext, StatementOutcome } from './pipeline.js';
export { summarizeReport, emptyDropCounts } from './report.js';
export type { PipelineReport, StatementReport, StatementFailure } from './report.js';
