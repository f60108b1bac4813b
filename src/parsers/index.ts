export {
  compileDatePattern,
  matchDateToken,
  findAmounts,
  splitAmountColumns,
} from './line-fields.js';
export type { DateMatch, AmountMatch, AmountColumns } from './line-fields.js';

export { LineClassifier, createLineClassifier } from './line-classifier.js';
export type { LineClass, ParserState, LineClassifierOptions } from './line-classifier.js';

export { TransactionBuilder } from './transaction-builder.js';
export type { TransactionBuilderOptions } from './transaction-builder.js';

export { walkStatement, createWalkContext } from './statement-walker.js';
export type { WalkStats, WalkContext } from './statement-walker.js';
