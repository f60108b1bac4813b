import type { RawLine, RawTransaction } from '../types/ledger.js';
import { LineClassifier } from './line-classifier.js';
import { TransactionBuilder } from './transaction-builder.js';

export interface WalkStats {
  lineCount: number;
  startLines: number;
  continuationLines: number;
  skippedLines: number;
  transactions: number;
}

export interface WalkContext {
  classifier: LineClassifier;
  builder: TransactionBuilder;
  stats: WalkStats;
}

export function createWalkContext(
  classifier: LineClassifier = new LineClassifier(),
  builder: TransactionBuilder = new TransactionBuilder({ datePattern: classifier.datePattern })
): WalkContext {
  return {
    classifier,
    builder,
    stats: {
      lineCount: 0,
      startLines: 0,
      continuationLines: 0,
      skippedLines: 0,
      transactions: 0,
    },
  };
}

/**
 * Walk one statement's lines in order and yield its raw transactions.
 * Single pass; the trailing draft is flushed once the input is exhausted.
 */
export function* walkStatement(
  lines: Iterable<RawLine>,
  context: WalkContext
): Generator<RawTransaction, void, undefined> {
  const { classifier, builder, stats } = context;

  for (const line of lines) {
    stats.lineCount++;

    switch (classifier.classify(line, builder.state)) {
      case 'START_TRANSACTION': {
        stats.startLines++;
        const finished = builder.open(line);
        if (finished !== null) {
          stats.transactions++;
          yield finished;
        }
        break;
      }
      case 'CONTINUATION':
        stats.continuationLines++;
        builder.extend(line);
        break;
      case 'NON_TRANSACTION':
        stats.skippedLines++;
        break;
    }
  }

  const last = builder.close();
  if (last !== null) {
    stats.transactions++;
    yield last;
  }
}
