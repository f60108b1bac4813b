import type { RawLine } from '../types/ledger.js';
import type { PipelineConfig } from '../schemas/index.js';
import { DEFAULT_EXCLUSIONS } from '../utils/constants.js';
import { compileDatePattern, matchDateToken, type DateMatch } from './line-fields.js';

export type LineClass = 'START_TRANSACTION' | 'CONTINUATION' | 'NON_TRANSACTION';

/** Whether the builder currently holds an open draft */
export type ParserState = 'idle' | 'open';

export interface LineClassifierOptions {
  datePattern?: string | RegExp;
  /** Prefixes of the trimmed line that mark it as noise */
  exclusions?: readonly string[];
  /** Patterns tested against the trimmed line that mark it as noise */
  exclusionPatterns?: ReadonlyArray<string | RegExp>;
}

/**
 * Decides, line by line, where transactions start.
 *
 * A date at the start of the line is the only boundary signal. Excluded
 * lines are dropped whatever the state, and lines that are neither belong
 * to the open draft or, before the first transaction, to the preamble.
 */
export class LineClassifier {
  readonly datePattern: RegExp;
  private readonly exclusions: readonly string[];
  private readonly exclusionPatterns: readonly RegExp[];

  constructor(options: LineClassifierOptions = {}) {
    this.datePattern = compileDatePattern(options.datePattern);
    this.exclusions = options.exclusions ?? DEFAULT_EXCLUSIONS;
    this.exclusionPatterns = (options.exclusionPatterns ?? []).map((pattern) =>
      typeof pattern === 'string' ? new RegExp(pattern) : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
    );
  }

  classify(line: RawLine, state: ParserState): LineClass {
    const text = line.text.trim();
    if (text === '' || this.isExcluded(text)) {
      return 'NON_TRANSACTION';
    }

    if (this.matchDate(text) !== null) {
      return 'START_TRANSACTION';
    }

    return state === 'open' ? 'CONTINUATION' : 'NON_TRANSACTION';
  }

  isExcluded(text: string): boolean {
    const trimmed = text.trim();
    return (
      this.exclusions.some((prefix) => trimmed.startsWith(prefix)) ||
      this.exclusionPatterns.some((pattern) => pattern.test(trimmed))
    );
  }

  matchDate(text: string): DateMatch | null {
    return matchDateToken(text, this.datePattern);
  }
}

export function createLineClassifier(
  config: Pick<PipelineConfig, 'datePattern' | 'exclusions' | 'exclusionPatterns'>
): LineClassifier {
  return new LineClassifier({
    datePattern: config.datePattern,
    exclusions: config.exclusions,
    exclusionPatterns: config.exclusionPatterns,
  });
}
