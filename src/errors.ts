/**
 * Raised for unusable configuration: bad JSON, unknown options, rule lists
 * with duplicate ids or patterns that do not compile.
 */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when a statement cannot be read or yields no lines.
 * The pipeline records it as a per-statement failure unless running strict.
 */
export class StatementSourceError extends Error {
  readonly statementId: string;

  constructor(statementId: string, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StatementSourceError';
    this.statementId = statementId;
  }
}
