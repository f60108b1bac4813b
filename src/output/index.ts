export {
  toLedgerRecord,
  toLedgerRecords,
  validateLedger,
  validateLedgerOrThrow,
  formatValidationErrors,
} from './ledger-serializer.js';
export type { ValidationError, ValidationResult } from './ledger-serializer.js';
