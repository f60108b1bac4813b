import { z } from 'zod';
import { isValidISODate } from '../utils/date.js';

const WeekdaySchema = z.enum([
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
]);

export const LedgerRecordSchema = z
  .object({
    date: z.string().refine(isValidISODate, 'Date must be a YYYY-MM-DD calendar date'),
    description: z.string(),
    amount: z.number().finite(),
    balance: z.number().finite().nullable(),
    category: z.string().min(1),
    month: z.string().regex(/^\d{4}-\d{2}$/, 'Month must be in YYYY-MM format'),
    weekday: WeekdaySchema,
    source_file: z.string().min(1),
    transaction_id: z.string().regex(/^tx_[a-f0-9]{24}$/, 'Must be tx_ followed by 24 hex chars'),
  })
  .strict()
  .refine((record) => record.month === record.date.slice(0, 7), {
    message: 'Month must match date',
    path: ['month'],
  });

export const LedgerSchema = z.array(LedgerRecordSchema).superRefine((records, ctx) => {
  const seen = new Set<string>();
  records.forEach((record, index) => {
    if (seen.has(record.transaction_id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'transaction_id'],
        message: `Duplicate transaction_id ${record.transaction_id}`,
      });
    }
    seen.add(record.transaction_id);
  });
});
