import { Decimal } from 'decimal.js';
import { z } from 'zod';

import { parseLedgerDate } from '../utils/date-utils.js';
import { tryParseDecimal } from '../utils/decimal-utils.js';

// Decimal schema - accepts locale-formatted strings, numbers, Decimal instances or empty cells, transforms to Decimal
// Empty cells read as zero; anything else that is not a number is rejected
export const DecimalSchema = z
  .union([z.string(), z.number(), z.instanceof(Decimal), z.null(), z.undefined()])
  .transform((val, ctx) => {
    const out = { value: new Decimal(0) };
    if (!tryParseDecimal(val, out)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid decimal value: ${String(val)}` });
      return z.NEVER;
    }
    return out.value;
  });

function isBlankCell(val: unknown): boolean {
  return val === null || val === undefined || (typeof val === 'string' && val.trim() === '');
}

// Decimal cell that must carry a value - blank cells are rejected instead of reading as zero
export const RequiredDecimalSchema = z
  .union([z.string(), z.number(), z.instanceof(Decimal), z.null(), z.undefined()])
  .refine((val) => !isBlankCell(val), { message: 'Must not be empty' })
  .pipe(DecimalSchema);

// Checks run through a pipe so they never see the value of a failed parse
export const PositiveDecimalSchema = DecimalSchema.pipe(
  z.instanceof(Decimal).refine((val) => val.gt(0), { message: 'Must be greater than zero' })
);

// Whole-unit quantity - decimals such as "10,0" are accepted when integral; the sign is dropped
export const QuantitySchema = RequiredDecimalSchema.pipe(
  z
    .instanceof(Decimal)
    .refine((val) => val.isInteger(), { message: 'Quantity must be a whole number of units' })
    .transform((val) => val.abs().toNumber())
);

// Date schema - accepts Date instances, ISO strings or day-first strings, transforms to Date
export const LedgerDateSchema = z.union([z.string(), z.date()]).transform((val, ctx) => {
  const parsed = parseLedgerDate(val);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date value: ${String(val)}` });
    return z.NEVER;
  }
  return parsed;
});

// Trimmed, non-empty text cell (tickers, currency codes); numbers are read as text
export const TextCellSchema = z
  .union([z.string(), z.number()])
  .transform((val) => String(val).trim())
  .pipe(z.string().min(1, { message: 'Must not be empty' }));
