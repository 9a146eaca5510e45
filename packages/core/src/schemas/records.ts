import { z } from 'zod';

import { LedgerDateSchema, PositiveDecimalSchema, TextCellSchema } from './primitives.js';

/**
 * A single cell as handed over by the ingestion layer.
 */
export type LedgerCell = string | number | Date | null | undefined;

export const TRADE_COLUMNS = [
  'ticker',
  'operation',
  'quantity',
  'price',
  'currency',
  'amount',
  'commission',
  'commissionCurrency',
  'tradeDate',
  'settlementDate',
] as const;

export type TradeColumn = (typeof TRADE_COLUMNS)[number];

/**
 * Columns without which no trade can be attributed. Their absence is a schema failure.
 */
export const REQUIRED_TRADE_COLUMNS: readonly TradeColumn[] = ['ticker', 'operation'];

/**
 * Parsed broker row. Every column is optional at this boundary; absence is resolved by the
 * normalizer (defaults for optional columns, schema failure for required ones).
 */
export type RawTradeRecord = Partial<Record<TradeColumn, LedgerCell>>;

export interface RawRateRecord {
  date: LedgerCell;
  rate: LedgerCell;
}

export const RateRecordSchema = z.object({
  date: LedgerDateSchema,
  rate: PositiveDecimalSchema,
});

export type RateRecord = z.infer<typeof RateRecordSchema>;

export const DeclaredBalanceSchema = z.object({
  ticker: TextCellSchema,
  balance: z.number().int(),
});

export type DeclaredBalance = z.input<typeof DeclaredBalanceSchema>;
