import {
  DecimalSchema,
  EmptyInputError,
  type LedgerCell,
  LedgerDateSchema,
  MissingColumnError,
  QuantitySchema,
  RequiredDecimalSchema,
  type RawTradeRecord,
  REQUIRED_TRADE_COLUMNS,
  RowParseError,
  SchemaError,
  TextCellSchema,
  type Trade,
  TRADE_COLUMNS,
  type TradeColumn,
  type TradeOrigin,
} from '@fxledger/core';
import { getLogger } from '@fxledger/logger';
import { err, ok, type Result } from 'neverthrow';
import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';

import type { SettlementConfig } from '../config/settlement-config.js';

import { classifyOperation } from './operation-classifier.js';

const logger = getLogger('trade-normalizer');

export interface NormalizationResult {
  trades: Trade[];
  rowErrors: RowParseError[];
  missingColumns: MissingColumnError[];
  /** Rows skipped because they trade in a currency other than the configured one */
  excludedByCurrency: number;
  unresolvedCount: number;
}

export interface NormalizeOptions {
  origin?: TradeOrigin | undefined;
}

type ColumnDefaults = Partial<Record<TradeColumn, LedgerCell>>;

const NUMERIC_COLUMNS: readonly TradeColumn[] = ['quantity', 'price', 'amount', 'commission'];
const CURRENCY_COLUMNS: readonly TradeColumn[] = ['currency', 'commissionCurrency'];
const DATE_COLUMNS: readonly TradeColumn[] = ['tradeDate', 'settlementDate'];

/**
 * Columns present on at least one row of the table
 */
function collectColumns(records: readonly RawTradeRecord[]): Set<TradeColumn> {
  const present = new Set<TradeColumn>();
  for (const record of records) {
    for (const column of TRADE_COLUMNS) {
      if (column in record) present.add(column);
    }
  }
  return present;
}

function resolveColumnDefaults(
  present: Set<TradeColumn>,
  config: SettlementConfig
): Result<{ defaults: ColumnDefaults; missing: MissingColumnError[] }, SchemaError> {
  const missingRequired = REQUIRED_TRADE_COLUMNS.filter((column) => !present.has(column));
  if (missingRequired.length > 0) {
    const message = `Trade table is missing required columns: ${missingRequired.join(', ')}`;
    return err(new SchemaError(message, missingRequired));
  }

  const defaults: ColumnDefaults = {};
  const missing: MissingColumnError[] = [];
  const now = config.now();

  for (const column of TRADE_COLUMNS) {
    if (present.has(column)) continue;

    let value: LedgerCell;
    if (NUMERIC_COLUMNS.includes(column)) {
      value = '0';
    } else if (CURRENCY_COLUMNS.includes(column)) {
      value = config.tradingCurrency;
    } else if (DATE_COLUMNS.includes(column)) {
      value = now;
    } else {
      value = '';
    }

    defaults[column] = value;
    missing.push(new MissingColumnError(column, value instanceof Date ? value.toISOString() : String(value)));
  }

  return ok({ defaults, missing });
}

function parseCell<S extends z.ZodTypeAny>(
  schema: S,
  value: LedgerCell,
  rowIndex: number,
  field: TradeColumn
): Result<z.output<S>, RowParseError> {
  const result = schema.safeParse(value);
  if (result.success) {
    return ok(result.data);
  }
  const reason = result.error.issues[0]?.message ?? 'invalid value';
  return err(new RowParseError(`Trade row ${rowIndex}: ${field}: ${reason}`, rowIndex, field));
}

type RowOutcome = { kind: 'trade'; trade: Trade } | { kind: 'excluded' } | { kind: 'error'; error: RowParseError };

function normalizeRow(
  record: RawTradeRecord,
  rowIndex: number,
  defaults: ColumnDefaults,
  config: SettlementConfig,
  origin: TradeOrigin
): RowOutcome {
  const cell = (column: TradeColumn): LedgerCell => (column in defaults ? defaults[column] : record[column]);

  const currency = parseCell(TextCellSchema, cell('currency'), rowIndex, 'currency');
  if (currency.isErr()) return { error: currency.error, kind: 'error' };
  if (currency.value.toUpperCase() !== config.tradingCurrency) return { kind: 'excluded' };

  const ticker = parseCell(TextCellSchema, cell('ticker'), rowIndex, 'ticker');
  if (ticker.isErr()) return { error: ticker.error, kind: 'error' };

  const rawLabel = cell('operation');
  const operationLabel = rawLabel === null || rawLabel === undefined ? '' : String(rawLabel).trim();

  const quantity = parseCell(QuantitySchema, cell('quantity'), rowIndex, 'quantity');
  if (quantity.isErr()) return { error: quantity.error, kind: 'error' };

  const price = parseCell(RequiredDecimalSchema, cell('price'), rowIndex, 'price');
  if (price.isErr()) return { error: price.error, kind: 'error' };

  const amount = parseCell(RequiredDecimalSchema, cell('amount'), rowIndex, 'amount');
  if (amount.isErr()) return { error: amount.error, kind: 'error' };

  // A blank commission cell means no commission was charged
  const commission = parseCell(DecimalSchema, cell('commission'), rowIndex, 'commission');
  if (commission.isErr()) return { error: commission.error, kind: 'error' };

  const commissionCell = cell('commissionCurrency');
  const commissionCurrency =
    commissionCell === null || commissionCell === undefined || String(commissionCell).trim() === ''
      ? config.tradingCurrency
      : String(commissionCell).trim().toUpperCase();

  const tradeDate = parseCell(LedgerDateSchema, cell('tradeDate'), rowIndex, 'tradeDate');
  if (tradeDate.isErr()) return { error: tradeDate.error, kind: 'error' };

  const settlementDate = parseCell(LedgerDateSchema, cell('settlementDate'), rowIndex, 'settlementDate');
  if (settlementDate.isErr()) return { error: settlementDate.error, kind: 'error' };

  return {
    kind: 'trade',
    trade: {
      amount: amount.value.abs(),
      appliedRate: undefined,
      commission: commission.value.abs(),
      commissionCurrency,
      id: uuidv4(),
      operation: classifyOperation(operationLabel, config.lexicon),
      operationLabel,
      origin,
      price: price.value,
      quantity: quantity.value,
      settlementDate: settlementDate.value,
      ticker: ticker.value,
      tradeDate: tradeDate.value,
      tradingCurrency: config.tradingCurrency,
    },
  };
}

/**
 * Typed ingestion boundary for broker rows.
 *
 * Every monetary and quantity cell is parsed into an exact Decimal exactly once here.
 * Malformed rows, including rows with a blank quantity, price or amount, are skipped and reported.
 * A table without its ticker or operation column is rejected, and so is a table that leaves no
 * usable trade once malformed and foreign-currency rows are dropped.
 */
export function normalizeTrades(
  records: readonly RawTradeRecord[],
  config: SettlementConfig,
  options: NormalizeOptions = {}
): Result<NormalizationResult, SchemaError | EmptyInputError> {
  if (records.length === 0) {
    return err(new EmptyInputError('trades'));
  }

  const columnsResult = resolveColumnDefaults(collectColumns(records), config);
  if (columnsResult.isErr()) {
    logger.error({ missingColumns: columnsResult.error.missingColumns }, columnsResult.error.message);
    return err(columnsResult.error);
  }

  const { defaults, missing } = columnsResult.value;
  for (const missingColumn of missing) {
    logger.warn({ column: missingColumn.column, defaultValue: missingColumn.defaultValue }, missingColumn.message);
  }

  const origin = options.origin ?? 'current-period';
  const trades: Trade[] = [];
  const rowErrors: RowParseError[] = [];
  let excludedByCurrency = 0;
  let unresolvedCount = 0;

  records.forEach((record, rowIndex) => {
    const outcome = normalizeRow(record, rowIndex, defaults, config, origin);
    switch (outcome.kind) {
      case 'excluded':
        excludedByCurrency += 1;
        return;
      case 'error':
        logger.warn({ field: outcome.error.field, rowIndex }, outcome.error.message);
        rowErrors.push(outcome.error);
        return;
      case 'trade':
        if (outcome.trade.operation === 'unresolved') {
          unresolvedCount += 1;
          logger.warn(
            { label: outcome.trade.operationLabel, rowIndex, ticker: outcome.trade.ticker },
            'Unrecognized operation label; row kept as unresolved'
          );
        }
        trades.push(outcome.trade);
        return;
    }
  });

  if (trades.length === 0) {
    const empty = new EmptyInputError('trades');
    logger.error({ excludedByCurrency, skipped: rowErrors.length }, empty.message);
    return err(empty);
  }

  logger.info(
    {
      excludedByCurrency,
      origin,
      rows: records.length,
      skipped: rowErrors.length,
      tradingCurrency: config.tradingCurrency,
      trades: trades.length,
      unresolved: unresolvedCount,
    },
    'Normalized trade rows'
  );

  return ok({ excludedByCurrency, missingColumns: missing, rowErrors, trades, unresolvedCount });
}
