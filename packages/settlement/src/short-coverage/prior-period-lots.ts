import type {
  EmptyInputError,
  MissingColumnError,
  RawTradeRecord,
  RowParseError,
  SchemaError,
  Trade,
} from '@fxledger/core';
import { getLogger } from '@fxledger/logger';

import type { SettlementConfig } from '../config/settlement-config.js';
import { labelHasToken } from '../normalization/operation-classifier.js';
import { normalizeTrades } from '../normalization/trade-normalizer.js';

const logger = getLogger('prior-period-lots');

export interface PriorPeriodLots {
  /** Purchase lots per ticker, most recent first */
  lotsByTicker: Map<string, Trade[]>;
  rowErrors: RowParseError[];
  /** Columns absent from a report, with the default substituted */
  missingColumns: MissingColumnError[];
  /** Reports rejected as a whole (no usable rows, or no ticker/operation column) */
  rejectedReports: (SchemaError | EmptyInputError)[];
}

/**
 * Sort lots by trade date descending (most recent first); ties by settlement date descending,
 * then input order.
 */
export function sortLotsMostRecentFirst(lots: readonly Trade[]): Trade[] {
  return lots
    .map((lot, index) => ({ index, lot }))
    .sort(
      (a, b) =>
        b.lot.tradeDate.getTime() - a.lot.tradeDate.getTime() ||
        b.lot.settlementDate.getTime() - a.lot.settlementDate.getTime() ||
        a.index - b.index
    )
    .map(({ lot }) => lot);
}

export function isPurchaseLot(trade: Trade, config: SettlementConfig): boolean {
  return trade.operation === 'buy' || labelHasToken(trade.operationLabel, config.priorPeriodLotTokens);
}

/**
 * Normalize any number of prior-period reports and keep their purchase lots in the trading
 * currency. Rows labelled as position openings count as purchases here even though they are
 * not buys in the current period. A report that cannot be read as a trade table is logged and
 * skipped; the remaining reports are still used. A report without usable rows counts as rejected.
 */
export function selectPriorPeriodLots(
  histories: readonly (readonly RawTradeRecord[])[],
  config: SettlementConfig
): PriorPeriodLots {
  const lots: Trade[] = [];
  const rowErrors: RowParseError[] = [];
  const missingColumns: MissingColumnError[] = [];
  const rejectedReports: (SchemaError | EmptyInputError)[] = [];

  for (const [index, history] of histories.entries()) {
    const normalized = normalizeTrades(history, config, { origin: 'prior-period' });
    if (normalized.isErr()) {
      logger.error(
        { code: normalized.error.code, report: index },
        `Skipping prior-period report: ${normalized.error.message}`
      );
      rejectedReports.push(normalized.error);
      continue;
    }

    missingColumns.push(...normalized.value.missingColumns);
    rowErrors.push(...normalized.value.rowErrors);
    const purchases = normalized.value.trades.filter((trade) => isPurchaseLot(trade, config));
    logger.info({ purchases: purchases.length, report: index, rows: history.length }, 'Loaded prior-period purchases');
    lots.push(...purchases);
  }

  const lotsByTicker = new Map<string, Trade[]>();
  for (const lot of sortLotsMostRecentFirst(lots)) {
    const bucket = lotsByTicker.get(lot.ticker);
    if (bucket) {
      bucket.push(lot);
    } else {
      lotsByTicker.set(lot.ticker, [lot]);
    }
  }

  return { lotsByTicker, missingColumns, rejectedReports, rowErrors };
}
