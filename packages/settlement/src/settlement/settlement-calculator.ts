import { formatIsoDate, NoRateFoundError, round2, type SettledTrade, type Trade } from '@fxledger/core';
import { getLogger } from '@fxledger/logger';
import { Decimal } from 'decimal.js';

import type { RateTable, RateResolution } from '../rates/rate-table.js';

const logger = getLogger('settlement-calculator');

export interface SettlementBatch {
  settled: SettledTrade[];
  /** One entry per trade that fell back to a zero rate */
  missingRates: NoRateFoundError[];
}

/**
 * Convert one trade into domestic currency.
 *
 * Each of the three figures is rounded to 2 dp half-up on its own, so the net result is
 * computed from the already-rounded amount and commission:
 *
 *   domesticAmount     = round2(amount × rate), negated for buys
 *   domesticCommission = round2(commission × rate)
 *   netResult          = round2(domesticAmount − domesticCommission)
 */
export function settleTrade(trade: Trade, rate: Decimal, rateFallback = false): SettledTrade {
  const gross = round2(trade.amount.times(rate));
  const domesticAmount = trade.operation === 'buy' ? gross.negated() : gross;
  const domesticCommission = round2(trade.commission.times(rate));
  const netResult = round2(domesticAmount.minus(domesticCommission));

  return {
    ...trade,
    appliedRate: rate,
    domesticAmount,
    domesticCommission,
    netResult,
    rateFallback,
  };
}

function settleResolution(resolution: RateResolution, missingRates: NoRateFoundError[]): SettledTrade {
  const { trade, rate } = resolution;
  if (rate !== undefined) {
    return settleTrade(trade, rate);
  }

  // Zero-rate fallback zeroes the domestic figures of this row; surfaced as a warning
  const missing = new NoRateFoundError(trade.settlementDate, {
    additionalContext: { ticker: trade.ticker, tradeId: trade.id },
  });
  logger.warn(
    { settlementDate: formatIsoDate(trade.settlementDate), ticker: trade.ticker, tradeId: trade.id },
    'No exchange rate on or before settlement date; applying zero rate'
  );
  missingRates.push(missing);
  return settleTrade(trade, new Decimal(0), true);
}

/**
 * Settle a batch with the as-of merge. Output is ordered by settlement date.
 */
export function settleTrades(trades: readonly Trade[], rateTable: RateTable): SettlementBatch {
  const missingRates: NoRateFoundError[] = [];
  const settled = rateTable.resolveAsOf(trades).map((resolution) => settleResolution(resolution, missingRates));
  return { missingRates, settled };
}

/**
 * Settle synthesized trades that carry no rate yet, looking each one up individually.
 * Trades that already carry an applied rate are settled with it.
 */
export function settleBorrowedTrades(trades: readonly Trade[], rateTable: RateTable): SettlementBatch {
  const missingRates: NoRateFoundError[] = [];
  const settled = trades.map((trade) => {
    if (trade.appliedRate !== undefined) {
      return settleTrade(trade, trade.appliedRate);
    }
    const lookup = rateTable.lookup(trade.settlementDate);
    return settleResolution({ rate: lookup.isOk() ? lookup.value : undefined, trade }, missingRates);
  });
  return { missingRates, settled };
}
