import {
  formatIsoDate,
  InsufficientPriorDataError,
  type PositionSummary,
  round2,
  type Trade,
} from '@fxledger/core';
import { getLogger } from '@fxledger/logger';
import { Decimal } from 'decimal.js';
import { v4 as uuidv4 } from 'uuid';

import type { SettlementConfig } from '../config/settlement-config.js';

const logger = getLogger('short-coverage-resolver');

export interface ShortCoverageOutcome {
  ticker: string;
  /** Units sold beyond what the period bought */
  shortfall: number;
  consumed: number;
  /** `shortfall - consumed`; non-zero when prior-period lots ran out */
  residual: number;
  borrowedTrades: Trade[];
}

export interface ShortCoverageResult {
  outcomes: ShortCoverageOutcome[];
  /** Every borrowed trade, in ticker then lot order */
  borrowedTrades: Trade[];
  uncovered: InsufficientPriorDataError[];
}

/**
 * Synthesize the purchase of `use` units out of a historical lot.
 * Amount and commission are prorated by `use / lot.quantity` and rounded to 2 dp.
 */
export function borrowFromLot(lot: Trade, use: number, config: SettlementConfig): Trade {
  const share = new Decimal(use).dividedBy(lot.quantity);

  return {
    amount: round2(lot.amount.times(share)),
    appliedRate: undefined,
    commission: round2(lot.commission.times(share)),
    commissionCurrency: lot.commissionCurrency,
    id: uuidv4(),
    operation: 'buy',
    operationLabel: config.borrowedTradeLabel,
    origin: 'prior-period',
    price: lot.price,
    quantity: use,
    settlementDate: lot.settlementDate,
    sourceTradeId: lot.id,
    ticker: lot.ticker,
    tradeDate: lot.tradeDate,
    tradingCurrency: lot.tradingCurrency,
  };
}

/**
 * Cover one ticker's shortfall from its purchase lots, most recent lot first.
 *
 * Lots are consumed whole until the last one, which is used partially. The walk stops as soon as
 * the shortfall is covered or the lots run out; the total borrowed never exceeds the shortfall.
 */
export function coverShortfall(
  ticker: string,
  shortfall: number,
  lots: readonly Trade[],
  config: SettlementConfig
): ShortCoverageOutcome {
  const borrowedTrades: Trade[] = [];
  let consumed = 0;

  for (const lot of lots) {
    if (consumed >= shortfall) break;
    if (lot.quantity <= 0) continue;

    const use = Math.min(lot.quantity, shortfall - consumed);
    borrowedTrades.push(borrowFromLot(lot, use, config));
    consumed += use;

    logger.info(
      {
        lotQuantity: lot.quantity,
        price: lot.price.toFixed(),
        settlementDate: formatIsoDate(lot.settlementDate),
        ticker,
        use,
      },
      'Borrowed units from prior-period lot'
    );
  }

  return { borrowedTrades, consumed, residual: shortfall - consumed, shortfall, ticker };
}

/**
 * Cover every negative balance. Tickers without enough history keep a residual, are logged and
 * reported; the run continues.
 */
export function resolveShortPositions(
  positions: readonly PositionSummary[],
  lotsByTicker: ReadonlyMap<string, readonly Trade[]>,
  config: SettlementConfig
): ShortCoverageResult {
  const outcomes: ShortCoverageOutcome[] = [];
  const uncovered: InsufficientPriorDataError[] = [];

  for (const position of positions) {
    if (position.signedBalance >= 0) continue;

    const shortfall = Math.abs(position.signedBalance);
    const outcome = coverShortfall(position.ticker, shortfall, lotsByTicker.get(position.ticker) ?? [], config);
    outcomes.push(outcome);

    if (outcome.residual > 0) {
      const error = new InsufficientPriorDataError(position.ticker, shortfall, outcome.residual);
      logger.warn(
        { consumed: outcome.consumed, residual: outcome.residual, shortfall, ticker: position.ticker },
        error.message
      );
      uncovered.push(error);
    }
  }

  const borrowedTrades = outcomes.flatMap((outcome) => outcome.borrowedTrades);
  logger.info(
    { borrowed: borrowedTrades.length, tickers: outcomes.length, uncovered: uncovered.length },
    'Resolved negative balances'
  );

  return { borrowedTrades, outcomes, uncovered };
}
