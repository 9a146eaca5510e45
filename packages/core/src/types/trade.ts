import type { Decimal } from 'decimal.js';

/**
 * Canonical side of a ledger row, decided once during normalization.
 * `unresolved` keeps rows whose label matched neither lexicon.
 */
export type TradeOperation = 'buy' | 'sell' | 'unresolved';

/**
 * Where a trade came from: the reporting period itself, or a lot borrowed from prior-period history
 */
export type TradeOrigin = 'current-period' | 'prior-period';

export interface Trade {
  id: string;
  ticker: string;
  operation: TradeOperation;
  /** Raw broker label, or the borrowed-trade label for synthesized rows */
  operationLabel: string;
  origin: TradeOrigin;
  /** Whole units, always a magnitude */
  quantity: number;
  price: Decimal;
  tradingCurrency: string;
  /** Unsigned trade value in the trading currency */
  amount: Decimal;
  /** Unsigned broker commission in the trading currency */
  commission: Decimal;
  commissionCurrency: string;
  tradeDate: Date;
  settlementDate: Date;
  appliedRate: Decimal | undefined;
  /** Originating prior-period lot for borrowed trades */
  sourceTradeId?: string | undefined;
}

export interface SettledTrade extends Trade {
  appliedRate: Decimal;
  /** Signed domestic amount: negative for buys */
  domesticAmount: Decimal;
  domesticCommission: Decimal;
  netResult: Decimal;
  /** True when no rate was effective and zero was applied */
  rateFallback: boolean;
}

export interface PositionSummary {
  ticker: string;
  signedBalance: number;
  realizedResult: Decimal;
}

export interface ClosedPosition {
  ticker: string;
  totalBuys: Decimal;
  totalSells: Decimal;
  totalCommission: Decimal;
  netResult: Decimal;
}
