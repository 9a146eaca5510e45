import { type ClosedPosition, type PositionSummary, round2, type SettledTrade, sumDecimals } from '@fxledger/core';
import { getLogger } from '@fxledger/logger';

import { groupByTicker } from './position-aggregator.js';

const logger = getLogger('closed-position-resolver');

export interface ClosedPositionTable {
  positions: ClosedPosition[];
  /** Column-wise sum over `positions`; absent when nothing closed */
  total: ClosedPosition | undefined;
}

function closePosition(ticker: string, rows: readonly SettledTrade[]): ClosedPosition {
  const totalBuys = round2(
    sumDecimals(rows.filter((row) => row.operation === 'buy').map((row) => row.domesticAmount.negated()))
  );
  const totalSells = round2(
    sumDecimals(rows.filter((row) => row.operation === 'sell').map((row) => row.domesticAmount))
  );
  // Commission is charged on every row, unresolved ones included
  const totalCommission = round2(sumDecimals(rows.map((row) => row.domesticCommission)));
  const netResult = round2(totalSells.minus(totalBuys).minus(totalCommission));

  return { netResult, ticker, totalBuys, totalCommission, totalSells };
}

export function sumClosedPositions(positions: readonly ClosedPosition[], label: string): ClosedPosition {
  return {
    netResult: round2(sumDecimals(positions.map((position) => position.netResult))),
    ticker: label,
    totalBuys: round2(sumDecimals(positions.map((position) => position.totalBuys))),
    totalCommission: round2(sumDecimals(positions.map((position) => position.totalCommission))),
    totalSells: round2(sumDecimals(positions.map((position) => position.totalSells))),
  };
}

/**
 * Buys, sells, commission and net result for every ticker whose balance nets to exactly zero,
 * plus a total row. Tickers with any other balance never appear.
 */
export function resolveClosedPositions(
  settledTrades: readonly SettledTrade[],
  positions: readonly PositionSummary[],
  totalLabel: string
): ClosedPositionTable {
  const rowsByTicker = groupByTicker(settledTrades);
  const closed = positions
    .filter((position) => position.signedBalance === 0)
    .map((position) => closePosition(position.ticker, rowsByTicker.get(position.ticker) ?? []));

  logger.info({ closed: closed.length, open: positions.length - closed.length }, 'Resolved closed positions');

  return {
    positions: closed,
    total: closed.length > 0 ? sumClosedPositions(closed, totalLabel) : undefined,
  };
}
