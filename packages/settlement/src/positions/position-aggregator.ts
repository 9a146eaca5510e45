import { type PositionSummary, round2, type SettledTrade, sumDecimals, type Trade } from '@fxledger/core';

/**
 * Signed contribution of a row to the instrument balance.
 *
 * Buys add, sells subtract. Unresolved rows add their raw unsigned quantity: a mislabelled
 * row silently shifts the balance, which is why the normalizer warns about every one of them.
 */
export function signedQuantity(trade: Pick<Trade, 'operation' | 'quantity'>): number {
  switch (trade.operation) {
    case 'buy':
      return trade.quantity;
    case 'sell':
      return -trade.quantity;
    case 'unresolved':
      return trade.quantity;
  }
}

/**
 * Group settled trades by ticker, in order of first appearance.
 */
export function groupByTicker<T extends Pick<Trade, 'ticker'>>(trades: readonly T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const trade of trades) {
    const group = groups.get(trade.ticker);
    if (group) {
      group.push(trade);
    } else {
      groups.set(trade.ticker, [trade]);
    }
  }
  return groups;
}

/**
 * Per-ticker balance and realized result.
 * The realized result sums already-rounded net results and is rounded once more.
 */
export function aggregatePositions(settledTrades: readonly SettledTrade[]): PositionSummary[] {
  return [...groupByTicker(settledTrades)].map(([ticker, rows]) => ({
    realizedResult: round2(sumDecimals(rows.map((row) => row.netResult))),
    signedBalance: rows.reduce((balance, row) => balance + signedQuantity(row), 0),
    ticker,
  }));
}

export function findNegativePositions(positions: readonly PositionSummary[]): PositionSummary[] {
  return positions.filter((position) => position.signedBalance < 0);
}
