import { type DeclaredBalance, DeclaredBalanceSchema, type PositionSummary, RowParseError } from '@fxledger/core';
import { getLogger } from '@fxledger/logger';

const logger = getLogger('reconciliation-checker');

export interface ReconciliationRow {
  ticker: string;
  computedBalance: number | undefined;
  declaredBalance: number | undefined;
  sufficient: boolean;
}

export interface DeclaredBalanceParseResult {
  balances: Map<string, number>;
  rowErrors: RowParseError[];
}

/**
 * A ticker's data is sufficient when it nets to zero and the broker declares nothing,
 * or when the computed and declared balances agree.
 */
export function isSufficient(computedBalance: number | undefined, declaredBalance: number | undefined): boolean {
  if (computedBalance === 0 && declaredBalance === undefined) return true;
  return computedBalance !== undefined && declaredBalance !== undefined && computedBalance === declaredBalance;
}

/**
 * Index declared end-of-period balances by ticker; malformed rows are skipped and reported.
 * A repeated ticker keeps its last row.
 */
export function parseDeclaredBalances(records: readonly DeclaredBalance[]): DeclaredBalanceParseResult {
  const balances = new Map<string, number>();
  const rowErrors: RowParseError[] = [];

  records.forEach((record, rowIndex) => {
    const parsed = DeclaredBalanceSchema.safeParse(record);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const rowError = new RowParseError(
        `Declared balance row ${rowIndex}: ${issue?.message ?? 'invalid row'}`,
        rowIndex,
        issue?.path.join('.') ?? 'row'
      );
      logger.warn({ rowIndex }, rowError.message);
      rowErrors.push(rowError);
      return;
    }
    balances.set(parsed.data.ticker, parsed.data.balance);
  });

  return { balances, rowErrors };
}

/**
 * Outer join of computed positions with declared balances: computed tickers first in their
 * own order, then tickers only the broker declared.
 */
export function reconcileBalances(
  positions: readonly PositionSummary[],
  declared: ReadonlyMap<string, number>
): ReconciliationRow[] {
  const rows: ReconciliationRow[] = positions.map((position) => {
    const declaredBalance = declared.get(position.ticker);
    return {
      computedBalance: position.signedBalance,
      declaredBalance,
      sufficient: isSufficient(position.signedBalance, declaredBalance),
      ticker: position.ticker,
    };
  });

  const computedTickers = new Set(positions.map((position) => position.ticker));
  for (const [ticker, declaredBalance] of declared) {
    if (computedTickers.has(ticker)) continue;
    rows.push({
      computedBalance: undefined,
      declaredBalance,
      sufficient: isSufficient(undefined, declaredBalance),
      ticker,
    });
  }

  return rows;
}

export function findInsufficientTickers(rows: readonly ReconciliationRow[]): ReconciliationRow[] {
  const insufficient = rows.filter((row) => !row.sufficient);
  logger.info(
    { insufficient: insufficient.length, tickers: rows.length },
    'Checked balances against declared positions'
  );
  return insufficient;
}
