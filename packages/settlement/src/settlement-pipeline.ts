import type {
  DeclaredBalance,
  DomainError,
  EmptyInputError,
  PositionSummary,
  RawRateRecord,
  RawTradeRecord,
  SchemaError,
  SettledTrade,
} from '@fxledger/core';
import { getLogger } from '@fxledger/logger';
import { err, ok, type Result } from 'neverthrow';

import type { SettlementConfig } from './config/settlement-config.js';
import { normalizeTrades } from './normalization/trade-normalizer.js';
import { type ClosedPositionTable, resolveClosedPositions } from './positions/closed-position-resolver.js';
import { aggregatePositions, findNegativePositions } from './positions/position-aggregator.js';
import { RateTable } from './rates/rate-table.js';
import {
  findInsufficientTickers,
  parseDeclaredBalances,
  reconcileBalances,
  type ReconciliationRow,
} from './reconciliation/reconciliation-checker.js';
import { settleBorrowedTrades, settleTrades } from './settlement/settlement-calculator.js';
import { selectPriorPeriodLots } from './short-coverage/prior-period-lots.js';
import { resolveShortPositions, type ShortCoverageOutcome } from './short-coverage/short-coverage-resolver.js';

const logger = getLogger('settlement-pipeline');

export interface SettlementInput {
  trades: readonly RawTradeRecord[];
  rates: readonly RawRateRecord[];
  /** Prior-period reports used only as a source of purchase lots */
  priorPeriodTrades?: readonly (readonly RawTradeRecord[])[] | undefined;
  /** Broker-declared end-of-period balances */
  declaredBalances?: readonly DeclaredBalance[] | undefined;
}

export interface SettlementReport {
  tradingCurrency: string;
  domesticCurrency: string;
  /** Current-period trades in settlement order, followed by borrowed trades */
  settledTrades: SettledTrade[];
  positions: PositionSummary[];
  closedPositions: ClosedPositionTable;
  reconciliation: ReconciliationRow[];
  insufficientData: ReconciliationRow[];
  shortCoverage: ShortCoverageOutcome[];
  /** Recovered row- and ticker-level problems, in the order they were met */
  diagnostics: DomainError[];
}

interface DerivedViews {
  positions: PositionSummary[];
  reconciliation: ReconciliationRow[];
  insufficientData: ReconciliationRow[];
}

function deriveViews(settledTrades: readonly SettledTrade[], declared: ReadonlyMap<string, number>): DerivedViews {
  const positions = aggregatePositions(settledTrades);
  const reconciliation = reconcileBalances(positions, declared);
  return { insufficientData: findInsufficientTickers(reconciliation), positions, reconciliation };
}

/**
 * Settlement run: normalize → settle → aggregate → reconcile, then cover negative balances
 * from prior-period lots and recompute the derived views on the extended trade set.
 *
 * Structural input problems (no usable rates, no usable trades, missing ticker/operation column) fail the run.
 * Everything else is recovered and listed in `diagnostics`.
 */
export function runSettlementPipeline(
  input: SettlementInput,
  config: SettlementConfig
): Result<SettlementReport, SchemaError | EmptyInputError> {
  const diagnostics: DomainError[] = [];

  const ratesResult = RateTable.fromRecords(input.rates);
  if (ratesResult.isErr()) {
    logger.error(ratesResult.error.message);
    return err(ratesResult.error);
  }
  const { table: rateTable, rowErrors: rateRowErrors } = ratesResult.value;
  diagnostics.push(...rateRowErrors);

  const normalizedResult = normalizeTrades(input.trades, config);
  if (normalizedResult.isErr()) {
    return err(normalizedResult.error);
  }
  const normalized = normalizedResult.value;
  diagnostics.push(...normalized.missingColumns, ...normalized.rowErrors);

  const declared = parseDeclaredBalances(input.declaredBalances ?? []);
  diagnostics.push(...declared.rowErrors);

  const initial = settleTrades(normalized.trades, rateTable);
  diagnostics.push(...initial.missingRates);

  let settledTrades: SettledTrade[] = initial.settled;
  let views = deriveViews(settledTrades, declared.balances);
  let shortCoverage: ShortCoverageOutcome[] = [];

  // Only balances the reconciliation rejects are sent to prior-period sourcing
  const insufficientTickers = new Set(views.insufficientData.map((row) => row.ticker));
  const shortPositions = findNegativePositions(views.positions).filter((position) =>
    insufficientTickers.has(position.ticker)
  );

  if (shortPositions.length > 0) {
    const histories = input.priorPeriodTrades ?? [];
    if (histories.length === 0) {
      logger.warn(
        { tickers: shortPositions.map((position) => `${position.ticker}:${position.signedBalance}`) },
        'More units sold than bought in this period; supply prior-period reports to cover the shortfall'
      );
    } else {
      const priorLots = selectPriorPeriodLots(histories, config);
      diagnostics.push(...priorLots.rejectedReports, ...priorLots.missingColumns, ...priorLots.rowErrors);

      const coverage = resolveShortPositions(shortPositions, priorLots.lotsByTicker, config);
      diagnostics.push(...coverage.uncovered);
      shortCoverage = coverage.outcomes;

      if (coverage.borrowedTrades.length > 0) {
        const borrowed = settleBorrowedTrades(coverage.borrowedTrades, rateTable);
        diagnostics.push(...borrowed.missingRates);

        settledTrades = [...initial.settled, ...borrowed.settled];
        views = deriveViews(settledTrades, declared.balances);
      }
    }
  }

  const closedPositions = resolveClosedPositions(settledTrades, views.positions, config.totalRowLabel);

  logger.info(
    {
      closed: closedPositions.positions.length,
      diagnostics: diagnostics.length,
      insufficient: views.insufficientData.length,
      settled: settledTrades.length,
      tickers: views.positions.length,
    },
    'Settlement run complete'
  );

  return ok({
    closedPositions,
    diagnostics,
    domesticCurrency: config.domesticCurrency,
    insufficientData: views.insufficientData,
    positions: views.positions,
    reconciliation: views.reconciliation,
    settledTrades,
    shortCoverage,
    tradingCurrency: config.tradingCurrency,
  });
}
