/**
 * @fxledger/settlement
 *
 * Settles a brokerage trade ledger against a daily exchange-rate table: domestic-currency
 * amounts per trade, per-instrument balances and realized results, closed-position P&L,
 * coverage of oversold balances from prior-period purchase lots, and reconciliation against
 * declared end-of-period balances.
 */

// Configuration
export {
  createSettlementConfig,
  OperationLexiconSchema,
  SettlementConfigSchema,
  type OperationLexicon,
  type SettlementConfig,
  type SettlementConfigInput,
} from './config/settlement-config.js';

// Rates
export {
  RateTable,
  sortBySettlementDate,
  type RateEntry,
  type RateResolution,
  type RateTableLoadResult,
} from './rates/rate-table.js';

// Normalization
export { classifyOperation, labelHasToken } from './normalization/operation-classifier.js';
export { normalizeTrades, type NormalizationResult, type NormalizeOptions } from './normalization/trade-normalizer.js';

// Settlement
export {
  settleBorrowedTrades,
  settleTrade,
  settleTrades,
  type SettlementBatch,
} from './settlement/settlement-calculator.js';

// Positions
export {
  aggregatePositions,
  findNegativePositions,
  groupByTicker,
  signedQuantity,
} from './positions/position-aggregator.js';
export {
  resolveClosedPositions,
  sumClosedPositions,
  type ClosedPositionTable,
} from './positions/closed-position-resolver.js';

// Short coverage
export {
  isPurchaseLot,
  selectPriorPeriodLots,
  sortLotsMostRecentFirst,
  type PriorPeriodLots,
} from './short-coverage/prior-period-lots.js';
export {
  borrowFromLot,
  coverShortfall,
  resolveShortPositions,
  type ShortCoverageOutcome,
  type ShortCoverageResult,
} from './short-coverage/short-coverage-resolver.js';

// Reconciliation
export {
  findInsufficientTickers,
  isSufficient,
  parseDeclaredBalances,
  reconcileBalances,
  type DeclaredBalanceParseResult,
  type ReconciliationRow,
} from './reconciliation/reconciliation-checker.js';

// Pipeline
export { runSettlementPipeline, type SettlementInput, type SettlementReport } from './settlement-pipeline.js';

// Reports
export {
  serializeSettledTrade,
  serializeSettlementReport,
  type ClosedPositionRow,
  type DiagnosticRow,
  type InsufficientDataRow,
  type PositionRow,
  type SerializedSettlementReport,
  type SettledTradeRow,
} from './reports/report-serializer.js';
