import {
  type ClosedPosition,
  type DomainError,
  formatDecimal,
  formatIsoDate,
  formatMoney,
  type SettledTrade,
} from '@fxledger/core';

import type { SettlementReport } from '../settlement-pipeline.js';

export interface SettledTradeRow {
  id: string;
  ticker: string;
  operation: string;
  operationLabel: string;
  origin: string;
  quantity: number;
  price: string;
  tradingCurrency: string;
  amount: string;
  commission: string;
  commissionCurrency: string;
  tradeDate: string;
  settlementDate: string;
  rate: string;
  domesticAmount: string;
  domesticCommission: string;
  netResult: string;
  rateFallback: boolean;
  sourceTradeId: string | null;
}

export interface PositionRow {
  ticker: string;
  signedBalance: number;
  realizedResult: string;
}

export interface ClosedPositionRow {
  ticker: string;
  totalBuys: string;
  totalSells: string;
  totalCommission: string;
  netResult: string;
}

export interface InsufficientDataRow {
  ticker: string;
  computedBalance: number | null;
  declaredBalance: number | null;
}

export interface DiagnosticRow {
  code: string;
  severity: string;
  message: string;
}

/**
 * Plain tables for the rendering layer: every monetary column is a string with exactly
 * two fractional digits, every date is `YYYY-MM-DD`.
 */
export interface SerializedSettlementReport {
  tradingCurrency: string;
  domesticCurrency: string;
  settledTrades: SettledTradeRow[];
  positions: PositionRow[];
  closedPositions: ClosedPositionRow[];
  insufficientData: InsufficientDataRow[];
  diagnostics: DiagnosticRow[];
}

export function serializeSettledTrade(trade: SettledTrade): SettledTradeRow {
  return {
    amount: formatMoney(trade.amount),
    commission: formatMoney(trade.commission),
    commissionCurrency: trade.commissionCurrency,
    domesticAmount: formatMoney(trade.domesticAmount),
    domesticCommission: formatMoney(trade.domesticCommission),
    id: trade.id,
    netResult: formatMoney(trade.netResult),
    operation: trade.operation,
    operationLabel: trade.operationLabel,
    origin: trade.origin,
    price: formatDecimal(trade.price),
    quantity: trade.quantity,
    rate: formatDecimal(trade.appliedRate, 4),
    rateFallback: trade.rateFallback,
    settlementDate: formatIsoDate(trade.settlementDate),
    sourceTradeId: trade.sourceTradeId ?? null,
    ticker: trade.ticker,
    tradeDate: formatIsoDate(trade.tradeDate),
    tradingCurrency: trade.tradingCurrency,
  };
}

function serializeClosedPosition(position: ClosedPosition): ClosedPositionRow {
  return {
    netResult: formatMoney(position.netResult),
    ticker: position.ticker,
    totalBuys: formatMoney(position.totalBuys),
    totalCommission: formatMoney(position.totalCommission),
    totalSells: formatMoney(position.totalSells),
  };
}

function serializeDiagnostic(error: DomainError): DiagnosticRow {
  return { code: error.code, message: error.message, severity: error.severity };
}

export function serializeSettlementReport(report: SettlementReport): SerializedSettlementReport {
  const { positions: closed, total } = report.closedPositions;

  return {
    closedPositions: [...closed, ...(total ? [total] : [])].map(serializeClosedPosition),
    diagnostics: report.diagnostics.map(serializeDiagnostic),
    domesticCurrency: report.domesticCurrency,
    insufficientData: report.insufficientData.map((row) => ({
      computedBalance: row.computedBalance ?? null,
      declaredBalance: row.declaredBalance ?? null,
      ticker: row.ticker,
    })),
    positions: report.positions.map((position) => ({
      realizedResult: formatMoney(position.realizedResult),
      signedBalance: position.signedBalance,
      ticker: position.ticker,
    })),
    settledTrades: report.settledTrades.map(serializeSettledTrade),
    tradingCurrency: report.tradingCurrency,
  };
}
