import { formatMoney, NoRateFoundError, parseDecimal } from '@fxledger/core';
import { assertOk } from '@fxledger/core/test-utils';
import { describe, expect, it } from 'vitest';

import { createTrade } from '../../__tests__/test-utils.js';
import { RateTable } from '../../rates/rate-table.js';
import { settleBorrowedTrades, settleTrade, settleTrades } from '../settlement-calculator.js';

const rateTable = assertOk(
  RateTable.fromRecords([
    { date: '2024-01-01', rate: '90.00' },
    { date: '2024-01-10', rate: '92.50' },
  ])
).table;

describe('settleTrade', () => {
  it('negates the domestic amount of a buy', () => {
    const trade = createTrade('A', 'buy', 10, { amount: '1000.00', commission: '5.00' });
    const settled = settleTrade(trade, parseDecimal('90'));

    expect(formatMoney(settled.domesticAmount)).toBe('-90000.00');
    expect(formatMoney(settled.domesticCommission)).toBe('450.00');
    expect(formatMoney(settled.netResult)).toBe('-90450.00');
    expect(settled.rateFallback).toBe(false);
  });

  it('keeps the domestic amount of a sell positive', () => {
    const trade = createTrade('A', 'sell', 3, { amount: '300', commission: '1.5' });
    const settled = settleTrade(trade, parseDecimal('92.5'));

    expect(formatMoney(settled.domesticAmount)).toBe('27750.00');
    expect(formatMoney(settled.domesticCommission)).toBe('138.75');
    expect(formatMoney(settled.netResult)).toBe('27611.25');
  });

  it('treats unresolved trades like sells', () => {
    const settled = settleTrade(createTrade('A', 'unresolved', 1, { amount: '10' }), parseDecimal('2'));
    expect(formatMoney(settled.domesticAmount)).toBe('20.00');
  });

  it('rounds each figure half-up on its own', () => {
    const settled = settleTrade(
      createTrade('A', 'sell', 1, { amount: '33.335', commission: '0.005' }),
      parseDecimal('1')
    );

    expect(formatMoney(settled.domesticAmount)).toBe('33.34');
    expect(formatMoney(settled.domesticCommission)).toBe('0.01');
    expect(formatMoney(settled.netResult)).toBe('33.33');
  });

  it('records the applied rate', () => {
    const settled = settleTrade(createTrade('A', 'buy', 1), parseDecimal('91.1234'));
    expect(settled.appliedRate?.toString()).toBe('91.1234');
  });
});

describe('settleTrades', () => {
  it('settles each trade at the rate effective on its settlement date', () => {
    const { settled, missingRates } = settleTrades(
      [
        createTrade('A', 'sell', 10, { amount: '1000.00', id: 'sell', settlementDate: '2024-01-12' }),
        createTrade('A', 'buy', 10, { amount: '1000.00', commission: '5.00', id: 'buy', settlementDate: '2024-01-05' }),
      ],
      rateTable
    );

    expect(missingRates).toEqual([]);
    const figures = settled.map((trade) => [trade.id, formatMoney(trade.domesticAmount), formatMoney(trade.netResult)]);
    expect(figures).toEqual([
      ['buy', '-90000.00', '-90450.00'],
      ['sell', '92500.00', '92500.00'],
    ]);
  });

  it('falls back to a zero rate when no rate precedes the settlement date', () => {
    const { settled, missingRates } = settleTrades(
      [createTrade('A', 'buy', 1, { amount: '100', commission: '1', settlementDate: '2023-12-20' })],
      rateTable
    );

    expect(missingRates).toHaveLength(1);
    expect(missingRates[0]).toBeInstanceOf(NoRateFoundError);
    expect(missingRates[0]?.message).toBe('No exchange rate effective on or before 2023-12-20');
    expect(settled[0]?.rateFallback).toBe(true);
    expect(settled[0]?.domesticAmount.isZero()).toBe(true);
    expect(settled[0]?.netResult.isZero()).toBe(true);
  });
});

describe('settleBorrowedTrades', () => {
  it('looks up a rate per trade and keeps input order', () => {
    const { settled } = settleBorrowedTrades(
      [
        createTrade('A', 'buy', 1, { amount: '10', id: 'late', settlementDate: '2024-01-15' }),
        createTrade('A', 'buy', 1, { amount: '10', id: 'early', settlementDate: '2024-01-02' }),
      ],
      rateTable
    );

    expect(settled.map((trade) => [trade.id, formatMoney(trade.domesticAmount)])).toEqual([
      ['late', '-925.00'],
      ['early', '-900.00'],
    ]);
  });

  it('reuses a rate already applied to the trade', () => {
    const trade = {
      ...createTrade('A', 'buy', 1, { amount: '10', settlementDate: '2023-06-01' }),
      appliedRate: parseDecimal('80'),
    };
    const { settled, missingRates } = settleBorrowedTrades([trade], rateTable);

    expect(missingRates).toEqual([]);
    expect(settled[0]?.domesticAmount.toFixed(2)).toBe('-800.00');
  });
});
