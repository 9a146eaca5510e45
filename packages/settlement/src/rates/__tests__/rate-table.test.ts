import { EmptyInputError, formatIsoDate, NoRateFoundError, parseDecimal } from '@fxledger/core';
import { assertErr, assertOk } from '@fxledger/core/test-utils';
import { describe, expect, it } from 'vitest';

import { createTrade } from '../../__tests__/test-utils.js';
import { RateTable } from '../rate-table.js';

function buildTable(rows: [string, string][]): RateTable {
  return assertOk(RateTable.fromRecords(rows.map(([date, rate]) => ({ date, rate })))).table;
}

describe('RateTable.fromRecords', () => {
  it('sorts entries ascending by date', () => {
    const table = buildTable([
      ['2024-01-10', '92.50'],
      ['2024-01-01', '90.00'],
    ]);

    expect(table.toArray().map((entry) => formatIsoDate(entry.date))).toEqual(['2024-01-01', '2024-01-10']);
  });

  it('keeps the last rate supplied for a repeated date', () => {
    const table = buildTable([
      ['2024-01-01', '90.00'],
      ['01.01.2024', '91,25'],
    ]);

    expect(table.size).toBe(1);
    expect(assertOk(table.lookup(new Date('2024-01-01'))).toFixed(2)).toBe('91.25');
  });

  it('skips malformed rows and reports them', () => {
    const { table, rowErrors } = assertOk(
      RateTable.fromRecords([
        { date: '2024-01-01', rate: '90,00' },
        { date: 'not a date', rate: '91' },
        { date: '2024-01-03', rate: '0' },
        { date: '2024-01-04', rate: 'abc' },
      ])
    );

    expect(table.size).toBe(1);
    expect(rowErrors.map((error) => [error.rowIndex, error.field])).toEqual([
      [1, 'date'],
      [2, 'rate'],
      [3, 'rate'],
    ]);
  });

  it('fails on an empty table', () => {
    expect(assertErr(RateTable.fromRecords([]))).toBeInstanceOf(EmptyInputError);
  });

  it('fails when every row is malformed', () => {
    const error = assertErr(RateTable.fromRecords([{ date: null, rate: '90' }]));
    expect(error).toBeInstanceOf(EmptyInputError);
    expect(error.table).toBe('rates');
  });
});

describe('RateTable.lookup', () => {
  const table = buildTable([
    ['2024-01-01', '90.00'],
    ['2024-01-10', '92.50'],
    ['2024-01-20', '93.10'],
  ]);

  it('returns the rate of the latest entry on or before the date', () => {
    expect(assertOk(table.lookup(new Date('2024-01-05'))).toFixed(2)).toBe('90.00');
    expect(assertOk(table.lookup(new Date('2024-01-10'))).toFixed(2)).toBe('92.50');
    expect(assertOk(table.lookup(new Date('2024-01-19'))).toFixed(2)).toBe('92.50');
    expect(assertOk(table.lookup(new Date('2025-01-01'))).toFixed(2)).toBe('93.10');
  });

  it('fails when the date precedes the table', () => {
    const error = assertErr(table.lookup(new Date('2023-12-31')));
    expect(error).toBeInstanceOf(NoRateFoundError);
    expect(error.message).toBe('No exchange rate effective on or before 2023-12-31');
  });
});

describe('RateTable.resolveAsOf', () => {
  const table = buildTable([
    ['2024-01-01', '90.00'],
    ['2024-01-10', '92.50'],
  ]);

  it('matches each trade to the preceding rate and orders by settlement date', () => {
    const trades = [
      createTrade('B', 'sell', 1, { id: 'late', settlementDate: '2024-01-12' }),
      createTrade('A', 'buy', 1, { id: 'early', settlementDate: '2024-01-05' }),
      createTrade('C', 'buy', 1, { id: 'on-date', settlementDate: '2024-01-10' }),
    ];

    const resolved = table.resolveAsOf(trades);

    expect(resolved.map((resolution) => resolution.trade.id)).toEqual(['early', 'on-date', 'late']);
    expect(resolved.map((resolution) => resolution.rate?.toFixed(2))).toEqual(['90.00', '92.50', '92.50']);
  });

  it('leaves the rate absent for trades before the first entry', () => {
    const [resolution] = table.resolveAsOf([createTrade('A', 'buy', 1, { settlementDate: '2023-12-29' })]);
    expect(resolution?.rate).toBeUndefined();
  });

  it('keeps input order for trades settling on the same date', () => {
    const trades = ['first', 'second', 'third'].map((id) => createTrade('A', 'buy', 1, { id }));
    expect(table.resolveAsOf(trades).map((resolution) => resolution.trade.id)).toEqual(['first', 'second', 'third']);
  });

  it('agrees with per-date lookup', () => {
    const dates = ['2023-12-31', '2024-01-01', '2024-01-09', '2024-01-10', '2024-02-01'];
    const resolved = table.resolveAsOf(dates.map((settlementDate) => createTrade('A', 'buy', 1, { settlementDate })));

    for (const resolution of resolved) {
      const lookup = table.lookup(resolution.trade.settlementDate);
      expect(resolution.rate?.toFixed()).toBe(lookup.isOk() ? lookup.value.toFixed() : undefined);
    }
  });

  it('passes exact rates through without rounding', () => {
    const precise = buildTable([['2024-01-01', '89,6883']]);
    const [resolution] = precise.resolveAsOf([createTrade('A', 'buy', 1)]);
    expect(resolution?.rate?.equals(parseDecimal('89.6883'))).toBe(true);
  });
});
