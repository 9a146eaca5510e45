import {
  EmptyInputError,
  formatIsoDate,
  NoRateFoundError,
  type RateRecord,
  RateRecordSchema,
  type RawRateRecord,
  RowParseError,
  type Trade,
} from '@fxledger/core';
import { getLogger } from '@fxledger/logger';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('rate-table');

export interface RateEntry {
  readonly date: Date;
  readonly rate: Decimal;
}

export interface RateResolution<T extends Trade = Trade> {
  trade: T;
  /** Absent when the trade settles before the first rate in the table */
  rate: Decimal | undefined;
}

export interface RateTableLoadResult {
  table: RateTable;
  rowErrors: RowParseError[];
}

/**
 * Sort trades by settlement date ascending; equal dates keep their input order.
 */
export function sortBySettlementDate<T extends Trade>(trades: readonly T[]): T[] {
  return trades
    .map((trade, index) => ({ index, trade }))
    .sort((a, b) => a.trade.settlementDate.getTime() - b.trade.settlementDate.getTime() || a.index - b.index)
    .map(({ trade }) => trade);
}

/**
 * Immutable daily rate series of the trading currency in domestic currency units.
 *
 * Entries are sorted ascending by date with at most one rate per date; when the
 * source repeats a date the last row supplied wins.
 */
export class RateTable {
  private readonly entries: readonly RateEntry[];

  private constructor(entries: readonly RateEntry[]) {
    this.entries = entries;
  }

  /**
   * Build a table from already-typed records. Fails only when no record is supplied.
   */
  static fromEntries(records: readonly RateRecord[]): Result<RateTable, EmptyInputError> {
    if (records.length === 0) {
      return err(new EmptyInputError('rates'));
    }

    const byDate = new Map<number, RateEntry>();
    for (const record of records) {
      byDate.set(record.date.getTime(), { date: record.date, rate: record.rate });
    }

    const entries = [...byDate.values()].sort((a, b) => a.date.getTime() - b.date.getTime());
    return ok(new RateTable(entries));
  }

  /**
   * Parse raw rate rows. Malformed rows (bad date, non-positive or non-numeric rate) are
   * skipped and reported; a table left without rows is fatal.
   */
  static fromRecords(records: readonly RawRateRecord[]): Result<RateTableLoadResult, EmptyInputError> {
    const parsed: RateRecord[] = [];
    const rowErrors: RowParseError[] = [];

    records.forEach((record, rowIndex) => {
      const result = RateRecordSchema.safeParse(record);
      if (result.success) {
        parsed.push(result.data);
        return;
      }

      const issue = result.error.issues[0];
      const field = issue?.path.join('.') ?? 'row';
      const rowError = new RowParseError(`Rate row ${rowIndex}: ${issue?.message ?? 'invalid row'}`, rowIndex, field);
      logger.warn({ field, rowIndex }, rowError.message);
      rowErrors.push(rowError);
    });

    return RateTable.fromEntries(parsed).map((table) => {
      logger.info(
        { firstDate: table.firstDate && formatIsoDate(table.firstDate), rates: table.size, skipped: rowErrors.length },
        'Loaded exchange rates'
      );
      return { rowErrors, table };
    });
  }

  get size(): number {
    return this.entries.length;
  }

  get firstDate(): Date | undefined {
    return this.entries[0]?.date;
  }

  toArray(): readonly RateEntry[] {
    return this.entries;
  }

  /**
   * Rate of the latest entry dated on or before `date`.
   */
  lookup(date: Date): Result<Decimal, NoRateFoundError> {
    const target = date.getTime();
    let low = 0;
    let high = this.entries.length - 1;
    let found: RateEntry | undefined;

    while (low <= high) {
      const mid = (low + high) >> 1;
      const entry = this.entries[mid];
      if (!entry) break;
      if (entry.date.getTime() <= target) {
        found = entry;
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }

    return found ? ok(found.rate) : err(new NoRateFoundError(date));
  }

  /**
   * As-of join of a whole batch: every trade is visited once in ascending settlement order
   * while the rate cursor only moves forward, O(n + m).
   */
  resolveAsOf<T extends Trade>(trades: readonly T[]): RateResolution<T>[] {
    const resolutions: RateResolution<T>[] = [];
    let cursor = -1;

    for (const trade of sortBySettlementDate(trades)) {
      const target = trade.settlementDate.getTime();
      let next = this.entries[cursor + 1];
      while (next && next.date.getTime() <= target) {
        cursor += 1;
        next = this.entries[cursor + 1];
      }
      resolutions.push({ rate: this.entries[cursor]?.rate, trade });
    }

    return resolutions;
  }
}
