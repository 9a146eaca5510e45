const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;
const UTC_OFFSET = /^([+-])(\d{2}):?(\d{2})$/;
const DAY_FIRST_DATE = /^(\d{1,2})[./](\d{1,2})[./](\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

function buildUtcDate(
  year: number,
  month: number,
  day: number,
  hours = 0,
  minutes = 0,
  seconds = 0,
  milliseconds = 0
): Date | undefined {
  const date = new Date(Date.UTC(year, month - 1, day, hours, minutes, seconds, milliseconds));
  // Reject overflowed components such as 31.02.2024
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return undefined;
  }
  return date;
}

function toNumber(part: string | undefined): number {
  return part === undefined ? 0 : Number.parseInt(part, 10);
}

/**
 * Minutes east of UTC for `+03:00` / `-0530` style suffixes; `Z` and no suffix are zero
 */
function offsetMinutes(suffix: string | undefined): number {
  const match = suffix === undefined ? null : UTC_OFFSET.exec(suffix);
  if (!match) return 0;
  const minutes = toNumber(match[2]) * 60 + toNumber(match[3]);
  return match[1] === '-' ? -minutes : minutes;
}

/**
 * Parse a ledger date cell.
 *
 * Accepts Date instances, ISO dates (`2024-01-05`, `2024-01-05T10:30:00`) and the day-first
 * format used by broker and central bank exports (`05.01.2024`). Wall-clock values are read as UTC
 * so that date-only comparisons never shift across time zones.
 */
export function parseLedgerDate(value: unknown): Date | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value !== 'string') {
    return undefined;
  }

  const text = value.trim();
  const iso = ISO_DATE.exec(text);
  if (iso) {
    const wallClock = buildUtcDate(
      toNumber(iso[1]),
      toNumber(iso[2]),
      toNumber(iso[3]),
      toNumber(iso[4]),
      toNumber(iso[5]),
      toNumber(iso[6]),
      toNumber((iso[7] ?? '').slice(0, 3).padEnd(3, '0'))
    );
    // Values without an offset are UTC wall clock; an explicit offset shifts them to UTC
    return wallClock && new Date(wallClock.getTime() - offsetMinutes(iso[8]) * 60000);
  }

  const dayFirst = DAY_FIRST_DATE.exec(text);
  if (dayFirst) {
    return buildUtcDate(
      toNumber(dayFirst[3]),
      toNumber(dayFirst[2]),
      toNumber(dayFirst[1]),
      toNumber(dayFirst[4]),
      toNumber(dayFirst[5]),
      toNumber(dayFirst[6])
    );
  }

  return undefined;
}

/**
 * `YYYY-MM-DD` in UTC
 */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
