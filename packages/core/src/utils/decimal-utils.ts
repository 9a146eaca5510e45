import { Decimal } from 'decimal.js';

// Configure Decimal.js for money arithmetic
// 28 significant digits keep per-row products exact across thousands of ledger rows
Decimal.set({
  maxE: 9e15, // Maximum exponent
  minE: -9e15, // Minimum exponent
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

const PLAIN_DECIMAL_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)$/;

export type DecimalInput = string | number | Decimal | undefined | null;

/**
 * Normalize a locale-formatted numeric literal into a canonical decimal literal.
 *
 * Broker exports use comma decimal separators and group digits with (non-breaking) spaces:
 * "1 234,56" → "1234.56"
 */
export function normalizeDecimalLiteral(value: string): string {
  return value.replace(/,/g, '.').replace(/\s+/g, '');
}

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(value: DecimalInput, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null) {
    if (out) out.value = new Decimal(0);
    return true;
  }

  if (value instanceof Decimal) {
    if (out) out.value = value;
    return true;
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return false;
    if (out) out.value = new Decimal(value);
    return true;
  }

  const literal = normalizeDecimalLiteral(value);
  if (literal === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  // Plain positional notation only; hex, binary, octal and exponent forms are corrupt cells here
  if (!PLAIN_DECIMAL_LITERAL.test(literal)) return false;

  try {
    const decimal = new Decimal(literal);
    if (!decimal.isFinite()) return false;
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse a string or number to a Decimal with fallback to zero
 */
export function parseDecimal(value: DecimalInput): Decimal {
  const result = { value: new Decimal(0) };
  tryParseDecimal(value, result);
  return result.value;
}

/**
 * Round to two decimal places, half-up (away from zero on exact .5).
 */
export function round2(value: Decimal): Decimal {
  return value.toDecimalPlaces(2, Decimal.ROUND_HALF_UP);
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = new Decimal(0);
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/**
 * Money as a fixed-point string with exactly two fractional digits.
 * `-0.00` is printed as `0.00`.
 */
export function formatMoney(value: Decimal): string {
  const rounded = round2(value);
  return rounded.isZero() ? '0.00' : rounded.toFixed(2);
}

/**
 * Convert Decimal to string with appropriate precision for display
 */
export function formatDecimal(decimal: Decimal, maxDecimalPlaces = 8): string {
  return decimal.toFixed(maxDecimalPlaces).replace(/\.?0+$/, '');
}
