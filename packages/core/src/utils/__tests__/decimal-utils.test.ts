import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  formatDecimal,
  formatMoney,
  normalizeDecimalLiteral,
  parseDecimal,
  round2,
  sumDecimals,
  tryParseDecimal,
} from '../decimal-utils.js';

describe('Decimal Utilities', () => {
  describe('normalizeDecimalLiteral', () => {
    it('should replace comma separators with dots', () => {
      expect(normalizeDecimalLiteral('92,5')).toBe('92.5');
    });

    it('should strip embedded whitespace including non-breaking spaces', () => {
      expect(normalizeDecimalLiteral(' 1 234,56 ')).toBe('1234.56');
      expect(normalizeDecimalLiteral('1 000')).toBe('1000');
    });
  });

  describe('tryParseDecimal', () => {
    it('should parse a comma-formatted string', () => {
      const out = { value: new Decimal(0) };
      const result = tryParseDecimal('1 000,25', out);

      expect(result).toBe(true);
      expect(out.value.toString()).toBe('1000.25');
    });

    it('should parse Decimal instance', () => {
      const input = new Decimal('789.012');
      const out = { value: new Decimal(0) };

      expect(tryParseDecimal(input, out)).toBe(true);
      expect(out.value.toString()).toBe('789.012');
    });

    it('should handle null and empty string as zero', () => {
      const out = { value: new Decimal(5) };

      expect(tryParseDecimal(null, out)).toBe(true);
      expect(out.value.isZero()).toBe(true);

      out.value = new Decimal(5);
      expect(tryParseDecimal('  ', out)).toBe(true);
      expect(out.value.isZero()).toBe(true);
    });

    it('should reject malformed values', () => {
      expect(tryParseDecimal('12abc')).toBe(false);
      expect(tryParseDecimal('1.2.3')).toBe(false);
      expect(tryParseDecimal(Number.NaN)).toBe(false);
      expect(tryParseDecimal('Infinity')).toBe(false);
    });

    it('should reject non-positional literals', () => {
      expect(tryParseDecimal('0x10')).toBe(false);
      expect(tryParseDecimal('0b101')).toBe(false);
      expect(tryParseDecimal('0o17')).toBe(false);
      expect(tryParseDecimal('1e3')).toBe(false);
    });

    it('should accept signs and bare fractional parts', () => {
      const out = { value: new Decimal(0) };

      expect(tryParseDecimal('-,5', out)).toBe(true);
      expect(out.value.toString()).toBe('-0.5');
      expect(tryParseDecimal('+12.', out)).toBe(true);
      expect(out.value.toString()).toBe('12');
    });
  });

  describe('parseDecimal', () => {
    it('should fall back to zero for malformed input', () => {
      expect(parseDecimal('not-a-number').isZero()).toBe(true);
    });

    it('should keep full precision for long literals', () => {
      expect(parseDecimal('12345678901234567890.12345678').toFixed()).toBe('12345678901234567890.12345678');
    });
  });

  describe('round2', () => {
    it('should round half-up away from zero', () => {
      expect(round2(new Decimal('2.345')).toFixed(2)).toBe('2.35');
      expect(round2(new Decimal('-2.345')).toFixed(2)).toBe('-2.35');
      expect(round2(new Decimal('2.344')).toFixed(2)).toBe('2.34');
    });

    it('should be idempotent', () => {
      const samples = ['0.005', '-0.005', '1.235', '99999.995', '-12.3449', '7'];
      for (const sample of samples) {
        const once = round2(new Decimal(sample));
        expect(round2(once).equals(once)).toBe(true);
      }
    });
  });

  describe('sumDecimals', () => {
    it('should sum exactly where binary floats drift', () => {
      const values = Array.from({ length: 10 }, () => new Decimal('0.1'));
      expect(sumDecimals(values).toString()).toBe('1');
    });

    it('should return zero for an empty input', () => {
      expect(sumDecimals([]).isZero()).toBe(true);
    });
  });

  describe('formatMoney', () => {
    it('should always print two fractional digits', () => {
      expect(formatMoney(new Decimal('180'))).toBe('180.00');
      expect(formatMoney(new Decimal('-90450.5'))).toBe('-90450.50');
      expect(formatMoney(new Decimal('0.125'))).toBe('0.13');
    });

    it('should not print negative zero', () => {
      expect(formatMoney(new Decimal('-0.001'))).toBe('0.00');
    });
  });

  describe('formatDecimal', () => {
    it('should trim trailing zeros', () => {
      expect(formatDecimal(new Decimal('92.5000'))).toBe('92.5');
      expect(formatDecimal(new Decimal('90'))).toBe('90');
    });
  });
});
