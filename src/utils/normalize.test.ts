import { describe, expect, it } from 'vitest';
import { parseDecimal, parseInteger, parseIsoDate, roundHalfEven, titleCase } from './normalize.js';

describe('roundHalfEven', () => {
  it('sends exact midpoints to the even neighbour', () => {
    expect(roundHalfEven(0.125)).toBe(0.12);
    expect(roundHalfEven(0.375)).toBe(0.38);
    expect(roundHalfEven(-0.125)).toBe(-0.12);
    expect(roundHalfEven(2.5, 0)).toBe(2);
    expect(roundHalfEven(3.5, 0)).toBe(4);
  });

  it('rounds values that are not exact midpoints to the nearest neighbour', () => {
    expect(roundHalfEven(2.675)).toBe(2.67);
    expect(roundHalfEven(1.005)).toBe(1);
    expect(roundHalfEven(1619.982)).toBe(1619.98);
    expect(roundHalfEven(2 * 899.99)).toBe(1799.98);
    expect(roundHalfEven(127.5)).toBe(127.5);
  });
});

describe('titleCase', () => {
  it('capitalises every run of letters', () => {
    expect(titleCase('john doe')).toBe('John Doe');
    expect(titleCase('JANE SMITH')).toBe('Jane Smith');
    expect(titleCase("o'brien-smith")).toBe("O'Brien-Smith");
  });
});

describe('parseInteger', () => {
  it('accepts signed base-10 integers with surrounding blanks', () => {
    expect(parseInteger(' 3 ')).toBe(3);
    expect(parseInteger('-1')).toBe(-1);
  });

  it('rejects decimals, blanks and words', () => {
    expect(parseInteger('3.0')).toBeNull();
    expect(parseInteger('')).toBeNull();
    expect(parseInteger('abc')).toBeNull();
  });
});

describe('parseDecimal', () => {
  it('parses plain, fractional and exponent notation', () => {
    expect(parseDecimal('25.50')).toBe(25.5);
    expect(parseDecimal('.5')).toBe(0.5);
    expect(parseDecimal('1e3')).toBe(1000);
  });

  it('rejects non-finite and malformed input', () => {
    expect(parseDecimal('nan')).toBeNull();
    expect(parseDecimal('')).toBeNull();
    expect(parseDecimal('1e400')).toBeNull();
    expect(parseDecimal('12abc')).toBeNull();
  });
});

describe('parseIsoDate', () => {
  it('returns the zero-padded calendar date', () => {
    expect(parseIsoDate('2026-02-15')).toBe('2026-02-15');
    expect(parseIsoDate('2026-2-5')).toBe('2026-02-05');
    expect(parseIsoDate('2024-02-29')).toBe('2024-02-29');
  });

  it('rejects impossible dates and other layouts', () => {
    expect(parseIsoDate('2026-02-30')).toBeNull();
    expect(parseIsoDate('2026-13-01')).toBeNull();
    expect(parseIsoDate('15/02/2026')).toBeNull();
    expect(parseIsoDate('')).toBeNull();
  });
});
