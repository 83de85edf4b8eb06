import { format, isValid, parse } from 'date-fns';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{1,2}-\d{1,2}$/;

export function normalizeString(value: string | undefined): string {
  return value == null ? '' : value.trim();
}

export function titleCase(value: string): string {
  return value.toLowerCase().replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1));
}

export function parseInteger(value: string): number | null {
  const trimmed = value.trim();
  if (!INTEGER_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function parseDecimal(value: string): number | null {
  const trimmed = value.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Parses `YYYY-MM-DD` (single-digit month/day accepted) and returns it zero-padded, or null for impossible dates. */
export function parseIsoDate(value: string): string | null {
  const trimmed = value.trim();
  if (!ISO_DATE_PATTERN.test(trimmed)) return null;
  const parsed = parse(trimmed, 'yyyy-M-d', new Date(2000, 0, 1));
  if (!isValid(parsed)) return null;
  return format(parsed, 'yyyy-MM-dd');
}

/**
 * Rounds to `digits` decimals, sending exact midpoints to the even neighbour.
 * Only values whose binary expansion sits exactly on the midpoint are ties,
 * so 0.125 rounds to 0.12 while 2.675 (stored slightly below) rounds to 2.67.
 */
export function roundHalfEven(value: number, digits = 2): number {
  if (!Number.isFinite(value) || Math.abs(value) >= 1e21) return value;

  const [whole, fraction = ''] = Math.abs(value).toFixed(100).split('.');
  const remainder = fraction.slice(digits);
  const isTie = remainder.startsWith('5') && /^0*$/.test(remainder.slice(1));
  if (!isTie) {
    return Number(value.toFixed(digits));
  }

  const keptDigits = `${whole}${fraction.slice(0, digits)}`;
  const truncated = Number(`${whole}.${fraction.slice(0, digits)}`);
  const lastDigit = Number(keptDigits.charAt(keptDigits.length - 1));
  const magnitude = lastDigit % 2 === 0 ? truncated : Number((truncated + 10 ** -digits).toFixed(digits));
  return value < 0 ? -magnitude : magnitude;
}
