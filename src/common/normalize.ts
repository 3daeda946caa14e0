import { Decimal } from './decimal';
import { INT4_MAX, NumericColumn } from './numeric-columns';
import { InvalidTeachingInputException } from './teaching.exceptions';

export function normText(v: unknown) {
  const s = String(v ?? '').trim();
  return s && s !== 'undefined' && s !== 'null' ? s : '';
}

export function requireText(v: unknown, field: string) {
  const s = normText(v);
  if (!s) throw new InvalidTeachingInputException(`${field} is required.`);
  return s;
}

/** Positive integer ids (employee, activity). Accepts `7` and `"7"`. */
export function requireId(v: unknown, field: string) {
  const s = normText(v);
  if (!/^\d+$/.test(s) || Number(s) < 1 || Number(s) > INT4_MAX) {
    throw new InvalidTeachingInputException(`${field} must be a positive integer.`);
  }
  return Number(s);
}

export function requireCount(v: unknown, field: string) {
  const s = normText(v);
  if (!/^-?\d+$/.test(s) || !Number.isSafeInteger(Number(s))) {
    throw new InvalidTeachingInputException(`${field} must be an integer.`);
  }
  const n = Number(s);
  if (n < 0) {
    throw new InvalidTeachingInputException(`${field} must not be negative (got ${n}).`);
  }
  if (n > INT4_MAX) {
    throw new InvalidTeachingInputException(`${field} must not exceed ${INT4_MAX}.`);
  }
  return n;
}

export function requireDecimal(
  v: unknown,
  field: string,
  bound: 'non-negative' | 'positive',
  column: NumericColumn,
) {
  const d = Decimal.tryParse(typeof v === 'string' ? v.trim() : v);
  if (!d) {
    throw new InvalidTeachingInputException(`${field} must be a decimal number.`);
  }
  if (d.significantScale() > column.scale) {
    throw new InvalidTeachingInputException(
      `${field} must have at most ${column.scale} decimal places.`,
    );
  }
  if (d.integerDigits() > column.precision - column.scale) {
    throw new InvalidTeachingInputException(
      `${field} must be less than 1${'0'.repeat(column.precision - column.scale)}.`,
    );
  }
  if (bound === 'positive' && !d.isPositive()) {
    throw new InvalidTeachingInputException(`${field} must be greater than 0.`);
  }
  if (bound === 'non-negative' && d.isNegative()) {
    throw new InvalidTeachingInputException(`${field} must not be negative.`);
  }
  return d;
}
