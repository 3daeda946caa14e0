import { requireCount, requireDecimal, requireId, requireText } from './normalize';
import { FACTOR_COLUMN, HOURS_COLUMN } from './numeric-columns';
import { InvalidTeachingInputException } from './teaching.exceptions';

describe('normalize', () => {
  it('trims required text', () => {
    expect(requireText('  2025-50001 ', 'instanceId')).toBe('2025-50001');
    expect(() => requireText('   ', 'instanceId')).toThrow('instanceId is required.');
    expect(() => requireText(undefined, 'instanceId')).toThrow(InvalidTeachingInputException);
  });

  it('accepts ids as numbers or numeric strings', () => {
    expect(requireId(7, 'employeeId')).toBe(7);
    expect(requireId('7', 'employeeId')).toBe(7);
    expect(() => requireId(0, 'employeeId')).toThrow('employeeId must be a positive integer.');
    expect(() => requireId('1.5', 'employeeId')).toThrow('employeeId must be a positive integer.');
    expect(requireId(2147483647, 'employeeId')).toBe(2147483647);
    expect(() => requireId(2147483648, 'employeeId')).toThrow('employeeId must be a positive integer.');
  });

  it('reports negative counts with the value', () => {
    expect(requireCount('12', 'count')).toBe(12);
    expect(requireCount(0, 'count')).toBe(0);
    expect(() => requireCount(-3, 'count')).toThrow('count must not be negative (got -3).');
    expect(() => requireCount('ten', 'count')).toThrow('count must be an integer.');
  });

  it('keeps counts inside a 32-bit column', () => {
    expect(requireCount('2147483647', 'count')).toBe(2147483647);
    expect(() => requireCount('2147483648', 'count')).toThrow('count must not exceed 2147483647.');
  });

  it('checks decimal bounds', () => {
    expect(requireDecimal('0', 'hours', 'non-negative', HOURS_COLUMN).toString()).toBe('0');
    expect(() => requireDecimal('-1', 'hours', 'non-negative', HOURS_COLUMN)).toThrow('hours must not be negative.');
    expect(() => requireDecimal('0', 'factor', 'positive', FACTOR_COLUMN)).toThrow('factor must be greater than 0.');
    expect(() => requireDecimal('x', 'factor', 'positive', FACTOR_COLUMN)).toThrow('factor must be a decimal number.');
  });

  it('holds decimals to the scale of their column', () => {
    expect(requireDecimal('1.230', 'hours', 'non-negative', HOURS_COLUMN).toFixed(2)).toBe('1.23');
    expect(() => requireDecimal('1.234', 'hours', 'non-negative', HOURS_COLUMN)).toThrow(
      'hours must have at most 2 decimal places.',
    );
    expect(() => requireDecimal('0.001', 'factor', 'positive', FACTOR_COLUMN)).toThrow(
      'factor must have at most 2 decimal places.',
    );
    expect(() => requireDecimal('123456789.555', 'hours', 'non-negative', HOURS_COLUMN)).toThrow(
      'hours must have at most 2 decimal places.',
    );
  });

  it('holds decimals to the integer digits of their column', () => {
    expect(requireDecimal('99999999.99', 'hours', 'non-negative', HOURS_COLUMN).toString()).toBe(
      '99999999.99',
    );
    expect(() => requireDecimal('123456789', 'hours', 'non-negative', HOURS_COLUMN)).toThrow(
      'hours must be less than 100000000.',
    );
    expect(() => requireDecimal('10000', 'factor', 'positive', FACTOR_COLUMN)).toThrow(
      'factor must be less than 10000.',
    );
  });

  it('bounds numbers written in exponent notation', () => {
    expect(() => requireDecimal(5e-7, 'hours', 'non-negative', HOURS_COLUMN)).toThrow(
      'hours must have at most 2 decimal places.',
    );
    expect(() => requireDecimal(1e21, 'hours', 'non-negative', HOURS_COLUMN)).toThrow(
      'hours must be less than 100000000.',
    );
  });
});
