const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/;
// how String() prints very small or very large numbers, e.g. 5e-7, 1e+21
const EXPONENT_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?e([+-]\d+)$/;

function pow10(exp: number) {
  return 10n ** BigInt(exp);
}

function abs(v: bigint) {
  return v < 0n ? -v : v;
}

/**
 * Fixed-point decimal backed by a scaled bigint.
 *
 * Postgres NUMERIC columns come back from the driver as strings; they are
 * parsed straight into this type so hours, factors and salary rates never
 * pass through a binary float.
 */
export class Decimal {
  static readonly ZERO = new Decimal(0n, 0);

  private constructor(
    private readonly units: bigint,
    readonly scale: number,
  ) {}

  static parse(value: string | number | bigint): Decimal {
    if (typeof value === 'bigint') return new Decimal(value, 0);

    const raw = typeof value === 'number' ? String(value) : value.trim();

    const exp = typeof value === 'number' ? EXPONENT_PATTERN.exec(raw) : null;
    if (exp) {
      const [, sign, whole, fraction = '', exponent] = exp;
      const digits = BigInt(whole + fraction) * (sign === '-' ? -1n : 1n);
      const scale = fraction.length - Number(exponent);
      return scale >= 0 ? new Decimal(digits, scale) : new Decimal(digits * pow10(-scale), 0);
    }

    const match = DECIMAL_PATTERN.exec(raw);
    if (!match) {
      throw new RangeError(`Not a decimal number: "${raw}"`);
    }

    const [, sign, whole, fraction = ''] = match;
    const units = BigInt(whole + fraction);
    return new Decimal(sign === '-' ? -units : units, fraction.length);
  }

  static tryParse(value: unknown): Decimal | null {
    if (typeof value !== 'string' && typeof value !== 'number') return null;
    if (typeof value === 'number' && !Number.isFinite(value)) return null;
    try {
      return Decimal.parse(value);
    } catch {
      return null;
    }
  }

  static sum(values: Iterable<Decimal>): Decimal {
    let total = Decimal.ZERO;
    for (const v of values) total = total.plus(v);
    return total;
  }

  private rescale(scale: number): bigint {
    return this.units * pow10(scale - this.scale);
  }

  plus(other: Decimal): Decimal {
    const scale = Math.max(this.scale, other.scale);
    return new Decimal(this.rescale(scale) + other.rescale(scale), scale);
  }

  times(other: Decimal): Decimal {
    return new Decimal(this.units * other.units, this.scale + other.scale);
  }

  /**
   * Quotient at `scale` fractional digits, ties rounded away from zero
   * (HALF_UP).
   */
  dividedBy(divisor: Decimal, scale: number): Decimal {
    if (divisor.units === 0n) throw new RangeError('Division by zero');

    // this / divisor = (u1 / 10^s1) / (u2 / 10^s2) = u1 * 10^s2 / (u2 * 10^s1)
    const numerator = this.units * pow10(scale + divisor.scale);
    const denominator = divisor.units * pow10(this.scale);

    let quotient = numerator / denominator;
    const remainder = numerator % denominator;

    if (2n * abs(remainder) >= abs(denominator)) {
      const negative = numerator < 0n !== denominator < 0n;
      quotient += negative ? -1n : 1n;
    }

    return new Decimal(quotient, scale);
  }

  compareTo(other: Decimal): -1 | 0 | 1 {
    const scale = Math.max(this.scale, other.scale);
    const a = this.rescale(scale);
    const b = other.rescale(scale);
    return a === b ? 0 : a < b ? -1 : 1;
  }

  /** Fraction digits left once trailing zeros are dropped. */
  significantScale() {
    let units = abs(this.units);
    let scale = this.scale;
    while (scale > 0 && units % 10n === 0n) {
      units /= 10n;
      scale--;
    }
    return scale;
  }

  /** Digits before the point; 0 below 1. */
  integerDigits() {
    const whole = abs(this.units) / pow10(this.scale);
    return whole === 0n ? 0 : whole.toString().length;
  }

  isNegative() {
    return this.units < 0n;
  }

  isPositive() {
    return this.units > 0n;
  }

  /** Rounds (HALF_UP) or pads to exactly `scale` digits. */
  toFixed(scale: number): string {
    const value =
      scale >= this.scale
        ? new Decimal(this.rescale(scale), scale)
        : this.dividedBy(Decimal.parse(1), scale);
    return value.toString();
  }

  toString(): string {
    const negative = this.units < 0n;
    const digits = abs(this.units).toString().padStart(this.scale + 1, '0');
    const whole = digits.slice(0, digits.length - this.scale);
    const fraction = digits.slice(digits.length - this.scale);
    return `${negative ? '-' : ''}${whole}${fraction ? `.${fraction}` : ''}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
