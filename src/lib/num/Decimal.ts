/**
 * Exact fixed-point decimal arithmetic for money and rates.
 *
 * A value is `units / 10^scale`, with `units` an arbitrary-size signed BigInt.
 * Addition, subtraction, multiplication and integer powers are exact; division
 * is carried to a fixed number of fractional digits and truncated, so callers
 * round the final figure explicitly with {@link Decimal.round}.
 */

export type RoundingMode = 'half-even' | 'half-up' | 'floor' | 'ceil' | 'down';

export type DecimalLike = Decimal | string | number | bigint;

/** Fractional digits kept by `div` before the caller rounds. */
const DIV_PRECISION = 50;

const DECIMAL_RE = /^([+-]?)(\d+)(?:\.(\d*))?(?:[eE]([+-]?\d{1,3}))?$/;

function pow10(n: number): bigint {
  return 10n ** BigInt(n);
}

export class Decimal {
  readonly units: bigint;
  readonly scale: number;

  private constructor(units: bigint, scale: number) {
    this.units = units;
    this.scale = scale;
  }

  // ============================================================================
  // Construction
  // ============================================================================

  /**
   * Build from raw components, dropping trailing fractional zeros.
   */
  static of(units: bigint, scale = 0): Decimal {
    if (!Number.isInteger(scale) || scale < 0) throw new RangeError('scale must be a non-negative integer');
    let u = units;
    let s = scale;
    while (s > 0 && u % 10n === 0n) {
      u /= 10n;
      s -= 1;
    }
    return new Decimal(u, s);
  }

  static fromBigInt(value: bigint): Decimal {
    return new Decimal(value, 0);
  }

  /**
   * Parse "123", "-0.05", "1.5e3". No thousands separators, no whitespace inside,
   * exponent of at most three digits.
   */
  static fromString(input: string): Decimal {
    const s = input.trim();
    const m = DECIMAL_RE.exec(s);
    if (!m) throw new SyntaxError(`Invalid decimal: ${input}`);
    const [, sign, intPart, fracPart = '', expPart = '0'] = m;
    const exp = Number(expPart);
    let units = BigInt(intPart + fracPart);
    let scale = fracPart.length - exp;
    if (scale < 0) {
      units *= pow10(-scale);
      scale = 0;
    }
    return Decimal.of(sign === '-' ? -units : units, scale);
  }

  /**
   * Uses the shortest round-trip string of the number, so 0.1 becomes exactly 0.1.
   */
  static fromNumber(value: number): Decimal {
    if (!Number.isFinite(value)) throw new RangeError('Cannot convert non-finite number');
    return Decimal.fromString(String(value));
  }

  static from(value: DecimalLike): Decimal {
    if (value instanceof Decimal) return value;
    if (typeof value === 'bigint') return Decimal.fromBigInt(value);
    if (typeof value === 'number') return Decimal.fromNumber(value);
    return Decimal.fromString(value);
  }

  static isDecimalString(value: string): boolean {
    return DECIMAL_RE.test(value.trim());
  }

  static readonly ZERO = new Decimal(0n, 0);
  static readonly ONE = new Decimal(1n, 0);
  static readonly HUNDRED = new Decimal(100n, 0);

  // ============================================================================
  // Basic properties
  // ============================================================================

  isZero(): boolean {
    return this.units === 0n;
  }

  isPositive(): boolean {
    return this.units > 0n;
  }

  isNegative(): boolean {
    return this.units < 0n;
  }

  negate(): Decimal {
    return new Decimal(-this.units, this.scale);
  }

  // ============================================================================
  // Comparison
  // ============================================================================

  cmp(other: DecimalLike): -1 | 0 | 1 {
    const [a, b] = align(this, Decimal.from(other));
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  eq(other: DecimalLike): boolean { return this.cmp(other) === 0; }
  lt(other: DecimalLike): boolean { return this.cmp(other) === -1; }
  lte(other: DecimalLike): boolean { return this.cmp(other) <= 0; }
  gt(other: DecimalLike): boolean { return this.cmp(other) === 1; }
  gte(other: DecimalLike): boolean { return this.cmp(other) >= 0; }

  // ============================================================================
  // Arithmetic
  // ============================================================================

  add(other: DecimalLike): Decimal {
    const o = Decimal.from(other);
    const [a, b, scale] = align(this, o);
    return Decimal.of(a + b, scale);
  }

  sub(other: DecimalLike): Decimal {
    return this.add(Decimal.from(other).negate());
  }

  mul(other: DecimalLike): Decimal {
    const o = Decimal.from(other);
    return Decimal.of(this.units * o.units, this.scale + o.scale);
  }

  /**
   * Quotient truncated toward zero at `precision` fractional digits.
   */
  div(other: DecimalLike, precision = DIV_PRECISION): Decimal {
    const o = Decimal.from(other);
    if (o.isZero()) throw new RangeError('Division by zero');
    // (ua / 10^sa) / (ub / 10^sb) = ua * 10^sb / (ub * 10^sa)
    const num = this.units * pow10(o.scale + precision);
    const den = o.units * pow10(this.scale);
    return Decimal.of(num / den, precision);
  }

  /**
   * Integer power by squaring (exact).
   */
  pow(exponent: number): Decimal {
    if (!Number.isInteger(exponent) || exponent < 0) throw new RangeError('exponent must be a non-negative integer');
    let result: Decimal = Decimal.ONE;
    let base: Decimal = this;
    let exp = exponent;
    while (exp > 0) {
      if (exp % 2 === 1) result = result.mul(base);
      base = base.mul(base);
      exp = Math.floor(exp / 2);
    }
    return result;
  }

  // ============================================================================
  // Rounding
  // ============================================================================

  round(decimals = 0, mode: RoundingMode = 'half-even'): Decimal {
    if (this.scale <= decimals) return this;
    const factor = pow10(this.scale - decimals);
    const q = this.units / factor;
    const r = this.units % factor;
    if (r === 0n) return Decimal.of(q, decimals);

    const away = this.units < 0n ? -1n : 1n;
    const twice = (r < 0n ? -r : r) * 2n;
    let bump = false;
    switch (mode) {
      case 'half-up': bump = twice >= factor; break;
      case 'half-even': bump = twice > factor || (twice === factor && q % 2n !== 0n); break;
      case 'floor': bump = this.units < 0n; break;
      case 'ceil': bump = this.units > 0n; break;
      case 'down': bump = false; break;
    }
    return Decimal.of(bump ? q + away : q, decimals);
  }

  floor(): Decimal {
    return this.round(0, 'floor');
  }

  // ============================================================================
  // Conversion
  // ============================================================================

  /**
   * Integer part as a BigInt (truncated toward zero).
   */
  toBigInt(): bigint {
    return this.units / pow10(this.scale);
  }

  /** Plain notation, no exponent, no trailing zeros. */
  toString(): string {
    const neg = this.units < 0n;
    const digits = (neg ? -this.units : this.units).toString().padStart(this.scale + 1, '0');
    if (this.scale === 0) return (neg ? '-' : '') + digits;
    const cut = digits.length - this.scale;
    return `${neg ? '-' : ''}${digits.slice(0, cut)}.${digits.slice(cut)}`;
  }

  /** Exactly `decimals` fractional digits, e.g. `toFixed(2)` → "1200.50". */
  toFixed(decimals: number, mode: RoundingMode = 'half-even'): string {
    const r = this.round(decimals, mode);
    const units = r.units * pow10(decimals - r.scale);
    return Decimal.fromRaw(units, decimals);
  }

  toJSON(): string {
    return this.toString();
  }

  private static fromRaw(units: bigint, scale: number): string {
    return new Decimal(units, scale).toString();
  }
}

function align(a: Decimal, b: Decimal): [bigint, bigint, number] {
  if (a.scale === b.scale) return [a.units, b.units, a.scale];
  if (a.scale > b.scale) return [a.units, b.units * pow10(a.scale - b.scale), a.scale];
  return [a.units * pow10(b.scale - a.scale), b.units, b.scale];
}

// ============================================================================
// Helpers
// ============================================================================

export function clamp(value: Decimal, lo: Decimal, hi: Decimal): Decimal {
  if (value.lt(lo)) return lo;
  if (value.gt(hi)) return hi;
  return value;
}

export function sum(values: Iterable<DecimalLike>): Decimal {
  let total = Decimal.ZERO;
  for (const v of values) total = total.add(v);
  return total;
}
