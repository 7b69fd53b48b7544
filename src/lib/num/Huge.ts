/**
 * Exact decimal values for display formatting
 *
 * Every digit-place query and every rounding step runs on the exact base-10
 * digit sequence, never on a binary float or a logarithm.
 *
 * Design principles:
 * - Construction from JS numbers goes through their shortest decimal text
 * - Uses BigInt internally for unlimited precision
 * - Non-finite values live beside HugeDecimal as NonFinite, never inside it
 */

// ============================================================================
// Core HugeDecimal: Exact decimal arithmetic
// ============================================================================

/**
 * Represents an exact decimal number as: sign * (mantissa / 10^scale) * 10^exp10
 * where mantissa, scale, and exp10 are arbitrary-size integers.
 *
 * Normalized form:
 * - mantissa is always non-negative
 * - mantissa = 0 implies sign = 0
 * - mantissa > 0 implies no trailing zeros in mantissa
 * - scale >= 0 (represents decimal places)
 */
export class HugeDecimal {
  readonly sign: 1 | -1 | 0;
  readonly mantissa: bigint;  // non-negative, no trailing zeros
  readonly scale: bigint;      // decimal places >= 0
  readonly exp10: bigint;      // power-of-10 exponent

  private constructor(sign: 1 | -1 | 0, mantissa: bigint, scale: bigint, exp10: bigint) {
    this.sign = sign;
    this.mantissa = mantissa;
    this.scale = scale;
    this.exp10 = exp10;
  }

  /**
   * Create a HugeDecimal from components (auto-normalizes)
   */
  static fromComponents(sign: 1 | -1 | 0, mantissa: bigint, scale: bigint, exp10: bigint): HugeDecimal {
    if (mantissa < 0n) throw new Error('mantissa must be non-negative');
    if (scale < 0n) throw new Error('scale must be non-negative');

    if (mantissa === 0n || sign === 0) {
      return HugeDecimal.ZERO;
    }

    // Remove trailing zeros from mantissa and adjust scale/exp10
    let m = mantissa;
    let s = scale;
    let e = exp10;

    while (m % 10n === 0n) {
      m = m / 10n;
      if (s > 0n) {
        s = s - 1n;
      } else {
        e = e + 1n;
      }
    }

    return new HugeDecimal(sign, m, s, e);
  }

  /**
   * Create from a bigint (exact)
   */
  static fromBigInt(value: bigint): HugeDecimal {
    if (value === 0n) return HugeDecimal.ZERO;
    const sign: 1 | -1 = value > 0n ? 1 : -1;
    return HugeDecimal.fromComponents(sign, sign === 1 ? value : -value, 0n, 0n);
  }

  /**
   * Create from a finite number through its shortest round-trip text,
   * so 0.1 becomes exactly 0.1 rather than the binary expansion.
   */
  static fromNumber(value: number): HugeDecimal {
    if (!Number.isFinite(value)) throw new Error('Cannot convert non-finite number');
    return HugeDecimal.fromString(String(value));
  }

  /**
   * Create from a string (exact)
   * Supports: integers, decimals, scientific notation
   * Examples: "123", "123.456", ".5", "1.23e10", "-5.67e-3"
   */
  static fromString(input: string): HugeDecimal {
    const s = input.trim();
    if (!s) throw new Error('Empty string');

    // Parse: [sign] [digits] [.digits] [e/E [sign] digits]
    const m = s.match(/^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/);
    if (!m) throw new Error(`Invalid number format: ${input}`);

    const [, signStr, intPart, fracPart = '', expStr = '0'] = m;
    if (intPart.length + fracPart.length === 0) throw new Error(`Invalid number format: ${input}`);
    const sign: 1 | -1 = signStr === '-' ? -1 : 1;

    // Combine integer and fractional parts into mantissa
    const mantissa = BigInt(intPart + fracPart);
    const scale = BigInt(fracPart.length);
    const exp10 = BigInt(expStr);

    return HugeDecimal.fromComponents(sign, mantissa, scale, exp10);
  }

  // Constants
  static readonly ZERO = new HugeDecimal(0, 0n, 0n, 0n);
  static readonly ONE = new HugeDecimal(1, 1n, 0n, 0n);

  // ============================================================================
  // Basic properties
  // ============================================================================

  isZero(): boolean {
    return this.sign === 0;
  }

  isNegative(): boolean {
    return this.sign === -1;
  }

  /**
   * Power of ten of the last coefficient digit: value = ±mantissa * 10^exponent
   */
  get exponent(): bigint {
    return this.exp10 - this.scale;
  }

  abs(): HugeDecimal {
    if (this.isNegative()) return this.negate();
    return this;
  }

  negate(): HugeDecimal {
    if (this.isZero()) return this;
    const newSign: 1 | -1 = this.sign === 1 ? -1 : 1;
    return new HugeDecimal(newSign, this.mantissa, this.scale, this.exp10);
  }

  // ============================================================================
  // Digit places
  // ============================================================================

  /**
   * Decimal place of the most significant digit (1000 -> 3, 0.0999 -> -2).
   * Zero reports 0.
   */
  topDigit(): number {
    if (this.isZero()) return 0;
    return this.mantissa.toString().length + Number(this.exponent) - 1;
  }

  /**
   * Decimal place of the least significant digit. Integers count as exact
   * to the ones place, so 1200 reports 0 rather than 2.
   */
  bottomDigit(): number {
    if (this.isZero()) return 0;
    return Math.min(Number(this.exponent), 0);
  }

  /**
   * floor(log2(|x|)), exact at every power of two.
   */
  topDigitBinary(): number {
    if (this.isZero()) return 0;
    const abs = this.abs();

    // Estimate from the leading digits, then settle with exact comparisons
    const digits = this.mantissa.toString();
    const lead = Number(`0.${digits.slice(0, 17)}`);
    const log10 = Math.log10(lead) + digits.length + Number(this.exponent);
    let k = Math.floor(log10 * Math.log2(10));

    while (HugeDecimal.ONE.mulPow2(k).gt(abs)) k--;
    while (HugeDecimal.ONE.mulPow2(k + 1).lte(abs)) k++;
    return k;
  }

  // ============================================================================
  // Comparison
  // ============================================================================

  /**
   * Compare this with other
   * Returns: -1 if this < other, 0 if equal, 1 if this > other
   */
  cmp(other: HugeDecimal): -1 | 0 | 1 {
    if (this.sign !== other.sign) {
      return this.sign < other.sign ? -1 : 1;
    }
    if (this.isZero()) return 0;

    const magCmp = this._cmpMagnitude(other);
    if (this.sign === -1) {
      // Both negative: flip comparison
      if (magCmp === -1) return 1;
      if (magCmp === 1) return -1;
      return 0;
    }
    return magCmp;
  }

  /**
   * Compare magnitudes (ignore signs)
   */
  private _cmpMagnitude(other: HugeDecimal): -1 | 0 | 1 {
    const thisTop = this.topDigit();
    const otherTop = other.topDigit();
    if (thisTop !== otherTop) return thisTop < otherTop ? -1 : 1;

    // Same top digit: align to the smaller exponent and compare coefficients
    const expDiff = this.exponent - other.exponent;
    let a = this.mantissa;
    let b = other.mantissa;
    if (expDiff > 0n) a = a * (10n ** expDiff);
    else if (expDiff < 0n) b = b * (10n ** (-expDiff));

    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  eq(other: HugeDecimal): boolean { return this.cmp(other) === 0; }
  lt(other: HugeDecimal): boolean { return this.cmp(other) === -1; }
  lte(other: HugeDecimal): boolean { return this.cmp(other) <= 0; }
  gt(other: HugeDecimal): boolean { return this.cmp(other) === 1; }
  gte(other: HugeDecimal): boolean { return this.cmp(other) >= 0; }

  // ============================================================================
  // Scaling & rounding
  // ============================================================================

  /**
   * Multiply by a power of 10 (exact and fast)
   */
  mulPow10(exponent: bigint): HugeDecimal {
    if (this.isZero()) return this;
    return new HugeDecimal(this.sign, this.mantissa, this.scale, this.exp10 + exponent);
  }

  /**
   * Multiply by a power of 2. Exact in both directions: 2^-n = 5^n * 10^-n.
   */
  mulPow2(exponent: number): HugeDecimal {
    if (this.isZero() || exponent === 0) return this;
    if (exponent > 0) {
      return HugeDecimal.fromComponents(this.sign, this.mantissa * (2n ** BigInt(exponent)), 0n, this.exponent);
    }
    const n = BigInt(-exponent);
    return HugeDecimal.fromComponents(this.sign, this.mantissa * (5n ** n), 0n, this.exponent - n);
  }

  /**
   * Round to a multiple of 10^place, ties to even.
   * roundToPlace(-2) keeps two fractional digits; roundToPlace(1) rounds to tens.
   */
  roundToPlace(place: number): HugeDecimal {
    if (this.isZero()) return this;
    const target = BigInt(place);
    const drop = target - this.exponent;
    if (drop <= 0n) return this;

    const divisor = 10n ** drop;
    let q = this.mantissa / divisor;
    const r = this.mantissa % divisor;
    const twice = r * 2n;
    if (twice > divisor || (twice === divisor && q % 2n === 1n)) q += 1n;

    return HugeDecimal.fromComponents(this.sign, q, 0n, target);
  }

  // ============================================================================
  // Conversion & Formatting
  // ============================================================================

  /**
   * Convert to a BigInt (truncates fractional part)
   */
  toBigInt(): bigint {
    if (this.isZero()) return 0n;

    const effExp = this.exponent;
    const value = effExp >= 0n
      ? this.mantissa * (10n ** effExp)
      : this.mantissa / (10n ** (-effExp));

    return this.sign === 1 ? value : -value;
  }

  /**
   * Plain digits of |value| with exactly `decimals` fractional digits
   * (rounded half to even when digits have to go). Never uses exponent form.
   */
  toFixedAbs(decimals: number): string {
    const d = Math.max(0, decimals);
    const rounded = this.abs().roundToPlace(-d);
    if (rounded.isZero()) return d > 0 ? `0.${'0'.repeat(d)}` : '0';

    const shift = rounded.exponent + BigInt(d);
    const digits = (rounded.mantissa * (10n ** shift)).toString().padStart(d + 1, '0');
    if (d === 0) return digits;
    return `${digits.slice(0, digits.length - d)}.${digits.slice(digits.length - d)}`;
  }

  /**
   * Exact string, plain for moderate exponents and scientific otherwise
   */
  toStringExact(): string {
    if (this.isZero()) return '0';
    const sign = this.sign === -1 ? '-' : '';
    const top = this.topDigit();
    if (top >= -7 && top < 21) {
      return sign + this.toFixedAbs(-this.bottomDigit());
    }
    const digits = this.mantissa.toString();
    const frac = digits.slice(1);
    return `${sign}${digits[0]}${frac ? `.${frac}` : ''}e${top >= 0 ? '+' : ''}${top}`;
  }

  toString(): string {
    return this.toStringExact();
  }
}

// ============================================================================
// Non-finite values (nan, ±inf)
// ============================================================================

export type NonFiniteKind = 'nan' | 'inf';

/**
 * NaN or an infinity. Kept apart from HugeDecimal so that no digit-place
 * arithmetic can ever reach it.
 */
export class NonFinite {
  readonly kind: NonFiniteKind;
  readonly negative: boolean;

  private constructor(kind: NonFiniteKind, negative: boolean) {
    this.kind = kind;
    this.negative = negative;
  }

  static readonly NAN = new NonFinite('nan', false);
  static readonly INF = new NonFinite('inf', false);
  static readonly NEG_INF = new NonFinite('inf', true);

  static fromNumber(value: number): NonFinite {
    if (Number.isNaN(value)) return NonFinite.NAN;
    if (value === Infinity) return NonFinite.INF;
    if (value === -Infinity) return NonFinite.NEG_INF;
    throw new Error(`Not a non-finite number: ${value}`);
  }

  isNegative(): boolean {
    return this.negative;
  }

  abs(): NonFinite {
    return this.kind === 'inf' ? NonFinite.INF : this;
  }

  /** Unsigned text: 'nan' or 'inf' */
  toString(): string {
    return this.kind;
  }
}

export type Numeric = HugeDecimal | NonFinite;

export function isFiniteNumeric(value: Numeric): value is HugeDecimal {
  return value instanceof HugeDecimal;
}
