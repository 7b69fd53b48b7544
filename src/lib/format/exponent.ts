/**
 * Exponent resolution: split a value into mantissa and exponent for a mode
 */

import { isFiniteNumeric, type HugeDecimal, type Numeric } from '../num/Huge.js';
import { topDigit, topDigitBinary } from './digits.js';
import { AUTO, baseOf, type Base, type ExpMode, type ExpVal } from './modes.js';
import { checkExpVal } from './options.js';

export interface MantissaExpBase<T extends Numeric = Numeric> {
  mantissa: T;
  exp: number;
  base: Base;
}

function floorTo(n: number, step: number): number {
  return Math.floor(n / step) * step;
}

function autoExp(x: Numeric, mode: ExpMode): number {
  switch (mode) {
    case 'fixed_point':
    case 'percent':
      return 0;
    case 'scientific':
      return topDigit(x);
    case 'engineering':
      return floorTo(topDigit(x), 3);
    case 'engineering_shifted':
      return floorTo(topDigit(x) + 1, 3);
    case 'binary':
      return topDigitBinary(x);
    case 'binary_iec':
      return floorTo(topDigitBinary(x), 10);
  }
}

/**
 * Resolve the exponent for `x` under `mode` and return the exact mantissa
 * x * base^-exp. Zero and non-finite values keep themselves as mantissa
 * with exponent 0, or the fixed exponent when one is given.
 *
 * @throws ConfigError when a fixed exponent is not allowed for the mode
 */
export function getMantissaExpBase(x: HugeDecimal, mode: ExpMode, expVal: ExpVal): MantissaExpBase<HugeDecimal>;
export function getMantissaExpBase(x: Numeric, mode: ExpMode, expVal: ExpVal): MantissaExpBase;
export function getMantissaExpBase(x: Numeric, mode: ExpMode, expVal: ExpVal): MantissaExpBase {
  checkExpVal(mode, expVal);
  const base = baseOf(mode);

  if (!isFiniteNumeric(x) || x.isZero()) {
    return { mantissa: x, exp: expVal === AUTO ? 0 : expVal, base };
  }

  const exp = expVal === AUTO ? autoExp(x, mode) : expVal;
  const mantissa = base === 10 ? x.mulPow10(BigInt(-exp)) : x.mulPow2(-exp);
  return { mantissa, exp, base };
}

/** Inverse of getMantissaExpBase: mantissa * base^exp */
export function fromMantissa(mantissa: HugeDecimal, exp: number, base: Base): HugeDecimal;
export function fromMantissa(mantissa: Numeric, exp: number, base: Base): Numeric;
export function fromMantissa(mantissa: Numeric, exp: number, base: Base): Numeric {
  if (!isFiniteNumeric(mantissa)) return mantissa;
  return base === 10 ? mantissa.mulPow10(BigInt(exp)) : mantissa.mulPow2(exp);
}
