/**
 * Rounding engine
 *
 * A "round digit" is the decimal place of the last digit kept:
 * -2 keeps hundredths, 0 keeps ones, 2 keeps hundreds. Rounding is exact
 * and ties go to the even digit.
 */

import { HugeDecimal, isFiniteNumeric, type Numeric } from '../num/Huge.js';
import { bottomDigit, topDigit } from './digits.js';
import { AUTO, type NDigits, type RoundMode } from './modes.js';

/**
 * Particle Data Group 3-5-4 rule. The leading three digits of |x| pick the
 * precision: 100-354 keep two significant figures, 355-949 keep one.
 * 950-999 also keep one, which rounds up through 1000 and leaves two
 * displayed digits ("1.0").
 */
export function getPdgRoundDigit(x: HugeDecimal): number {
  const top = x.topDigit();
  const leading = x.abs().mulPow10(BigInt(2 - top)).roundToPlace(0).toBigInt();
  return leading <= 354n ? top - 1 : top;
}

/**
 * Decimal place to round `x` to.
 *
 * sig_fig keeps `ndigits` significant figures, dec_place keeps `ndigits`
 * digits after the point. With `auto`, the value keeps its own precision,
 * or the PDG rule decides when `pdg` is set (sig_fig only).
 */
export function getRoundDigit(x: Numeric, roundMode: RoundMode, ndigits: NDigits, pdg = false): number {
  switch (roundMode) {
    case 'sig_fig':
      if (ndigits === AUTO) {
        if (pdg && isFiniteNumeric(x)) return getPdgRoundDigit(x);
        return bottomDigit(x);
      }
      return topDigit(x) - (ndigits - 1);
    case 'dec_place':
      return ndigits === AUTO ? bottomDigit(x) : -ndigits;
  }
}

/** Round half to even at `place`; non-finite values pass through */
export function roundToDigit(x: HugeDecimal, place: number): HugeDecimal;
export function roundToDigit(x: Numeric, place: number): Numeric;
export function roundToDigit(x: Numeric, place: number): Numeric {
  return isFiniteNumeric(x) ? x.roundToPlace(place) : x;
}
