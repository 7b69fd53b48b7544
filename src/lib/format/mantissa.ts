/**
 * Mantissa & sign rendering
 */

import { isFiniteNumeric, type Numeric, type NonFinite } from '../num/Huge.js';
import { topDigit } from './digits.js';
import type { LeftPadChar, SignMode } from './modes.js';

/**
 * Negative values always get '-'. Positive values get '+', ' ' or nothing
 * per mode. Zero and NaN are neither, so they get a blank in the '+' and
 * ' ' modes to keep columns aligned.
 */
export function getSignStr(x: Numeric, mode: SignMode): string {
  if (x.isNegative()) return '-';
  const positive = isFiniteNumeric(x) ? !x.isZero() : x.kind === 'inf';
  if (positive) return mode === '-' ? '' : mode;
  return mode === '-' ? '' : ' ';
}

/** Padding from the natural top digit up to the target top digit */
export function getPadStr(padChar: LeftPadChar, top: number, targetTop: number): string {
  if (targetTop <= top) return '';
  return padChar.repeat(targetTop - Math.max(top, 0));
}

export function nonFiniteText(x: NonFinite, capitalize: boolean): string {
  const text = x.toString();
  return capitalize ? text.toUpperCase() : text;
}

/**
 * Print a (rounded) mantissa between two digit places.
 *
 * @param targetTop    highest place to pad to
 * @param targetBottom lowest place printed; sets the count of fractional digits
 */
export function renderMantissa(
  mantissa: Numeric,
  targetTop: number,
  targetBottom: number,
  signMode: SignMode,
  padChar: LeftPadChar,
  capitalize = false,
): string {
  const digits = isFiniteNumeric(mantissa)
    ? mantissa.toFixedAbs(Math.max(0, -targetBottom))
    : nonFiniteText(mantissa, capitalize);
  const sign = getSignStr(mantissa, signMode);
  const pad = getPadStr(padChar, topDigit(mantissa), targetTop);

  // Zeros sit between the sign and the digits, spaces outside the sign
  return padChar === '0' ? `${sign}${pad}${digits}` : `${pad}${sign}${digits}`;
}
