/**
 * Single-value formatting pipeline
 */

import { isFiniteNumeric, type HugeDecimal, type NonFinite, type Numeric } from '../num/Huge.js';
import { getExpSegment } from './expString.js';
import { getMantissaExpBase, fromMantissa } from './exponent.js';
import { addSeparators } from './grouping.js';
import { getSignStr, nonFiniteText, renderMantissa } from './mantissa.js';
import { AUTO } from './modes.js';
import type { ResolvedOptions } from './options.js';
import type { Segment } from './output.js';
import { getRoundDigit, roundToDigit } from './rounding.js';

/**
 * nan/inf never reach the digit-place code. They print as text, in
 * parentheses when an exponent or percent sign follows.
 */
export function formatNonFiniteSegments(x: NonFinite, options: ResolvedOptions): Segment[] {
  const body: Segment = {
    kind: 'nonfinite',
    text: getSignStr(x, options.signMode) + nonFiniteText(x, options.capitalize),
  };

  if (options.expMode === 'percent') {
    return [{ kind: 'open' }, body, { kind: 'close' }, { kind: 'percent' }];
  }
  if (options.nanInfExp && options.expMode !== 'fixed_point') {
    const exp = options.expVal === AUTO ? 0 : options.expVal;
    const suffix = getExpSegment(exp, options.expMode, options);
    if (suffix) return [{ kind: 'open' }, body, { kind: 'close' }, suffix];
  }
  return [body];
}

export function formatFiniteSegments(x: HugeDecimal, options: ResolvedOptions): Segment[] {
  const percent = options.expMode === 'percent';
  const mode = percent ? 'fixed_point' : options.expMode;
  const num = percent ? x.mulPow10(2n) : x;

  const first = getMantissaExpBase(num, mode, options.expVal);
  const firstDigit = getRoundDigit(first.mantissa, options.roundMode, options.ndigits);
  const firstRounded = fromMantissa(roundToDigit(first.mantissa, firstDigit), first.exp, first.base);

  // Rounding can carry into a new top digit (9.99 -> 10.0); resolve again
  const second = getMantissaExpBase(firstRounded, mode, options.expVal);
  const roundDigit = getRoundDigit(second.mantissa, options.roundMode, options.ndigits);
  const rounded = roundToDigit(second.mantissa, roundDigit);
  let exp = second.exp;
  if (rounded.isZero()) exp = options.expVal === AUTO ? 0 : options.expVal;

  const text = renderMantissa(rounded, options.leftPadDecPlace, roundDigit, options.signMode, options.leftPadChar);
  const segments: Segment[] = [{
    kind: 'mantissa',
    text: addSeparators(text, options.upperSeparator, options.decimalSeparator, options.lowerSeparator),
  }];

  const suffix = getExpSegment(exp, options.expMode, options);
  if (suffix) segments.push(suffix);
  return segments;
}

export function formatNumSegments(x: Numeric, options: ResolvedOptions): Segment[] {
  return isFiniteNumeric(x) ? formatFiniteSegments(x, options) : formatNonFiniteSegments(x, options);
}
