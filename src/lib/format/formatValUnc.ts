/**
 * Value/uncertainty formatting
 *
 * The uncertainty sets the precision of both numbers; the value (when it
 * is usable) sets the shared exponent.
 */

import { logger } from '../../log.js';
import { isFiniteNumeric, type Numeric } from '../num/Huge.js';
import { topDigit } from './digits.js';
import { getExpSegment } from './expString.js';
import { getMantissaExpBase } from './exponent.js';
import { addSeparators } from './grouping.js';
import { renderMantissa } from './mantissa.js';
import { ALL_SEPARATORS, AUTO, freeExpMode, type NDigits } from './modes.js';
import type { ResolvedOptions } from './options.js';
import type { Segment } from './output.js';
import { getRoundDigit, roundToDigit } from './rounding.js';

export interface RoundedValUnc {
  val: Numeric;
  unc: Numeric;
  roundDigit: number;
}

const usable = (x: Numeric) => isFiniteNumeric(x) && !x.isZero();

/**
 * Round value and uncertainty to one shared digit place. A finite, nonzero
 * uncertainty drives the place (with the PDG rule when asked); otherwise
 * the value does and the uncertainty is left as it is.
 */
export function roundValUnc(val: Numeric, unc: Numeric, ndigits: NDigits, pdg = false): RoundedValUnc {
  if (usable(unc)) {
    const roundDigit = getRoundDigit(unc, 'sig_fig', ndigits, pdg);
    return { val: roundToDigit(val, roundDigit), unc: roundToDigit(unc, roundDigit), roundDigit };
  }
  const roundDigit = getRoundDigit(val, 'sig_fig', ndigits);
  return { val: roundToDigit(val, roundDigit), unc, roundDigit };
}

/**
 * Number that sets the shared exponent: the value when finite and nonzero,
 * else the uncertainty when finite and nonzero, else whichever is finite.
 */
export function getExpDriver(val: Numeric, unc: Numeric): Numeric {
  if (usable(val)) return val;
  if (usable(unc)) return unc;
  return isFiniteNumeric(val) ? val : unc;
}

/**
 * Parenthetical uncertainty text. An uncertainty smaller than the value
 * loses its group separators and leading zeros: 0.0023 -> "23".
 */
export function trimParenUncertainty(
  uncText: string,
  val: Numeric,
  unc: Numeric,
  options: Pick<ResolvedOptions, 'decimalSeparator' | 'parenUncertaintySeparators'>,
): string {
  const decimal = options.decimalSeparator;
  const smaller = isFiniteNumeric(val) && isFiniteNumeric(unc) && unc.lt(val.abs());
  const stripGroups = (text: string) => ALL_SEPARATORS
    .filter((sep) => sep !== decimal)
    .reduce((acc, sep) => acc.split(sep).join(''), text);

  let out = uncText;
  if (smaller && isFiniteNumeric(unc) && !unc.isZero()) {
    out = stripGroups(out);
    let start = 0;
    while (start < out.length && (out[start] === '0' || out[start] === decimal)) start++;
    out = out.slice(start);
  }
  if (!options.parenUncertaintySeparators) {
    out = stripGroups(out);
    if (smaller) out = out.split(decimal).join('');
  }
  return out;
}

function mantissaSegment(x: Numeric, text: string): Segment {
  return isFiniteNumeric(x) ? { kind: 'mantissa', text } : { kind: 'nonfinite', text };
}

export function formatValUncSegments(value: Numeric, uncertainty: Numeric, options: ResolvedOptions): Segment[] {
  if (options.roundMode === 'dec_place') {
    logger.warn(
      { roundMode: options.roundMode },
      'dec_place rounding is not available for value/uncertainty formatting; rounding to significant figures of the uncertainty',
    );
  }

  const percent = options.expMode === 'percent';
  const scale = (x: Numeric) => (percent && isFiniteNumeric(x) ? x.mulPow10(2n) : x);
  const val0 = scale(value);
  const unc0 = scale(uncertainty.abs());

  // Second pass: the first rounding may have moved the driver's top digit
  const first = roundValUnc(val0, unc0, options.ndigits, options.pdgSigFigs);
  const { val, unc, roundDigit } = roundValUnc(first.val, first.unc, options.ndigits, options.pdgSigFigs);

  const driver = getExpDriver(val, unc);
  const free = freeExpMode(options.expMode);
  let exp = 0;
  let valMantissa: Numeric = val;
  let uncMantissa: Numeric = unc;
  let mantissaDigit = 0;

  if (isFiniteNumeric(driver)) {
    const resolved = getMantissaExpBase(driver, options.expMode, options.expVal);
    exp = resolved.exp;
    valMantissa = getMantissaExpBase(val, free, exp).mantissa;
    uncMantissa = getMantissaExpBase(unc, free, exp).mantissa;

    if (resolved.base === 10) {
      mantissaDigit = roundDigit - exp;
    } else {
      // Binary mantissas are not decimal-aligned; pick the place on the mantissa itself
      const roundDriver = usable(unc) ? uncMantissa : valMantissa;
      mantissaDigit = getRoundDigit(roundDriver, 'sig_fig', options.ndigits, usable(unc) && options.pdgSigFigs);
      valMantissa = roundToDigit(valMantissa, mantissaDigit);
      uncMantissa = roundToDigit(uncMantissa, mantissaDigit);
    }
  } else if (options.expVal !== AUTO) {
    exp = options.expVal;
  }

  const targetTop = options.leftPadMatching
    ? Math.max(options.leftPadDecPlace, topDigit(valMantissa), topDigit(uncMantissa))
    : options.leftPadDecPlace;

  const group = (text: string) => addSeparators(
    text,
    options.upperSeparator,
    options.decimalSeparator,
    options.lowerSeparator,
  );
  const valText = group(renderMantissa(
    valMantissa, targetTop, mantissaDigit, options.signMode, options.leftPadChar, options.capitalize,
  ));
  let uncText = group(renderMantissa(
    uncMantissa, targetTop, mantissaDigit, '-', options.leftPadChar, options.capitalize,
  ));

  const body: Segment[] = [mantissaSegment(valMantissa, valText)];
  if (options.parenUncertainty) {
    uncText = trimParenUncertainty(uncText, valMantissa, uncMantissa, options);
    body.push({ kind: 'open' }, mantissaSegment(uncMantissa, uncText), { kind: 'close' });
  } else {
    body.push({ kind: 'pm', spaced: options.pmWhitespace }, mantissaSegment(uncMantissa, uncText));
  }

  const anyFinite = isFiniteNumeric(val) || isFiniteNumeric(unc);
  const suffix = anyFinite || options.nanInfExp || percent
    ? getExpSegment(exp, options.expMode, options)
    : null;

  if (!suffix) return body;
  // 1234(12) k, but (1234(12))e+03 and (1234 ± 12) k
  if (suffix.kind !== 'prefix' || !options.parenUncertainty) {
    return [{ kind: 'open' }, ...body, { kind: 'close' }, suffix];
  }
  return [...body, suffix];
}
