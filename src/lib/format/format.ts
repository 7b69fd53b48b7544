/**
 * Primary call contract: fully resolved options in, formatted result out.
 * Nothing here reads defaults; callers resolve options first.
 */

import { toNumeric, type NumberInput } from '../num/parse.js';
import { formatNumSegments } from './formatNum.js';
import { formatValUncSegments } from './formatValUnc.js';
import type { ResolvedOptions } from './options.js';
import { FormattedNumber } from './output.js';

export function formatNumber(
  value: NumberInput,
  uncertainty: NumberInput | undefined,
  options: ResolvedOptions,
): FormattedNumber {
  const val = toNumeric(value);
  const segments = uncertainty === undefined
    ? formatNumSegments(val, options)
    : formatValUncSegments(val, toNumeric(uncertainty), options);
  return new FormattedNumber(segments, options);
}

export function format(
  value: NumberInput,
  uncertainty: NumberInput | undefined,
  options: ResolvedOptions,
): string {
  return formatNumber(value, uncertainty, options).toString();
}
