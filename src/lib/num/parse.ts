/**
 * Numeric input conversion
 * Accepts JS numbers, bigints, decimal strings and HugeDecimal values and
 * produces the exact Numeric the formatting pipeline works on.
 */

import { HugeDecimal, NonFinite, type Numeric } from './Huge.js';

export type NumberInput = number | bigint | string | HugeDecimal | NonFinite;

export class NumericParseError extends Error {
  constructor(
    message: string,
    public readonly code: 'bad_number' | 'empty',
    public readonly input: string,
  ) {
    super(message);
    this.name = 'NumericParseError';
  }
}

const NON_FINITE_WORDS = new Map<string, NonFinite>([
  ['nan', NonFinite.NAN],
  ['+nan', NonFinite.NAN],
  ['-nan', NonFinite.NAN],
  ['inf', NonFinite.INF],
  ['+inf', NonFinite.INF],
  ['infinity', NonFinite.INF],
  ['+infinity', NonFinite.INF],
  ['-inf', NonFinite.NEG_INF],
  ['-infinity', NonFinite.NEG_INF],
]);

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Convert any accepted input into an exact Numeric.
 *
 * Numbers use their shortest round-trip text (String(0.1) === "0.1"), which
 * keeps binary floating point artifacts out of the printed digits.
 *
 * @throws NumericParseError for strings that are not decimal numbers
 */
export function toNumeric(input: NumberInput): Numeric {
  if (input instanceof HugeDecimal || input instanceof NonFinite) return input;
  if (typeof input === 'bigint') return HugeDecimal.fromBigInt(input);
  if (typeof input === 'number') {
    return Number.isFinite(input) ? HugeDecimal.fromNumber(input) : NonFinite.fromNumber(input);
  }

  const raw = input.trim();
  if (!raw) {
    throw new NumericParseError('Empty numeric input', 'empty', input);
  }

  const word = NON_FINITE_WORDS.get(raw.toLowerCase());
  if (word) return word;

  if (!DECIMAL_PATTERN.test(raw)) {
    throw new NumericParseError(`Invalid number format: '${input}'`, 'bad_number', input);
  }
  return HugeDecimal.fromString(raw);
}
