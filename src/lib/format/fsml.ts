/**
 * Format specification mini-language (FSML)
 *
 *   [fill=][sign][#][padPlace][upper][decimal][lower][.n|!n][mode][x±e][p][()]
 *
 * e.g. "0=+#4,.s!3Rx+3p()". The string is matched against the ordered,
 * optional groups below by an explicit backtracking search: every group
 * tries its present forms (longest first) before being skipped, and the
 * first assignment that consumes the whole string wins.
 */

import { FormatSpecParseError } from './errors.js';
import {
  DECIMAL_SEPARATORS,
  LOWER_SEPARATORS,
  SIGN_MODES,
  UPPER_SEPARATORS,
  type ExpMode,
} from './modes.js';
import { validateUserOptions, type UserOptions } from './options.js';

// ============================================================================
// Matchers: each returns the possible end positions, preferred first
// ============================================================================

type Matcher = (input: string, pos: number) => number[];

const oneOf = (chars: string): Matcher => (input, pos) =>
  pos < input.length && chars.includes(input[pos]) ? [pos + 1] : [];

const literal = (text: string): Matcher => (input, pos) =>
  input.startsWith(text, pos) ? [pos + text.length] : [];

const digits: Matcher = (input, pos) => {
  let end = pos;
  while (end < input.length && input[end] >= '0' && input[end] <= '9') end++;
  const ends: number[] = [];
  for (let e = end; e > pos; e--) ends.push(e);
  return ends;
};

const optional = (m: Matcher): Matcher => (input, pos) => [...m(input, pos), pos];

const seq = (...parts: Matcher[]): Matcher => (input, pos) =>
  parts.reduce<number[]>(
    (starts, part) => starts.flatMap((start) => part(input, start)),
    [pos],
  );

const signedInt = seq(optional(oneOf('+-')), digits);

const GROUPS = [
  { name: 'fill', match: seq(oneOf(' 0'), literal('=')) },
  { name: 'sign', match: oneOf('-+ ') },
  { name: 'alternate', match: literal('#') },
  { name: 'padPlace', match: digits },
  { name: 'upper', match: oneOf('n,.s_') },
  { name: 'decimal', match: oneOf('.,') },
  { name: 'lower', match: oneOf('ns_') },
  { name: 'round', match: seq(oneOf('.!'), signedInt) },
  { name: 'expMode', match: oneOf('fF%eErRbB') },
  { name: 'expVal', match: seq(literal('x'), signedInt) },
  { name: 'prefix', match: literal('p') },
  { name: 'paren', match: literal('()') },
] as const;

type GroupName = typeof GROUPS[number]['name'];
type Captures = Partial<Record<GroupName, string>>;

function search(input: string, index: number, pos: number, caps: Captures): Captures | null {
  if (index === GROUPS.length) return pos === input.length ? caps : null;
  const group = GROUPS[index];
  for (const end of group.match(input, pos)) {
    const found = search(input, index + 1, end, { ...caps, [group.name]: input.slice(pos, end) });
    if (found) return found;
  }
  return search(input, index + 1, pos, caps);
}

// ============================================================================
// Translation
// ============================================================================

const expandSeparator = (c: string) => (c === 'n' ? '' : c === 's' ? ' ' : c);

function parseExpMode(c: string, alternate: boolean): ExpMode {
  switch (c.toLowerCase()) {
    case 'f':
      return 'fixed_point';
    case '%':
      return 'percent';
    case 'e':
      return 'scientific';
    case 'r':
      return alternate ? 'engineering_shifted' : 'engineering';
    default:
      return alternate ? 'binary_iec' : 'binary';
  }
}

/**
 * Compile an FSML string into partial options. Groups absent from the
 * string stay unset.
 *
 * @throws FormatSpecParseError when the string does not match the grammar
 * @throws ConfigError when it matches but names a contradictory combination
 */
export function parseFormatSpec(spec: string): UserOptions {
  const caps = search(spec, 0, 0, {});
  if (!caps) throw new FormatSpecParseError(spec);

  const options: UserOptions = {};

  if (caps.fill !== undefined) options.leftPadChar = caps.fill[0] === '0' ? '0' : ' ';
  if (caps.sign !== undefined) options.signMode = SIGN_MODES.find((m) => m === caps.sign);
  if (caps.padPlace !== undefined) {
    options.leftPadDecPlace = Number(caps.padPlace);
    options.leftPadMatching = true;
  }
  if (caps.upper !== undefined) {
    const sep = expandSeparator(caps.upper);
    options.upperSeparator = UPPER_SEPARATORS.find((s) => s === sep);
  }
  if (caps.decimal !== undefined) options.decimalSeparator = DECIMAL_SEPARATORS.find((s) => s === caps.decimal);
  if (caps.lower !== undefined) {
    const sep = expandSeparator(caps.lower);
    options.lowerSeparator = LOWER_SEPARATORS.find((s) => s === sep);
  }
  if (caps.round !== undefined) {
    options.roundMode = caps.round[0] === '!' ? 'sig_fig' : 'dec_place';
    options.ndigits = Number(caps.round.slice(1));
  }
  if (caps.expMode !== undefined) {
    options.expMode = parseExpMode(caps.expMode, caps.alternate !== undefined);
    options.capitalize = caps.expMode !== caps.expMode.toLowerCase();
  }
  if (caps.expVal !== undefined) options.expVal = Number(caps.expVal.slice(1));
  if (caps.prefix !== undefined) options.expFormat = 'prefix';
  if (caps.paren !== undefined) options.parenUncertainty = true;

  return validateUserOptions(options);
}
