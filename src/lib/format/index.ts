export { format, formatNumber } from './format.js';
export { Formatter } from './Formatter.js';
export { SciNumber } from './SciNumber.js';
export { FormattedNumber } from './output.js';
export type { Segment, RenderStyle } from './output.js';
export { DefaultsRegistry, globalDefaults } from './defaults.js';
export {
  DEFAULT_OPTIONS,
  resolveOptions,
  validateUserOptions,
  mergeUserOptions,
  userOptionsSchema,
} from './options.js';
export type { UserOptions, ResolvedOptions } from './options.js';
export { parseFormatSpec } from './fsml.js';
export { ConfigError, FormatSpecParseError } from './errors.js';
export type { ConfigErrorCode } from './errors.js';
export { SI_PREFIXES, IEC_PREFIXES, PARTS_PER_FORMS } from './prefix.js';
export type { PrefixTable } from './prefix.js';
export { topDigit, bottomDigit, topDigitBinary } from './digits.js';
export { getMantissaExpBase } from './exponent.js';
export { getRoundDigit, getPdgRoundDigit, roundToDigit } from './rounding.js';
export { renderMantissa } from './mantissa.js';
export { addSeparators } from './grouping.js';
export { getExpSegment, renderExponent } from './expString.js';
export { roundValUnc } from './formatValUnc.js';
export { AUTO, EXP_MODES, ROUND_MODES, SIGN_MODES } from './modes.js';
export type {
  ExpMode,
  ExpFormat,
  RoundMode,
  SignMode,
  UpperSeparator,
  DecimalSeparator,
  LowerSeparator,
  LeftPadChar,
} from './modes.js';
