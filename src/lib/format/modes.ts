/**
 * Closed option vocabularies shared by the formatter.
 * Each list is the runtime source of truth; the union types derive from it.
 */

export const AUTO = 'auto' as const;
export type Auto = typeof AUTO;

export const EXP_MODES = [
  'fixed_point',
  'percent',
  'scientific',
  'engineering',
  'engineering_shifted',
  'binary',
  'binary_iec',
] as const;
export type ExpMode = typeof EXP_MODES[number];

export const ROUND_MODES = ['sig_fig', 'dec_place'] as const;
export type RoundMode = typeof ROUND_MODES[number];

export const SIGN_MODES = ['-', '+', ' '] as const;
export type SignMode = typeof SIGN_MODES[number];

export const UPPER_SEPARATORS = ['', ',', '.', ' ', '_'] as const;
export type UpperSeparator = typeof UPPER_SEPARATORS[number];

export const DECIMAL_SEPARATORS = ['.', ','] as const;
export type DecimalSeparator = typeof DECIMAL_SEPARATORS[number];

export const LOWER_SEPARATORS = ['', ' ', '_'] as const;
export type LowerSeparator = typeof LOWER_SEPARATORS[number];

/** Every character that can appear as a separator of any kind */
export const ALL_SEPARATORS: readonly string[] = [',', '.', ' ', '_'];

export const LEFT_PAD_CHARS = [' ', '0'] as const;
export type LeftPadChar = typeof LEFT_PAD_CHARS[number];

export const EXP_FORMATS = ['standard', 'prefix', 'parts_per'] as const;
export type ExpFormat = typeof EXP_FORMATS[number];

export type ExpVal = number | Auto;
export type NDigits = number | Auto;

export type Base = 10 | 2;

export function baseOf(mode: ExpMode): Base {
  return mode === 'binary' || mode === 'binary_iec' ? 2 : 10;
}

/**
 * Mode whose exponent can be set to any integer. Joint formatting resolves
 * the shared exponent with the configured mode, then places both mantissas
 * with this one.
 */
export function freeExpMode(mode: ExpMode): ExpMode {
  switch (mode) {
    case 'engineering':
    case 'engineering_shifted':
      return 'scientific';
    case 'binary_iec':
      return 'binary';
    case 'percent':
      return 'fixed_point';
    case 'fixed_point':
    case 'scientific':
    case 'binary':
      return mode;
  }
}
