/**
 * Formatting options: user-facing partial options, their zod schema, and
 * the frozen ResolvedOptions record that every renderer reads.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';
import {
  AUTO,
  DECIMAL_SEPARATORS,
  EXP_FORMATS,
  EXP_MODES,
  LEFT_PAD_CHARS,
  LOWER_SEPARATORS,
  ROUND_MODES,
  SIGN_MODES,
  UPPER_SEPARATORS,
  type DecimalSeparator,
  type ExpFormat,
  type ExpMode,
  type ExpVal,
  type LeftPadChar,
  type LowerSeparator,
  type NDigits,
  type RoundMode,
  type SignMode,
  type UpperSeparator,
} from './modes.js';
import {
  C_PREFIX,
  PPTH_FORM,
  SMALL_SI_PREFIXES,
  mergePrefixTables,
  withMissing,
  type PrefixTable,
} from './prefix.js';

// ============================================================================
// Schema
// ============================================================================

const intOrAuto = z.union([z.literal(AUTO), z.number().int()]);

const prefixOverrides = z.record(
  z.string().regex(/^[+-]?\d+$/, 'prefix keys must be integer exponents'),
  z.string().nullable(),
);

export const userOptionsSchema = z.object({
  expMode: z.enum(EXP_MODES).optional(),
  expVal: intOrAuto.optional(),
  roundMode: z.enum(ROUND_MODES).optional(),
  ndigits: intOrAuto.optional(),
  upperSeparator: z.enum(UPPER_SEPARATORS).optional(),
  decimalSeparator: z.enum(DECIMAL_SEPARATORS).optional(),
  lowerSeparator: z.enum(LOWER_SEPARATORS).optional(),
  signMode: z.enum(SIGN_MODES).optional(),
  leftPadChar: z.enum(LEFT_PAD_CHARS).optional(),
  leftPadDecPlace: z.number().int().min(0).optional(),
  leftPadMatching: z.boolean().optional(),
  expFormat: z.enum(EXP_FORMATS).optional(),
  extraSiPrefixes: prefixOverrides.optional(),
  extraIecPrefixes: prefixOverrides.optional(),
  extraPartsPerForms: prefixOverrides.optional(),
  capitalize: z.boolean().optional(),
  superscript: z.boolean().optional(),
  latex: z.boolean().optional(),
  nanInfExp: z.boolean().optional(),
  parenUncertainty: z.boolean().optional(),
  pdgSigFigs: z.boolean().optional(),
  parenUncertaintySeparators: z.boolean().optional(),
  pmWhitespace: z.boolean().optional(),
  addCPrefix: z.boolean().optional(),
  addSmallSiPrefixes: z.boolean().optional(),
  addPpthForm: z.boolean().optional(),
}).strict();

/** Partial options as a caller, a config file or an FSML string supplies them */
export type UserOptions = z.infer<typeof userOptionsSchema>;

// ============================================================================
// Resolved record
// ============================================================================

export interface ResolvedOptions {
  readonly expMode: ExpMode;
  readonly expVal: ExpVal;
  readonly roundMode: RoundMode;
  readonly ndigits: NDigits;
  readonly upperSeparator: UpperSeparator;
  readonly decimalSeparator: DecimalSeparator;
  readonly lowerSeparator: LowerSeparator;
  readonly signMode: SignMode;
  readonly leftPadChar: LeftPadChar;
  readonly leftPadDecPlace: number;
  readonly leftPadMatching: boolean;
  readonly expFormat: ExpFormat;
  /** Overrides with the prefix switches already folded in */
  readonly extraSiPrefixes: PrefixTable;
  readonly extraIecPrefixes: PrefixTable;
  readonly extraPartsPerForms: PrefixTable;
  readonly capitalize: boolean;
  readonly superscript: boolean;
  readonly latex: boolean;
  readonly nanInfExp: boolean;
  readonly parenUncertainty: boolean;
  readonly pdgSigFigs: boolean;
  readonly parenUncertaintySeparators: boolean;
  readonly pmWhitespace: boolean;
  readonly addCPrefix: boolean;
  readonly addSmallSiPrefixes: boolean;
  readonly addPpthForm: boolean;
}

export const DEFAULT_OPTIONS: ResolvedOptions = Object.freeze<ResolvedOptions>({
  expMode: 'fixed_point',
  expVal: AUTO,
  roundMode: 'sig_fig',
  ndigits: AUTO,
  upperSeparator: '',
  decimalSeparator: '.',
  lowerSeparator: '',
  signMode: '-',
  leftPadChar: ' ',
  leftPadDecPlace: 0,
  leftPadMatching: false,
  expFormat: 'standard',
  extraSiPrefixes: mergePrefixTables(),
  extraIecPrefixes: mergePrefixTables(),
  extraPartsPerForms: mergePrefixTables(),
  capitalize: false,
  superscript: false,
  latex: false,
  nanInfExp: false,
  parenUncertainty: false,
  pdgSigFigs: false,
  parenUncertaintySeparators: true,
  pmWhitespace: true,
  addCPrefix: false,
  addSmallSiPrefixes: false,
  addPpthForm: false,
});

// ============================================================================
// Validation
// ============================================================================

type OptionPair = Partial<Pick<ResolvedOptions, 'expMode' | 'expVal' | 'roundMode' | 'ndigits' | 'upperSeparator' | 'decimalSeparator'>>;

/**
 * Check that a fixed exponent is allowed for the mode.
 * @throws ConfigError incompatible_exponent | exponent_not_multiple
 */
export function checkExpVal(mode: ExpMode, expVal: ExpVal): void {
  if (expVal === AUTO) return;
  switch (mode) {
    case 'fixed_point':
    case 'percent':
      if (expVal !== 0) {
        throw new ConfigError(
          `Exponent must be 0 in ${mode} mode, not ${expVal}`,
          'incompatible_exponent',
          'expVal',
        );
      }
      return;
    case 'engineering':
    case 'engineering_shifted':
      if (expVal % 3 !== 0) {
        throw new ConfigError(
          `Exponent must be a multiple of 3 in ${mode} mode, not ${expVal}`,
          'exponent_not_multiple',
          'expVal',
        );
      }
      return;
    case 'binary_iec':
      if (expVal % 10 !== 0) {
        throw new ConfigError(
          `Exponent must be a multiple of 10 in binary_iec mode, not ${expVal}`,
          'exponent_not_multiple',
          'expVal',
        );
      }
      return;
    case 'scientific':
    case 'binary':
      return;
  }
}

// Cross-field rules, checked only where both sides are present
function checkSemantics(options: OptionPair): void {
  if (options.expMode !== undefined && options.expVal !== undefined) {
    checkExpVal(options.expMode, options.expVal);
  }
  if (
    options.upperSeparator !== undefined
    && options.decimalSeparator !== undefined
    && options.upperSeparator === options.decimalSeparator
  ) {
    throw new ConfigError(
      `Upper separator and decimal separator must differ, both are '${options.decimalSeparator}'`,
      'identical_separators',
      'upperSeparator',
    );
  }
  if (options.roundMode === 'sig_fig' && typeof options.ndigits === 'number' && options.ndigits < 1) {
    throw new ConfigError(
      `ndigits must be >= 1 for sig_fig rounding, not ${options.ndigits}`,
      'invalid_ndigits',
      'ndigits',
    );
  }
}

/**
 * Validate the shape and the internal consistency of partial options.
 * Rules that need a value the caller left unset are checked again when
 * the options are resolved.
 *
 * @throws ConfigError
 */
export function validateUserOptions(input: unknown): UserOptions {
  const parsed = userOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = issue?.path.join('.') ?? '';
    throw new ConfigError(
      `Invalid option${path ? ` '${path}'` : ''}: ${issue?.message ?? 'malformed options'}`,
      'invalid_option',
      path || undefined,
    );
  }
  checkSemantics(parsed.data);
  return parsed.data;
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Merge partial options over a resolved record, fold in the prefix switches
 * and validate the result. The returned record is frozen.
 *
 * @throws ConfigError
 */
export function resolveOptions(user: UserOptions = {}, defaults: ResolvedOptions = DEFAULT_OPTIONS): ResolvedOptions {
  const u = validateUserOptions(user);

  const addCPrefix = u.addCPrefix ?? defaults.addCPrefix;
  const addSmallSiPrefixes = u.addSmallSiPrefixes ?? defaults.addSmallSiPrefixes;
  const addPpthForm = u.addPpthForm ?? defaults.addPpthForm;

  let extraSiPrefixes = mergePrefixTables(u.extraSiPrefixes ?? defaults.extraSiPrefixes);
  if (addCPrefix) extraSiPrefixes = withMissing(extraSiPrefixes, C_PREFIX);
  if (addSmallSiPrefixes) extraSiPrefixes = withMissing(extraSiPrefixes, SMALL_SI_PREFIXES);

  let extraPartsPerForms = mergePrefixTables(u.extraPartsPerForms ?? defaults.extraPartsPerForms);
  if (addPpthForm) extraPartsPerForms = withMissing(extraPartsPerForms, PPTH_FORM);

  const resolved: ResolvedOptions = {
    expMode: u.expMode ?? defaults.expMode,
    expVal: u.expVal ?? defaults.expVal,
    roundMode: u.roundMode ?? defaults.roundMode,
    ndigits: u.ndigits ?? defaults.ndigits,
    upperSeparator: u.upperSeparator ?? defaults.upperSeparator,
    decimalSeparator: u.decimalSeparator ?? defaults.decimalSeparator,
    lowerSeparator: u.lowerSeparator ?? defaults.lowerSeparator,
    signMode: u.signMode ?? defaults.signMode,
    leftPadChar: u.leftPadChar ?? defaults.leftPadChar,
    leftPadDecPlace: u.leftPadDecPlace ?? defaults.leftPadDecPlace,
    leftPadMatching: u.leftPadMatching ?? defaults.leftPadMatching,
    expFormat: u.expFormat ?? defaults.expFormat,
    extraSiPrefixes,
    extraIecPrefixes: mergePrefixTables(u.extraIecPrefixes ?? defaults.extraIecPrefixes),
    extraPartsPerForms,
    capitalize: u.capitalize ?? defaults.capitalize,
    superscript: u.superscript ?? defaults.superscript,
    latex: u.latex ?? defaults.latex,
    nanInfExp: u.nanInfExp ?? defaults.nanInfExp,
    parenUncertainty: u.parenUncertainty ?? defaults.parenUncertainty,
    pdgSigFigs: u.pdgSigFigs ?? defaults.pdgSigFigs,
    parenUncertaintySeparators: u.parenUncertaintySeparators ?? defaults.parenUncertaintySeparators,
    pmWhitespace: u.pmWhitespace ?? defaults.pmWhitespace,
    addCPrefix,
    addSmallSiPrefixes,
    addPpthForm,
  };

  checkSemantics(resolved);
  return Object.freeze(resolved);
}

const USER_OPTION_KEYS = userOptionsSchema.keyof().options;

function copyDefined<K extends keyof UserOptions>(target: UserOptions, source: UserOptions, key: K): void {
  const value = source[key];
  if (value !== undefined) target[key] = value;
}

/**
 * Layer partial options, later layers winning. Keys explicitly set to
 * undefined leave the earlier value in place.
 *
 * @throws ConfigError
 */
export function mergeUserOptions(...layers: UserOptions[]): UserOptions {
  const out: UserOptions = {};
  for (const layer of layers) {
    const parsed = validateUserOptions(layer);
    for (const key of USER_OPTION_KEYS) copyDefined(out, parsed, key);
  }
  return validateUserOptions(out);
}
