/**
 * Exponent-to-prefix tables
 *
 * Keys are exponent values (base 10 for SI and parts-per, base 2 for IEC).
 * A null entry suppresses the token for that exponent so the standard
 * exponent form is printed instead.
 */

export type PrefixTable = Readonly<Record<number, string | null>>;

export const SI_PREFIXES: PrefixTable = Object.freeze({
  30: 'Q',
  27: 'R',
  24: 'Y',
  21: 'Z',
  18: 'E',
  15: 'P',
  12: 'T',
  9: 'G',
  6: 'M',
  3: 'k',
  0: '',
  [-3]: 'm',
  [-6]: 'μ',
  [-9]: 'n',
  [-12]: 'p',
  [-15]: 'f',
  [-18]: 'a',
  [-21]: 'z',
  [-24]: 'y',
  [-27]: 'r',
  [-30]: 'q',
});

export const IEC_PREFIXES: PrefixTable = Object.freeze({
  0: '',
  10: 'Ki',
  20: 'Mi',
  30: 'Gi',
  40: 'Ti',
  50: 'Pi',
  60: 'Ei',
  70: 'Zi',
  80: 'Yi',
});

export const PARTS_PER_FORMS: PrefixTable = Object.freeze({
  0: '',
  [-6]: 'ppm',
  [-9]: 'ppb',
  [-12]: 'ppt',
  [-15]: 'ppq',
});

// Opt-in extensions, switched on through options
export const C_PREFIX: PrefixTable = Object.freeze({ [-2]: 'c' });
export const SMALL_SI_PREFIXES: PrefixTable = Object.freeze({ [-2]: 'c', [-1]: 'd', 1: 'da', 2: 'h' });
export const PPTH_FORM: PrefixTable = Object.freeze({ [-3]: 'ppth' });

/**
 * Layer tables left to right, later entries winning.
 */
export function mergePrefixTables(...tables: PrefixTable[]): PrefixTable {
  const out: Record<number, string | null> = {};
  for (const table of tables) Object.assign(out, table);
  return Object.freeze(out);
}

/**
 * Add the entries of `extra` whose exponent `table` does not already map.
 * Explicit entries, including null suppressions, are left alone.
 */
export function withMissing(table: PrefixTable, extra: PrefixTable): PrefixTable {
  const out: Record<number, string | null> = { ...extra };
  Object.assign(out, table);
  return Object.freeze(out);
}

/**
 * Token for an exact exponent, or undefined when the table has no usable
 * entry (missing or suppressed).
 */
export function lookupPrefix(table: PrefixTable, exp: number): string | undefined {
  if (!Object.hasOwn(table, exp)) return undefined;
  const token = table[exp];
  return token === null ? undefined : token;
}
