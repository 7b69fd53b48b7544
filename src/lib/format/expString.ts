/**
 * Exponent and prefix suffixes
 */

import type { Base, ExpMode } from './modes.js';
import { baseOf } from './modes.js';
import type { ResolvedOptions } from './options.js';
import {
  IEC_PREFIXES,
  PARTS_PER_FORMS,
  SI_PREFIXES,
  lookupPrefix,
  mergePrefixTables,
  type PrefixTable,
} from './prefix.js';

export interface ExpSegment {
  kind: 'exp';
  base: Base;
  value: number;
  capitalize: boolean;
}

export interface PrefixSegment {
  kind: 'prefix';
  token: string;
}

export interface PercentSegment {
  kind: 'percent';
}

export type SuffixSegment = ExpSegment | PrefixSegment | PercentSegment;

export type RenderStyle = 'plain' | 'latex' | 'html' | 'ascii';

type SuffixOptions = Pick<
  ResolvedOptions,
  'expFormat' | 'capitalize' | 'extraSiPrefixes' | 'extraIecPrefixes' | 'extraPartsPerForms'
>;

export function prefixTableFor(base: Base, options: SuffixOptions): PrefixTable | undefined {
  switch (options.expFormat) {
    case 'standard':
      return undefined;
    case 'prefix':
      return base === 10
        ? mergePrefixTables(SI_PREFIXES, options.extraSiPrefixes)
        : mergePrefixTables(IEC_PREFIXES, options.extraIecPrefixes);
    case 'parts_per':
      return mergePrefixTables(PARTS_PER_FORMS, options.extraPartsPerForms);
  }
}

/**
 * Suffix that follows the mantissa, or null when nothing follows
 * (fixed point, or a prefix table mapping the exponent to '').
 */
export function getExpSegment(exp: number, mode: ExpMode, options: SuffixOptions): SuffixSegment | null {
  if (mode === 'fixed_point') return null;
  if (mode === 'percent') return { kind: 'percent' };

  const base = baseOf(mode);
  const table = prefixTableFor(base, options);
  if (table) {
    const token = lookupPrefix(table, exp);
    if (token !== undefined) return token ? { kind: 'prefix', token } : null;
  }
  return { kind: 'exp', base, value: exp, capitalize: options.capitalize };
}

const SUPERSCRIPTS: Record<string, string> = {
  '0': '⁰', '1': '¹', '2': '²', '3': '³', '4': '⁴',
  '5': '⁵', '6': '⁶', '7': '⁷', '8': '⁸', '9': '⁹',
  '+': '⁺', '-': '⁻',
};

export function toSuperscript(text: string): string {
  return [...text].map((c) => SUPERSCRIPTS[c] ?? c).join('');
}

/** e+03, b-10, E+06 */
export function standardExpString(seg: ExpSegment): string {
  const symbol = seg.base === 10 ? 'e' : 'b';
  const sign = seg.value < 0 ? '-' : '+';
  const digits = String(Math.abs(seg.value)).padStart(2, '0');
  return `${seg.capitalize ? symbol.toUpperCase() : symbol}${sign}${digits}`;
}

function renderPrefix(token: string, style: RenderStyle): string {
  switch (style) {
    case 'latex':
      return `\\:\\text{${token}}`;
    case 'ascii':
      return ` ${token.replace('μ', 'u')}`;
    case 'plain':
    case 'html':
      return ` ${token}`;
  }
}

function renderPower(seg: ExpSegment, style: RenderStyle, superscript: boolean): string {
  switch (style) {
    case 'latex':
      return `\\times${seg.base}^{${seg.value}}`;
    case 'html':
      return `×${seg.base}<sup>${seg.value}</sup>`;
    case 'plain':
      return superscript ? `×${seg.base}${toSuperscript(String(seg.value))}` : standardExpString(seg);
    case 'ascii':
      return standardExpString(seg);
  }
}

/**
 * Render a suffix in one output style. `superscript` only affects the
 * plain style; html always uses markup and ascii never leaves ASCII.
 */
export function renderExponent(seg: SuffixSegment, style: RenderStyle, superscript = false): string {
  switch (seg.kind) {
    case 'percent':
      return style === 'latex' ? '\\%' : '%';
    case 'prefix':
      return renderPrefix(seg.token, style);
    case 'exp':
      return renderPower(seg, style, superscript);
  }
}
