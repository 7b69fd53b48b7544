/**
 * Structured formatting result
 *
 * The formatter emits an ordered list of segments once; every output style
 * (plain, LaTeX, HTML, ASCII) is a re-rendering of the same segments, so
 * the digits always agree between styles.
 */

import { renderExponent, type RenderStyle, type SuffixSegment } from './expString.js';
import type { ResolvedOptions } from './options.js';

export type Segment =
  | { kind: 'mantissa'; text: string }
  | { kind: 'nonfinite'; text: string }
  | { kind: 'pm'; spaced: boolean }
  | { kind: 'open' }
  | { kind: 'close' }
  | SuffixSegment;

export type { RenderStyle } from './expString.js';

function latexText(text: string): string {
  return text.replace(/_/g, '\\_').replace(/ /g, '\\:');
}

function renderPm(spaced: boolean, style: RenderStyle): string {
  switch (style) {
    case 'latex':
      return spaced ? '\\:\\pm\\:' : '\\pm';
    case 'ascii':
      return spaced ? ' +/- ' : '+/-';
    case 'plain':
    case 'html':
      return spaced ? ' ± ' : '±';
  }
}

export function renderSegment(seg: Segment, style: RenderStyle, superscript: boolean): string {
  switch (seg.kind) {
    case 'mantissa':
      return style === 'latex' ? latexText(seg.text) : seg.text;
    case 'nonfinite':
      return style === 'latex'
        ? latexText(seg.text).replace(/[a-zA-Z]+/, (word) => `\\text{${word}}`)
        : seg.text;
    case 'pm':
      return renderPm(seg.spaced, style);
    case 'open':
      return style === 'latex' ? '\\left(' : '(';
    case 'close':
      return style === 'latex' ? '\\right)' : ')';
    case 'percent':
    case 'prefix':
    case 'exp':
      return renderExponent(seg, style, superscript);
  }
}

export class FormattedNumber {
  readonly segments: readonly Segment[];
  readonly options: ResolvedOptions;

  constructor(segments: readonly Segment[], options: ResolvedOptions) {
    this.segments = Object.freeze([...segments]);
    this.options = options;
  }

  render(style: RenderStyle): string {
    return this.segments.map((seg) => renderSegment(seg, style, this.options.superscript)).join('');
  }

  /** LaTeX when the latex option is set, plain text otherwise */
  toString(): string {
    return this.render(this.options.latex ? 'latex' : 'plain');
  }

  asLatex(): string {
    return this.render('latex');
  }

  asHtml(): string {
    return this.render('html');
  }

  asAscii(): string {
    return this.render('ascii');
  }

  toJSON(): string {
    return this.toString();
  }
}
