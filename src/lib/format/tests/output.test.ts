import { describe, test, expect } from '@jest/globals';
import { DefaultsRegistry } from '../defaults.js';
import { Formatter } from '../Formatter.js';
import { DEFAULT_OPTIONS } from '../options.js';
import { FormattedNumber, renderSegment } from '../output.js';

const registry = new DefaultsRegistry();

describe('renderSegment', () => {
  test('latex escapes separators in mantissas', () => {
    expect(renderSegment({ kind: 'mantissa', text: '123 456.654_321' }, 'latex', false))
      .toBe('123\\:456.654\\_321');
  });

  test('latex wraps non-finite words in text', () => {
    expect(renderSegment({ kind: 'nonfinite', text: '-inf' }, 'latex', false)).toBe('-\\text{inf}');
  });

  test('brackets', () => {
    expect(renderSegment({ kind: 'open' }, 'latex', false)).toBe('\\left(');
    expect(renderSegment({ kind: 'close' }, 'html', false)).toBe(')');
  });

  test('plus-minus', () => {
    expect(renderSegment({ kind: 'pm', spaced: false }, 'latex', false)).toBe('\\pm');
    expect(renderSegment({ kind: 'pm', spaced: false }, 'ascii', false)).toBe('+/-');
  });
});

describe('FormattedNumber', () => {
  test('keeps its segments', () => {
    const r = new Formatter({ expMode: 'scientific' }, registry).format(1500);
    expect(r.segments).toEqual([
      { kind: 'mantissa', text: '1.5' },
      { kind: 'exp', base: 10, value: 3, capitalize: false },
    ]);
    expect(Object.isFrozen(r.segments)).toBe(true);
  });

  test('toString follows the latex option', () => {
    const plain = new Formatter({ expMode: 'scientific' }, registry).format(1500);
    const latex = new Formatter({ expMode: 'scientific', latex: true }, registry).format(1500);
    expect(plain.toString()).toBe('1.5e+03');
    expect(latex.toString()).toBe('1.5\\times10^{3}');
    expect(latex.render('plain')).toBe('1.5e+03');
  });

  test('non-finite percent in latex', () => {
    const r = new Formatter({ expMode: 'percent' }, registry).format(NaN);
    expect(r.toString()).toBe('(nan)%');
    expect(r.asLatex()).toBe('\\left(\\text{nan}\\right)\\%');
  });

  test('ascii spells out micro', () => {
    const r = new Formatter({ expMode: 'engineering', expFormat: 'prefix' }, registry).format('0.0000025');
    expect(r.toString()).toBe('2.5 μ');
    expect(r.asAscii()).toBe('2.5 u');
  });

  test('html exponents use sup', () => {
    const r = new Formatter({ expMode: 'binary_iec' }, registry).format(2048);
    expect(r.asHtml()).toBe('2×2<sup>10</sup>');
    expect(r.asAscii()).toBe('2b+10');
  });

  test('serialises as its text', () => {
    const r = new FormattedNumber([{ kind: 'mantissa', text: '1.5' }], DEFAULT_OPTIONS);
    expect(JSON.stringify({ x: r })).toBe('{"x":"1.5"}');
  });
});
