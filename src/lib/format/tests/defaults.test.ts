import { describe, test, expect } from '@jest/globals';
import { DefaultsRegistry } from '../defaults.js';
import { Formatter } from '../Formatter.js';
import { DEFAULT_OPTIONS } from '../options.js';
import { configErrorCode } from './helpers.js';

describe('DefaultsRegistry', () => {
  test('starts from the built-in defaults', () => {
    const reg = new DefaultsRegistry();
    expect(reg.get()).toEqual(DEFAULT_OPTIONS);
    expect(reg.overrides()).toEqual({});
  });

  test('set layers on top of earlier sets', () => {
    const reg = new DefaultsRegistry({ expMode: 'scientific' });
    reg.set({ ndigits: 3 });
    expect(reg.get().expMode).toBe('scientific');
    expect(reg.get().ndigits).toBe(3);
    expect(reg.overrides()).toEqual({ expMode: 'scientific', ndigits: 3 });
  });

  test('a rejected update changes nothing', () => {
    const reg = new DefaultsRegistry({ expMode: 'engineering', expVal: 3 });
    expect(configErrorCode(() => reg.set({ expMode: 'fixed_point' }))).toBe('incompatible_exponent');
    expect(reg.get().expMode).toBe('engineering');
    expect(reg.get().expVal).toBe(3);
  });

  test('resolve puts caller options over the defaults', () => {
    const reg = new DefaultsRegistry({ expMode: 'scientific', ndigits: 3 });
    const o = reg.resolve({ ndigits: 2 });
    expect(o.expMode).toBe('scientific');
    expect(o.ndigits).toBe(2);
    expect(reg.get().ndigits).toBe(3);
  });

  test('withOverrides restores the previous defaults', () => {
    const reg = new DefaultsRegistry();
    const inside = reg.withOverrides({ nanInfExp: true }, () => reg.get().nanInfExp);
    expect(inside).toBe(true);
    expect(reg.get().nanInfExp).toBe(false);
  });

  test('withOverrides restores even when the callback throws', () => {
    const reg = new DefaultsRegistry({ signMode: '+' });
    expect(() => reg.withOverrides({ signMode: ' ' }, () => {
      throw new Error('boom');
    })).toThrow('boom');
    expect(reg.get().signMode).toBe('+');
  });

  test('reset drops every override', () => {
    const reg = new DefaultsRegistry({ superscript: true });
    reg.reset();
    expect(reg.get()).toEqual(DEFAULT_OPTIONS);
    expect(reg.overrides()).toEqual({});
  });

  test('formatters keep the defaults they were built with', () => {
    const reg = new DefaultsRegistry();
    const before = new Formatter({}, reg);
    reg.set({ expMode: 'scientific' });
    const after = new Formatter({}, reg);
    expect(before.format(1234.5).toString()).toBe('1234.5');
    expect(after.format(1234.5).toString()).toBe('1.2345e+03');
  });
});
