import { describe, test, expect } from '@jest/globals';
import { ConfigError } from '../errors.js';
import { DEFAULT_OPTIONS, mergeUserOptions, resolveOptions, validateUserOptions } from '../options.js';
import { configErrorCode } from './helpers.js';

describe('resolveOptions', () => {
  test('no input gives the built-in defaults, frozen', () => {
    const o = resolveOptions();
    expect(o).toEqual(DEFAULT_OPTIONS);
    expect(Object.isFrozen(o)).toBe(true);
  });

  test('caller options win over defaults', () => {
    const base = resolveOptions({ expMode: 'scientific', ndigits: 3 });
    const o = resolveOptions({ ndigits: 5 }, base);
    expect(o.expMode).toBe('scientific');
    expect(o.ndigits).toBe(5);
  });

  test('exponent checks run against the merged record', () => {
    expect(configErrorCode(() => resolveOptions({ expVal: 2 }))).toBe('incompatible_exponent');
    expect(configErrorCode(() => resolveOptions({ expMode: 'engineering', expVal: 2 }))).toBe('exponent_not_multiple');
    expect(resolveOptions({ expMode: 'engineering', expVal: -6 }).expVal).toBe(-6);
  });

  test('upper and decimal separators must differ', () => {
    expect(configErrorCode(() => resolveOptions({ upperSeparator: '.' }))).toBe('identical_separators');
    expect(resolveOptions({ upperSeparator: '.', decimalSeparator: ',' }).upperSeparator).toBe('.');
  });

  test('sig_fig needs at least one digit', () => {
    expect(configErrorCode(() => resolveOptions({ ndigits: 0 }))).toBe('invalid_ndigits');
    expect(resolveOptions({ roundMode: 'dec_place', ndigits: 0 }).ndigits).toBe(0);
  });

  test('prefix switches fold into the override tables', () => {
    const o = resolveOptions({ addSmallSiPrefixes: true });
    expect(o.extraSiPrefixes[-1]).toBe('d');
    expect(o.extraSiPrefixes[2]).toBe('h');
    expect(resolveOptions({ addPpthForm: true }).extraPartsPerForms[-3]).toBe('ppth');
  });

  test('explicit overrides survive the switches', () => {
    const o = resolveOptions({ addCPrefix: true, extraSiPrefixes: { '-2': null } });
    expect(o.extraSiPrefixes[-2]).toBeNull();
  });
});

describe('validateUserOptions', () => {
  test('accepts partial options', () => {
    expect(validateUserOptions({ expMode: 'percent' })).toEqual({ expMode: 'percent' });
  });

  test('unknown values name the option', () => {
    try {
      validateUserOptions({ expMode: 'bogus' });
      throw new Error('expected a ConfigError');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe('invalid_option');
        expect(err.option).toBe('expMode');
      }
    }
  });

  test('unknown keys are rejected', () => {
    expect(configErrorCode(() => validateUserOptions({ precision: 3 }))).toBe('invalid_option');
  });

  test('prefix override keys must be exponents', () => {
    expect(configErrorCode(() => validateUserOptions({ extraSiPrefixes: { kilo: 'k' } }))).toBe('invalid_option');
  });

  test('cross-field rules only apply where both fields are given', () => {
    expect(validateUserOptions({ upperSeparator: '.' })).toEqual({ upperSeparator: '.' });
    expect(configErrorCode(() => validateUserOptions({ expMode: 'fixed_point', expVal: 3 }))).toBe('incompatible_exponent');
  });
});

describe('mergeUserOptions', () => {
  test('later layers win, undefined keeps the earlier value', () => {
    const merged = mergeUserOptions(
      { expMode: 'scientific', ndigits: 3 },
      { ndigits: 5, expMode: undefined },
    );
    expect(merged).toEqual({ expMode: 'scientific', ndigits: 5 });
  });

  test('the merged result is validated', () => {
    expect(configErrorCode(() => mergeUserOptions({ expMode: 'fixed_point' }, { expVal: 3 }))).toBe('incompatible_exponent');
  });
});
