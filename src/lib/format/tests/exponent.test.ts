import { describe, test, expect } from '@jest/globals';
import { HugeDecimal, NonFinite } from '../../num/Huge.js';
import { fromMantissa, getMantissaExpBase } from '../exponent.js';
import type { ExpMode } from '../modes.js';
import { configErrorCode } from './helpers.js';

const d = (s: string) => HugeDecimal.fromString(s);

describe('getMantissaExpBase', () => {
  const auto: Array<[string, ExpMode, number, string]> = [
    ['12345.678', 'fixed_point', 0, '12345.678'],
    ['12345.678', 'scientific', 4, '1.2345678'],
    ['12345.678', 'engineering', 3, '12.345678'],
    ['12345.678', 'engineering_shifted', 3, '12.345678'],
    ['123456', 'engineering', 3, '123.456'],
    ['123456', 'engineering_shifted', 6, '0.123456'],
    ['0.0123', 'engineering', -3, '12.3'],
    ['0.123', 'engineering', -3, '123'],
    ['0.123', 'engineering_shifted', 0, '0.123'],
    ['1024', 'binary', 10, '1'],
    ['3000', 'binary_iec', 10, '2.9296875'],
    ['0.75', 'binary', -1, '1.5'],
  ];
  for (const [v, mode, exp, mantissa] of auto) {
    test(`${v} in ${mode}`, () => {
      const out = getMantissaExpBase(d(v), mode, 'auto');
      expect(out.exp).toBe(exp);
      expect(out.mantissa.toString()).toBe(mantissa);
    });
  }

  test('reports the base', () => {
    expect(getMantissaExpBase(d('5'), 'binary_iec', 'auto').base).toBe(2);
    expect(getMantissaExpBase(d('5'), 'percent', 'auto').base).toBe(10);
  });

  test('fixed exponents', () => {
    const out = getMantissaExpBase(d('123.456'), 'scientific', -2);
    expect(out.exp).toBe(-2);
    expect(out.mantissa.toString()).toBe('12345.6');
  });

  test('zero and non-finite values keep themselves', () => {
    expect(getMantissaExpBase(HugeDecimal.ZERO, 'scientific', 'auto')).toEqual({
      mantissa: HugeDecimal.ZERO, exp: 0, base: 10,
    });
    expect(getMantissaExpBase(HugeDecimal.ZERO, 'engineering', 6).exp).toBe(6);
    const nan = getMantissaExpBase(NonFinite.NAN, 'binary', 'auto');
    expect(nan.mantissa).toBe(NonFinite.NAN);
    expect(nan.exp).toBe(0);
  });

  test('rejects exponents the mode cannot take', () => {
    expect(configErrorCode(() => getMantissaExpBase(d('1'), 'fixed_point', 2))).toBe('incompatible_exponent');
    expect(configErrorCode(() => getMantissaExpBase(d('1'), 'percent', -1))).toBe('incompatible_exponent');
    expect(configErrorCode(() => getMantissaExpBase(d('1'), 'engineering', 4))).toBe('exponent_not_multiple');
    expect(configErrorCode(() => getMantissaExpBase(d('1'), 'binary_iec', 15))).toBe('exponent_not_multiple');
    expect(configErrorCode(() => getMantissaExpBase(d('1'), 'fixed_point', 0))).toBeUndefined();
  });
});

describe('fromMantissa', () => {
  test('undoes the split', () => {
    expect(fromMantissa(d('1.2345678'), 4, 10).eq(d('12345.678'))).toBe(true);
    expect(fromMantissa(d('2.9296875'), 10, 2).eq(d('3000'))).toBe(true);
    expect(fromMantissa(NonFinite.INF, 3, 10)).toBe(NonFinite.INF);
  });
});
