/**
 * Tests for HugeDecimal exact arithmetic
 */

import { describe, test, expect } from '@jest/globals';
import { HugeDecimal, NonFinite, isFiniteNumeric } from './Huge.js';

const d = (s: string) => HugeDecimal.fromString(s);

describe('HugeDecimal', () => {
  describe('Construction', () => {
    test('from bigint', () => {
      const hd = HugeDecimal.fromBigInt(1234567890n);
      expect(hd.toBigInt()).toBe(1234567890n);
      expect(hd.isNegative()).toBe(false);
    });

    test('from number uses the shortest decimal text', () => {
      expect(HugeDecimal.fromNumber(0.1).eq(d('0.1'))).toBe(true);
      expect(HugeDecimal.fromNumber(0.1).toString()).toBe('0.1');
      expect(HugeDecimal.fromNumber(3.1415e-30).toString()).toBe('3.1415e-30');
    });

    test('from string', () => {
      expect(d('123.456').toString()).toBe('123.456');
      expect(d('.5').toString()).toBe('0.5');
      expect(d('-5.67e-3').toString()).toBe('-0.00567');
      expect(d('1.23e10').toString()).toBe('12300000000');
    });

    test('trailing zeros are dropped', () => {
      const hd = d('1.20');
      expect(hd.mantissa).toBe(12n);
      expect(hd.toString()).toBe('1.2');
    });

    test('zero', () => {
      expect(d('-0.000').isZero()).toBe(true);
      expect(d('-0').isNegative()).toBe(false);
      expect(HugeDecimal.ZERO.toString()).toBe('0');
    });

    test('rejects malformed text', () => {
      expect(() => d('1.2.3')).toThrow('Invalid number format');
      expect(() => d('.')).toThrow('Invalid number format');
      expect(() => d('')).toThrow('Empty string');
    });

    test('rejects non-finite numbers', () => {
      expect(() => HugeDecimal.fromNumber(NaN)).toThrow();
    });
  });

  describe('Digit places', () => {
    const tops: Array<[string, number]> = [
      ['1000', 3],
      ['999.9', 2],
      ['0.0999', -2],
      ['0.1', -1],
      ['1', 0],
      ['0', 0],
      ['-45', 1],
    ];
    for (const [v, top] of tops) {
      test(`topDigit(${v}) = ${top}`, () => {
        expect(d(v).topDigit()).toBe(top);
      });
    }

    const bottoms: Array<[string, number]> = [
      ['1200', 0],
      ['1.25', -2],
      ['0.0999', -4],
      ['7', 0],
      ['0', 0],
    ];
    for (const [v, bottom] of bottoms) {
      test(`bottomDigit(${v}) = ${bottom}`, () => {
        expect(d(v).bottomDigit()).toBe(bottom);
      });
    }

    const binaries: Array<[string, number]> = [
      ['1024', 10],
      ['1023', 9],
      ['1', 0],
      ['3', 1],
      ['0.75', -1],
      ['0.5', -1],
      ['0.4999', -2],
      ['-8', 3],
    ];
    for (const [v, k] of binaries) {
      test(`topDigitBinary(${v}) = ${k}`, () => {
        expect(d(v).topDigitBinary()).toBe(k);
      });
    }
  });

  describe('Comparison', () => {
    test('orders by sign then magnitude', () => {
      expect(d('-1').lt(d('0.5'))).toBe(true);
      expect(d('100').gt(d('99.9'))).toBe(true);
      expect(d('-100').lt(d('-99.9'))).toBe(true);
      expect(d('0.1').eq(d('0.10'))).toBe(true);
      expect(d('2').cmp(d('2.000'))).toBe(0);
    });
  });

  describe('Scaling', () => {
    test('mulPow10', () => {
      expect(d('123').mulPow10(3n).toBigInt()).toBe(123000n);
      expect(d('123').mulPow10(-4n).toString()).toBe('0.0123');
    });

    test('mulPow2 is exact in both directions', () => {
      expect(HugeDecimal.fromBigInt(3n).mulPow2(-2).toString()).toBe('0.75');
      expect(d('0.75').mulPow2(2).eq(d('3'))).toBe(true);
      expect(HugeDecimal.ONE.mulPow2(-10).toString()).toBe('0.0009765625');
    });
  });

  describe('roundToPlace (ties to even)', () => {
    const cases: Array<[string, number, string]> = [
      ['2.5', 0, '2'],
      ['3.5', 0, '4'],
      ['-2.5', 0, '-2'],
      ['2.51', 0, '3'],
      ['0.125', -2, '0.12'],
      ['0.135', -2, '0.14'],
      ['1234', 2, '1200'],
      ['1250', 2, '1200'],
      ['999.96', -1, '1000'],
      ['0.4', 0, '0'],
      ['1.5', -3, '1.5'],
    ];
    for (const [v, place, out] of cases) {
      test(`${v} @ ${place} -> ${out}`, () => {
        expect(d(v).roundToPlace(place).toString()).toBe(out);
      });
    }
  });

  describe('toFixedAbs', () => {
    const cases: Array<[string, number, string]> = [
      ['1.5', 3, '1.500'],
      ['0.001234', 2, '0.00'],
      ['-12.345', 2, '12.34'],
      ['0.05', 2, '0.05'],
      ['1200', 0, '1200'],
      ['0', 1, '0.0'],
      ['9.96', 1, '10.0'],
    ];
    for (const [v, decimals, out] of cases) {
      test(`${v} with ${decimals} decimals -> ${out}`, () => {
        expect(d(v).toFixedAbs(decimals)).toBe(out);
      });
    }
  });

  describe('toStringExact', () => {
    test('plain for moderate magnitudes, scientific outside', () => {
      expect(d('1e21').toStringExact()).toBe('1e+21');
      expect(d('1.5e-8').toStringExact()).toBe('1.5e-8');
      expect(d('-0.00001').toStringExact()).toBe('-0.00001');
    });
  });
});

describe('NonFinite', () => {
  test('from number', () => {
    expect(NonFinite.fromNumber(NaN)).toBe(NonFinite.NAN);
    expect(NonFinite.fromNumber(-Infinity)).toBe(NonFinite.NEG_INF);
    expect(() => NonFinite.fromNumber(1)).toThrow();
  });

  test('abs and text', () => {
    expect(NonFinite.NEG_INF.abs()).toBe(NonFinite.INF);
    expect(NonFinite.NEG_INF.isNegative()).toBe(true);
    expect(NonFinite.NAN.toString()).toBe('nan');
  });

  test('isFiniteNumeric narrows', () => {
    expect(isFiniteNumeric(d('1'))).toBe(true);
    expect(isFiniteNumeric(NonFinite.INF)).toBe(false);
  });
});
