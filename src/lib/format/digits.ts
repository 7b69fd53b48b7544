import { isFiniteNumeric, type Numeric } from '../num/Huge.js';

// Non-finite values have no digit places; they report 0 like zero does.

export function topDigit(x: Numeric): number {
  return isFiniteNumeric(x) ? x.topDigit() : 0;
}

export function bottomDigit(x: Numeric): number {
  return isFiniteNumeric(x) ? x.bottomDigit() : 0;
}

export function topDigitBinary(x: Numeric): number {
  return isFiniteNumeric(x) ? x.topDigitBinary() : 0;
}
