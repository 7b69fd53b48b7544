/**
 * Exact decimal arithmetic for display formatting
 */

export {
  HugeDecimal,
  NonFinite,
  isFiniteNumeric,
} from './Huge.js';

export type { Numeric, NonFiniteKind } from './Huge.js';

export {
  toNumeric,
  NumericParseError,
} from './parse.js';

export type { NumberInput } from './parse.js';
