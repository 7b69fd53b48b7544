/**
 * sciprint: scientific number formatting
 */

export * from './lib/format/index.js';
export {
  HugeDecimal,
  NonFinite,
  toNumeric,
  NumericParseError,
} from './lib/num/index.js';
export type { Numeric, NumberInput } from './lib/num/index.js';
export { loadConfig, ConfigFileError } from './config/index.js';
