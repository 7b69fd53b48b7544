import { toNumeric, type NumberInput } from '../num/parse.js';
import type { Numeric } from '../num/Huge.js';
import type { DefaultsRegistry } from './defaults.js';
import { Formatter } from './Formatter.js';
import type { FormattedNumber } from './output.js';

/**
 * A value, optionally with an uncertainty, that knows how to print itself.
 * Holds exact numbers only; do arithmetic on the inputs, not on this.
 */
export class SciNumber {
  readonly value: Numeric;
  readonly uncertainty: Numeric | undefined;

  constructor(value: NumberInput, uncertainty?: NumberInput) {
    this.value = toNumeric(value);
    this.uncertainty = uncertainty === undefined ? undefined : toNumeric(uncertainty);
  }

  /** Format with an FSML spec ('' for the registry defaults) */
  format(spec = '', registry?: DefaultsRegistry): FormattedNumber {
    return Formatter.fromFormatSpec(spec, registry).format(this.value, this.uncertainty);
  }

  toString(): string {
    return this.format().toString();
  }
}
