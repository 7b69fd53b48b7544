import type { NumberInput } from '../num/parse.js';
import { globalDefaults, type DefaultsRegistry } from './defaults.js';
import { formatNumber } from './format.js';
import { parseFormatSpec } from './fsml.js';
import type { ResolvedOptions, UserOptions } from './options.js';
import type { FormattedNumber } from './output.js';

/**
 * Formats values and value/uncertainty pairs with a fixed set of options.
 *
 * Options are validated and resolved against the registry when the
 * Formatter is built; later registry changes do not affect it.
 *
 * @example
 * const f = new Formatter({ expMode: 'engineering', ndigits: 2, superscript: true });
 * f.format(12345.678, 3.4).toString(); // '(12.3457 ± 0.0034)×10³'
 */
export class Formatter {
  readonly userOptions: Readonly<UserOptions>;
  readonly resolvedOptions: ResolvedOptions;

  constructor(options: UserOptions = {}, registry: DefaultsRegistry = globalDefaults) {
    this.resolvedOptions = registry.resolve(options);
    this.userOptions = Object.freeze({ ...options });
  }

  static fromFormatSpec(spec: string, registry: DefaultsRegistry = globalDefaults): Formatter {
    return new Formatter(parseFormatSpec(spec), registry);
  }

  format(value: NumberInput, uncertainty?: NumberInput): FormattedNumber {
    return formatNumber(value, uncertainty, this.resolvedOptions);
  }
}
