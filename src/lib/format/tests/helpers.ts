import { ConfigError, type ConfigErrorCode } from '../errors.js';

/** Code of the ConfigError thrown by `fn`, or undefined when it does not throw */
export function configErrorCode(fn: () => unknown): ConfigErrorCode | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.code;
    throw err;
  }
  return undefined;
}
