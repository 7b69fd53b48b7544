// src/utils/errors.ts
import { ConfigFileError } from '../config/index.js';
import { ConfigError, FormatSpecParseError } from '../lib/format/errors.js';
import { NumericParseError } from '../lib/num/parse.js';

export type NormalizedError = {
  name: string;
  code: string;
  message: string;
  stack: string;
};

export function shortStack(err: unknown, lines = 3): string {
  const st = err instanceof Error && err.stack ? err.stack : '';
  if (!st) return '';
  return st.split('\n').slice(0, lines + 1).join('\n');
}

export function normalizeError(err: unknown): NormalizedError {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : 'unknown';
    return {
      name: err.name || 'Error',
      code,
      message: err.message || 'unknown',
      stack: err.stack || '',
    };
  }
  return {
    name: typeof err,
    code: 'unknown',
    message: String(err),
    stack: '',
  };
}

export type UserError = ConfigError | FormatSpecParseError | NumericParseError | ConfigFileError;

/** Errors caused by what the user typed or configured, as opposed to bugs */
export function isUserError(err: unknown): err is UserError {
  return err instanceof ConfigError
    || err instanceof FormatSpecParseError
    || err instanceof NumericParseError
    || err instanceof ConfigFileError;
}

export function formatUserError(err: unknown): string {
  const info = normalizeError(err);
  return `${info.name} [${info.code}]: ${info.message}`;
}
