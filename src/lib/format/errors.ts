export type ConfigErrorCode =
  | 'invalid_option'
  | 'incompatible_exponent'
  | 'exponent_not_multiple'
  | 'identical_separators'
  | 'invalid_ndigits';

/**
 * Misconfigured formatting options. Raised synchronously where the bad
 * combination is first seen, never recovered internally.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly option?: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** A format spec string that does not match the FSML grammar */
export class FormatSpecParseError extends Error {
  readonly code = 'bad_format_spec' as const;

  constructor(public readonly spec: string) {
    super(`Invalid format specification: '${spec}'`);
    this.name = 'FormatSpecParseError';
  }
}
