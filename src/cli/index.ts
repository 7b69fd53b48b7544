#!/usr/bin/env node
import 'dotenv/config';
import { loadDefaultsRegistry } from '../config/index.js';
import { resolveRuntime } from '../config/runtime.js';
import { Formatter } from '../lib/format/Formatter.js';
import type { FormattedNumber } from '../lib/format/output.js';
import { logger } from '../log.js';
import { formatUserError, isUserError, normalizeError, shortStack } from '../utils/errors.js';
import { createConsoleLogger, type ConsoleSink } from '../utils/logger.js';

export const USAGE = 'Usage: sciprint <value> [uncertainty] [-f <spec>] [--latex|--html|--ascii] [--config <file>]';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;

export type OutputStyle = 'default' | 'latex' | 'html' | 'ascii';

export type CliArgs = {
  value: string;
  uncertainty?: string;
  spec?: string;
  style: OutputStyle;
  configFile?: string;
  help: boolean;
};

export class UsageError extends Error {
  readonly code = 'usage' as const;

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// "-5" and "-.5" are numbers, not flags
const looksNumeric = (a: string) => /^-(\d|\.\d|inf|nan)/i.test(a);

export function parseArgs(args: string[]): CliArgs {
  const positional: string[] = [];
  let spec: string | undefined;
  let style: OutputStyle = 'default';
  let configFile: string | undefined;
  let help = false;

  const takeValue = (flag: string, i: number) => {
    const v = args[i];
    if (v === undefined) throw new UsageError(`${flag} needs a value`);
    return v;
  };

  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === '--') { positional.push(...args.slice(i + 1)); break; }
    if (a === '-h' || a === '--help') help = true;
    else if (a === '-f' || a === '--format') spec = takeValue(a, ++i);
    else if (a === '--config') configFile = takeValue(a, ++i);
    else if (a === '--latex' || a === '--html' || a === '--ascii') {
      const next: OutputStyle = a === '--latex' ? 'latex' : a === '--html' ? 'html' : 'ascii';
      if (style !== 'default' && style !== next) throw new UsageError('Pick one of --latex, --html, --ascii');
      style = next;
    }
    else if (a.startsWith('-') && !looksNumeric(a)) throw new UsageError(`Unknown option ${a}`);
    else positional.push(a);
  }

  if (help) return { value: '', style, help };
  if (positional.length === 0) throw new UsageError('Missing value');
  if (positional.length > 2) throw new UsageError(`Unexpected argument ${positional[2]}`);

  return {
    value: positional[0],
    uncertainty: positional[1],
    spec,
    style,
    configFile,
    help,
  };
}

function render(result: FormattedNumber, style: OutputStyle): string {
  switch (style) {
    case 'default':
      return result.toString();
    case 'latex':
      return result.asLatex();
    case 'html':
      return result.asHtml();
    case 'ascii':
      return result.asAscii();
  }
}

/**
 * Run the CLI and return its exit code: 0 on success, 1 when the input or
 * configuration is rejected, 2 on bad usage.
 */
export function run(args: string[], sink: ConsoleSink = console): number {
  const out = createConsoleLogger(sink, resolveRuntime().color);

  let parsed: CliArgs;
  try {
    parsed = parseArgs(args);
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    out.error(err.message);
    sink.error(USAGE);
    return EXIT_USAGE;
  }

  if (parsed.help) {
    sink.log(USAGE);
    return EXIT_OK;
  }

  try {
    const registry = loadDefaultsRegistry(parsed.configFile);
    const formatter = parsed.spec !== undefined
      ? Formatter.fromFormatSpec(parsed.spec, registry)
      : new Formatter({}, registry);
    sink.log(render(formatter.format(parsed.value, parsed.uncertainty), parsed.style));
    return EXIT_OK;
  } catch (err) {
    if (!isUserError(err)) throw err;
    logger.debug({ error: normalizeError(err) }, 'cli input rejected');
    out.error(formatUserError(err), err);
    return EXIT_ERROR;
  }
}

if (require.main === module) {
  try {
    process.exitCode = run(process.argv.slice(2));
  } catch (err) {
    const info = normalizeError(err);
    logger.fatal({ error: info }, 'sciprint crashed');
    console.error(shortStack(err, 6) || info.message);
    process.exitCode = EXIT_ERROR;
  }
}
