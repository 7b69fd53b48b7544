import chalk from 'chalk';
import dayjs from 'dayjs';

export type ConsoleSink = {
  log: (line: string) => void;
  error: (line: string) => void;
};

export type ConsoleLogger = {
  info: (msg: string, extra?: unknown) => void;
  warn: (msg: string, extra?: unknown) => void;
  error: (msg: string, err?: unknown) => void;
};

const ts = () => dayjs().format('YYYY-MM-DD HH:mm:ss');

// Option dumps may carry bigint inputs
const stringify = (value: unknown) =>
  JSON.stringify(value, (_, v: unknown) => (typeof v === 'bigint' ? v.toString() : v));

/**
 * Human-facing status lines for the CLI. Formatted numbers themselves are
 * printed bare; only diagnostics go through here.
 */
export function createConsoleLogger(sink: ConsoleSink = console, color = true): ConsoleLogger {
  const c = new chalk.Instance({ level: color ? chalk.level : 0 });

  return {
    info(msg, extra) {
      sink.error(`${c.gray(ts())} ${c.green('●')} ${c.bold.green(msg)}`);
      if (extra !== undefined) sink.error(c.dim(stringify(extra)));
    },
    warn(msg, extra) {
      sink.error(`${c.gray(ts())} ${c.yellow('▲')} ${c.bold.yellow(msg)}`);
      if (extra !== undefined) sink.error(c.yellow(stringify(extra)));
    },
    error(msg, err) {
      sink.error(`${c.gray(ts())} ${c.red('✖')} ${c.bold.bgRed.white(' ERROR ')} ${c.bold.red(msg)}`);
      if (err instanceof Error && err.cause !== undefined) {
        sink.error(c.red('• cause:'));
        sink.error(c.red(err.cause instanceof Error ? err.cause.message : stringify(err.cause)));
      }
    },
  };
}
