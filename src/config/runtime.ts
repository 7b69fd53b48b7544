import { isTestEnv } from '../util/env.js';

export const LOG_LEVELS = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export type Runtime = {
    test: boolean;
    logLevel: LogLevel;
    pretty: boolean;
    color: boolean;
    configPath?: string;
};

function isLogLevel(s: string): s is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(s);
}

export function resolveRuntime(env: NodeJS.ProcessEnv = process.env): Runtime {
    const test = isTestEnv(env);
    const requested = (env.LOG_LEVEL ?? '').trim().toLowerCase();
    /* tests stay quiet unless a level is asked for explicitly */
    const logLevel: LogLevel = isLogLevel(requested) ? requested : (test ? 'silent' : 'warn');
    const color = !env.NO_COLOR && env.FORCE_COLOR !== '0';
    const configPath = env.SCIPRINT_CONFIG?.trim() || undefined;

    return {
        test,
        logLevel,
        pretty: !test,
        color,
        configPath,
    };
}
