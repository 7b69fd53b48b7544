import pino from "pino";
import { resolveRuntime } from "./config/runtime.js";

export function createLogger(runtime = resolveRuntime()) {
    return pino({
        base: undefined,
        level: runtime.logLevel,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
        /* stdout carries formatted numbers, so logs go to stderr */
        transport: runtime.pretty ? {
            target: "pino-pretty",
            options: {
                translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
                colorize: runtime.color,
                ignore: "pid,hostname",
                destination: 2,
            },
        } : undefined,
    });
}

export const logger = createLogger();
