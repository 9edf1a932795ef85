import pino, { type Logger } from "pino";
import { isTestEnv } from "./util/env.js";

export type { Logger };

export type LogOptions = {
    level?: string;
    pretty?: boolean;
};

export function createLogger(opts: LogOptions = {}): Logger {
    const level = isTestEnv() ? "silent" : (opts.level || process.env.LOG_LEVEL || "info");
    const options: pino.LoggerOptions = {
        base: undefined,
        level,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    };
    if (!opts.pretty || isTestEnv()) return pino(options);
    const transport = pino.transport({
        target: "pino-pretty",
        options: {
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
            colorize: false,
            ignore: "pid,hostname",
        },
    });
    return pino(options, transport);
}

/** Logger that drops everything; for callers that were not handed one. */
export const silentLogger: Logger = pino({ level: "silent" });
