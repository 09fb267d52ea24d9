import pino, { type Logger } from "pino";
import { isTestEnv } from "./util/env.js";

export type { Logger };

export function createLogger(opts: { level?: string; pretty?: boolean } = {}): Logger {
    const level = isTestEnv() ? "silent" : (opts.level ?? process.env.LOG_LEVEL ?? "info");
    const base = {
        base: undefined,
        level,
        formatters: {
            level: (label: string) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    };
    if (opts.pretty === false || isTestEnv()) return pino(base);
    const transport = pino.transport({
        target: "pino-pretty",
        options: {
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
            colorize: false,
            ignore: "pid,hostname",
            // stdout carries command output
            destination: 2,
        },
    });
    return pino(base, transport);
}

export const log = createLogger();
