import pino from "pino";
import { resolveRuntime } from "./config/runtime.js";

export type Logger = pino.Logger;

export function createLogger(): Logger {
    const runtime = resolveRuntime();
    const options: pino.LoggerOptions = {
        base: undefined,
        level: process.env.LOG_LEVEL || runtime.logLevel,
        formatters: {
            level: (label) => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.epochTime,
    };
    if (!runtime.pretty) return pino(options);
    const transport = pino.transport({
        target: "pino-pretty",
        options: {
            translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
            colorize: false,
            ignore: "pid,hostname",
            destination: 2,
        },
    });
    return pino(options, transport);
}
