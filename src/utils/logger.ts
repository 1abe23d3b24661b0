import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Process-wide logger. Modules call `getLogger()` at the point they log,
 * never at import, so settings applied by `initLogger()` reach every line.
 */
let loggerInstance: pino.Logger | null = null;

export interface LoggerOptions {
    level?: LogLevel;
    jsonLogs?: boolean;

    /** JSON-mode sink; stdout when omitted */
    destination?: pino.DestinationStream;
}

function createLogger({ level = 'info', jsonLogs = false, destination }: LoggerOptions): pino.Logger {
    const base = { name: 'pokedex-etl' };

    if (jsonLogs) {
        return destination ? pino({ level, base }, destination) : pino({ level, base });
    }

    return pino({
        level,
        base,
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'HH:MM:ss',
                ignore: 'pid,hostname,name',
            },
        },
    });
}

/**
 * Replace the process logger. Called by the CLI once config is resolved.
 */
export function initLogger(options: LoggerOptions): pino.Logger {
    loggerInstance = createLogger(options);
    return loggerInstance;
}

/**
 * Current process logger; an info-level pretty logger until `initLogger()` runs.
 */
export function getLogger(): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = createLogger({});
    }
    return loggerInstance;
}
