import pino from 'pino';
import type { Logger } from 'pino';

export function createLogger(level: string): Logger {
    return pino({
        name: 'alicat',
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
    });
}

export const defaultLogger: Logger = createLogger(process.env.ALICAT_LOG_LEVEL || 'info');

export type { Logger };
