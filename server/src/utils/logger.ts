/**
 * Centralized logger using Pino
 *
 * Pretty output in development, JSON lines in production.
 * LOG_LEVEL overrides the default level ('silent' in tests).
 */
import pino from 'pino';
import type { Logger } from 'pino';
import { env } from '../config/env.js';

const isDev = env.NODE_ENV === 'development';

const logger: Logger = pino({
    level: env.LOG_LEVEL ?? (isDev ? 'debug' : 'info'),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
    transport: isDev && env.LOG_LEVEL !== 'silent'
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        }
        : undefined,
});

// Child loggers per module
export const sheetsLogger: Logger = logger.child({ module: 'sheets' });
export const syncLogger: Logger = logger.child({ module: 'sync' });
export const dbLogger: Logger = logger.child({ module: 'db' });
export const archiveLogger: Logger = logger.child({ module: 'archive' });

export default logger;
