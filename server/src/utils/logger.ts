/**
 * Centralized logger using Pino
 * Structured logging for the web surface and the ledgers it drives
 */
import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';
import type { Request, Response, NextFunction } from 'express';

const isTest = process.env.NODE_ENV === 'test';
const isDev = process.env.NODE_ENV !== 'production' && !isTest;

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string | undefined): value is LevelWithSilent {
    return LEVELS.some((level) => level === value);
}

function resolveLevel(): LevelWithSilent {
    if (isTest) return 'silent';
    const configured = process.env.LOG_LEVEL;
    if (isLevel(configured)) return configured;
    return isDev ? 'debug' : 'info';
}

// Pretty output in development, JSON lines everywhere else
const logger: Logger = isDev
    ? pino({
        level: resolveLevel(),
        transport: {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        },
    })
    : pino({
        level: resolveLevel(),
        formatters: {
            level: (label: string) => ({ level: label }),
        },
    });

// Create child loggers for different modules
export const inventoryLogger: Logger = logger.child({ module: 'inventory' });
export const recipeLogger: Logger = logger.child({ module: 'recipes' });
export const productionLogger: Logger = logger.child({ module: 'production' });
export const httpLogger: Logger = logger.child({ module: 'http' });

// Export the base logger as default
export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.url,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            httpLogger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            httpLogger.warn(logData, 'Request warning');
        } else if (duration > 1000) {
            httpLogger.warn(logData, 'Slow request');
        } else {
            httpLogger.debug(logData, 'Request completed');
        }
    });

    next();
}
