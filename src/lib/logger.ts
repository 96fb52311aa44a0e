/**
 * Prefixed logging utility
 *
 * - In development: All logs are visible
 * - In production (NODE_ENV=production): Only errors and warnings
 *
 * Usage:
 *   import { bakeLog } from '../lib/logger';
 *   bakeLog.debug('Sampled frames', frames.length);  // Silent in production
 *   bakeLog.warn('Warning');                         // Always visible
 */

const isDev = process.env.NODE_ENV !== 'production';

function formatMessage(prefix: string, message: string, timestamp: boolean): string {
    const ts = timestamp ? `[${new Date().toISOString()}] ` : '';
    return `${ts}[${prefix}] ${message}`;
}

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

function createLogger(prefix: string): Logger {
    return {
        debug(message, ...args) {
            if (isDev) {
                console.debug(formatMessage(prefix, message, false), ...args);
            }
        },

        info(message, ...args) {
            if (isDev) {
                console.info(formatMessage(prefix, message, false), ...args);
            }
        },

        warn(message, ...args) {
            console.warn(formatMessage(prefix, message, false), ...args);
        },

        error(message, ...args) {
            console.error(formatMessage(prefix, message, true), ...args);
        },
    };
}

// Pre-configured loggers for common modules
export const rigLog = createLogger('Armature');
export const evalLog = createLogger('Eval');
export const bakeLog = createLogger('Bake');
export const editLog = createLogger('Edit');
export const switchLog = createLogger('Switch');
export const opLog = createLogger('Operator');

export { createLogger };
