/**
 * Console logger with a level filter.
 *
 * Output goes to console.log / console.error with an `[assistant]` prefix,
 * the same way the rest of the backend has always logged.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

const PREFIX = '[assistant]';

function initialLevel(): LogLevel {
    const raw = (process.env.LOG_LEVEL ?? '').trim().toLowerCase();
    if (raw === 'debug' || raw === 'info' || raw === 'warn' || raw === 'error' || raw === 'silent') {
        return raw;
    }
    return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
    currentLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLevel;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export const logger = {
    debug(message: string, ...args: unknown[]): void {
        if (enabled('debug')) console.log(`${PREFIX}[debug] ${message}`, ...args);
    },
    info(message: string, ...args: unknown[]): void {
        if (enabled('info')) console.log(`${PREFIX} ${message}`, ...args);
    },
    warn(message: string, ...args: unknown[]): void {
        if (enabled('warn')) console.error(`${PREFIX}[warn] ${message}`, ...args);
    },
    error(message: string, ...args: unknown[]): void {
        if (enabled('error')) console.error(`${PREFIX}[error] ${message}`, ...args);
    },
};
