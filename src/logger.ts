import { LogLevel } from './types';

const LOG_LEVELS = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
} as const;

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVELS;
}

export function parseLogLevel(raw: string | null | undefined, fallback: LogLevel = 'info'): LogLevel {
    if (!raw) return fallback;
    const level = raw.trim().toLowerCase();
    if (isLogLevel(level)) return level;
    console.warn(`[logger] Unknown log level "${raw}", defaulting to "${fallback}"`);
    return fallback;
}

/**
 * Leveled logger that writes through the console with a `Scope: ` prefix.
 */
export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
    const enabled = (wanted: LogLevel): boolean => LOG_LEVELS[wanted] >= LOG_LEVELS[level];

    return {
        debug(message, ...args) {
            if (enabled('debug')) console.debug(`${scope}: ${message}`, ...args);
        },
        info(message, ...args) {
            if (enabled('info')) console.info(`${scope}: ${message}`, ...args);
        },
        warn(message, ...args) {
            if (enabled('warn')) console.warn(`${scope}: ${message}`, ...args);
        },
        error(message, ...args) {
            if (enabled('error')) console.error(`${scope}: ${message}`, ...args);
        },
    };
}

/**
 * Masks a token or secret for log lines, keeping the first `keep` characters.
 */
export function maskToken(token: string | null | undefined, keep = 6): string {
    if (!token) return '<none>';
    if (token.length <= keep) return '*'.repeat(token.length);
    return token.slice(0, keep) + '…' + '*'.repeat(Math.max(0, token.length - keep - 1));
}

export function compactJson(value: unknown, limit = 1200): string {
    let text: string;
    try {
        text = JSON.stringify(value) ?? String(value);
    } catch {
        text = String(value);
    }
    return text.length <= limit ? text : text.slice(0, limit) + '…(truncated)';
}
