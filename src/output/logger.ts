/**
 * Logger utility for the evidence engine
 *
 * Console output functions with a level threshold. Silent mode exists for
 * machine-readable CLI output (json), where stdout must carry ONLY the
 * structured data.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const PREFIX = '[evidence]';

const RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 50,
};

let threshold: LogLevel = 'info';
let silentMode = false;

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

/**
 * Enable or disable silent mode.
 * When enabled, debug(), log() and warn() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

function enabled(level: LogLevel): boolean {
    return !silentMode && RANK[level] >= RANK[threshold];
}

export function debug(...args: unknown[]): void {
    if (enabled('debug')) {
        console.error(PREFIX, ...args);
    }
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
    if (enabled('info')) {
        console.log(PREFIX, ...args);
    }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
    if (enabled('warn')) {
        console.warn(PREFIX, ...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(PREFIX, ...args);
}
