export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface LogMeta {
    sessionId?: string;
    participant?: string;
    [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

let threshold: LogLevel = 'INFO';

/**
 * Entries below this level are dropped. Defaults to INFO.
 */
export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

/**
 * Structured logging utility. Emits one JSON line per entry.
 * WARN and ERROR go to stderr so they stand out in process logs.
 */
export function log(level: LogLevel, message: string, meta: LogMeta = {}): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const timestamp = new Date().toISOString();
    const payload = { timestamp, level, message, ...meta };

    if (level === 'ERROR' || level === 'WARN') {
        console.error(JSON.stringify(payload));
    } else {
        console.log(JSON.stringify(payload));
    }
}
