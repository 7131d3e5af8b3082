/**
 * Structured logging utility.
 *
 * Emits JSON lines so a log shipper can pick out structured fields:
 *   level, timestamp, scope, message, plus whatever the caller adds.
 *
 * Usage:
 *   const log = createLogger('station');
 *   log.debug('Packet received', { hex: '24.9F (2)' });
 *   log.warn('Communication timeout', { silentMs: 121000 });
 *   const sub = log.child('rain');   // scope "station:rain"
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export interface StructuredLog {
    level: LogLevel;
    timestamp: string;
    scope: string;
    message: string;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, extra?: Record<string, unknown>): void;
    info(message: string, extra?: Record<string, unknown>): void;
    warn(message: string, extra?: Record<string, unknown>): void;
    error(message: string, extra?: Record<string, unknown>): void;
    child(subScope: string): Logger;
}

export type LogWriter = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
    DEBUG: 10,
    INFO: 20,
    WARN: 30,
    ERROR: 40
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
    if (typeof value !== 'string') return fallback;
    switch (value.trim().toUpperCase()) {
        case 'DEBUG': return 'DEBUG';
        case 'INFO': return 'INFO';
        case 'WARN':
        case 'WARNING': return 'WARN';
        case 'ERROR': return 'ERROR';
        default: return fallback;
    }
}

function defaultWriter(line: string): void {
    process.stdout.write(line + '\n');
}

export interface LoggerOptions {
    minLevel?: LogLevel;
    write?: LogWriter;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
    const minLevel = options.minLevel ?? 'INFO';
    const write = options.write ?? defaultWriter;

    function log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
        const entry: StructuredLog = {
            level,
            timestamp: new Date().toISOString(),
            scope,
            message,
            ...extra
        };
        write(JSON.stringify(entry));
    }

    return {
        debug: (msg, extra) => log('DEBUG', msg, extra),
        info: (msg, extra) => log('INFO', msg, extra),
        warn: (msg, extra) => log('WARN', msg, extra),
        error: (msg, extra) => log('ERROR', msg, extra),
        child: (subScope) => createLogger(`${scope}:${subScope}`, { minLevel, write })
    };
}
