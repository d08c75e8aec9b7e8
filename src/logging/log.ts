/**
 * @file Scoped Logger
 *
 * Levelled console logging with chalk colouring. Each line reads
 * `[scope] LEVEL message`, coloured by level.
 *
 * @module logging/log
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/** Where formatted lines go. `console` satisfies it. */
export interface LogSink {
    debug(line: string): void;
    info(line: string): void;
    warn(line: string): void;
    error(line: string): void;
}

export interface Logger {
    debug(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

export interface LoggerOptions {
    level?: LogLevel;
    sink?: LogSink;
    /** Set false for plain text (tests, log files). */
    color?: boolean;
}

type EmittingLevel = Exclude<LogLevel, 'silent'>;

const RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100
};

/**
 * Narrow an arbitrary string to a log level.
 */
export function logLevel_check(value: string): value is LogLevel {
    return LOG_LEVELS.some((level: LogLevel): boolean => level === value);
}

/**
 * Create a logger for one component.
 *
 * @param scope - Prefix shown in brackets on every line.
 */
export function logger_create(scope: string, options: LoggerOptions = {}): Logger {
    const threshold: number = RANK[options.level ?? 'warn'];
    const sink: LogSink = options.sink ?? console;
    const paint: ChalkInstance = options.color === false ? new Chalk({ level: 0 }) : chalk;

    const line_format = (level: EmittingLevel, message: string): string => {
        const text: string = `[${scope}] ${level.toUpperCase()} ${message}`;
        switch (level) {
            case 'debug': return paint.gray(text);
            case 'info':  return paint.white(text);
            case 'warn':  return paint.yellow(text);
            case 'error': return paint.red(text);
        }
    };

    const write = (level: EmittingLevel, message: string): void => {
        if (RANK[level] < threshold) return;
        sink[level](line_format(level, message));
    };

    return {
        debug: (message: string): void => write('debug', message),
        info: (message: string): void => write('info', message),
        warn: (message: string): void => write('warn', message),
        error: (message: string): void => write('error', message)
    };
}

/** A logger that drops everything. */
export function logger_silent(): Logger {
    return logger_create('silent', { level: 'silent' });
}
