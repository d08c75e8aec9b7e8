import { describe, it, expect, vi } from 'vitest';
import { logger_create, logLevel_check, type LogSink } from './log.js';

function sink_create(): LogSink & { lines: string[] } {
    const lines: string[] = [];
    const push = (line: string): void => { lines.push(line); };
    return { lines, debug: push, info: push, warn: push, error: push };
}

describe('logger_create', (): void => {
    it('formats lines as [scope] LEVEL message', (): void => {
        const sink = sink_create();
        const log = logger_create('postcard', { level: 'debug', sink, color: false });

        log.debug('toggle requested');
        log.error('boom');

        expect(sink.lines).toEqual([
            '[postcard] DEBUG toggle requested',
            '[postcard] ERROR boom'
        ]);
    });

    it('drops lines below the configured level', (): void => {
        const sink = sink_create();
        const log = logger_create('postcard', { level: 'warn', sink, color: false });

        log.debug('a');
        log.info('b');
        log.warn('c');

        expect(sink.lines).toEqual(['[postcard] WARN c']);
    });

    it('silent drops everything', (): void => {
        const sink = sink_create();
        const log = logger_create('postcard', { level: 'silent', sink, color: false });

        log.error('nope');

        expect(sink.lines).toEqual([]);
    });

    it('routes each level to the matching sink method', (): void => {
        const sink: LogSink = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        const log = logger_create('x', { level: 'debug', sink, color: false });

        log.warn('w');

        expect(sink.warn).toHaveBeenCalledWith('[x] WARN w');
        expect(sink.error).not.toHaveBeenCalled();
    });

    it('defaults to the console sink', (): void => {
        const spy = vi.spyOn(console, 'error').mockImplementation((): void => {});
        logger_create('x', { color: false }).error('to console');

        expect(spy).toHaveBeenCalledWith('[x] ERROR to console');
        spy.mockRestore();
    });
});

describe('logLevel_check', (): void => {
    it('accepts known levels only', (): void => {
        expect(logLevel_check('info')).toBe(true);
        expect(logLevel_check('verbose')).toBe(false);
    });
});
