import { describe, it, expect } from 'vitest';
import { PostcardSettingsService } from './settings.js';

function env_stub(values: Record<string, string>): (key: string) => string | undefined {
    return (key: string): string | undefined => values[key];
}

describe('PostcardSettingsService', (): void => {
    it('resolves defaults when no overrides exist', (): void => {
        const service = new PostcardSettingsService(env_stub({}));

        expect(service.snapshot()).toEqual({ apiDelay_ms: 0, revertOn: 'failure', logLevel: 'warn' });
        expect(service.source('apiDelay_ms')).toBe('default');
    });

    it('reads validated environment values', (): void => {
        const service = new PostcardSettingsService(env_stub({
            POSTCARD_API_DELAY_MS: '250',
            POSTCARD_REVERT_ON: 'success',
            POSTCARD_LOG_LEVEL: 'debug'
        }));

        expect(service.snapshot()).toEqual({ apiDelay_ms: 250, revertOn: 'success', logLevel: 'debug' });
        expect(service.source('revertOn')).toBe('env');
    });

    it('ignores invalid environment values', (): void => {
        const service = new PostcardSettingsService(env_stub({
            POSTCARD_API_DELAY_MS: 'soon',
            POSTCARD_REVERT_ON: 'always',
            POSTCARD_LOG_LEVEL: 'loud'
        }));

        expect(service.snapshot()).toEqual({ apiDelay_ms: 0, revertOn: 'failure', logLevel: 'warn' });
        expect(service.source('logLevel')).toBe('default');
    });

    it('clamps environment delays into bounds', (): void => {
        const service = new PostcardSettingsService(env_stub({ POSTCARD_API_DELAY_MS: '-40' }));
        expect(service.apiDelay_resolve()).toBe(0);
    });

    it('applies overrides ahead of the environment, with clamping', (): void => {
        const service = new PostcardSettingsService(env_stub({ POSTCARD_API_DELAY_MS: '250' }));
        const result = service.set('apiDelay_ms', 99_999);

        expect(result).toEqual({ ok: true, value: 10_000 });
        expect(service.apiDelay_resolve()).toBe(10_000);
        expect(service.source('apiDelay_ms')).toBe('override');
    });

    it('supports unsetting an override', (): void => {
        const service = new PostcardSettingsService(env_stub({ POSTCARD_REVERT_ON: 'success' }));
        service.set('revertOn', 'failure');
        expect(service.revertOn_resolve()).toBe('failure');

        service.unset('revertOn');
        expect(service.revertOn_resolve()).toBe('success');
        expect(service.overrides_get()).toEqual({});
    });

    it('rejects invalid override values', (): void => {
        const service = new PostcardSettingsService(env_stub({}));

        expect(service.set('apiDelay_ms', 'nope').ok).toBe(false);
        expect(service.set('revertOn', 'sometimes')).toEqual({
            ok: false,
            error: 'Invalid value for revertOn: sometimes (expected failure | success)'
        });
        expect(service.set('logLevel', 'trace').ok).toBe(false);
        expect(service.overrides_get()).toEqual({});
    });
});
