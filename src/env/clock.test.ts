import { describe, it, expect, vi, afterEach } from 'vitest';
import { dateSource_fixed, fastMode_check, scheduler_immediate, scheduler_timer } from './clock.js';
import { environment_create } from './Environment.js';
import { MockStarService } from '../api/MockStarService.js';
import { logger_silent } from '../logging/log.js';

afterEach((): void => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
});

describe('dateSource_fixed', (): void => {
    it('returns the pinned instant as a fresh Date each time', (): void => {
        const source = dateSource_fixed(new Date(Date.UTC(2026, 9, 18)));
        const first: Date = source.today_get();
        first.setUTCFullYear(1999);

        expect(source.today_get().toISOString()).toBe('2026-10-18T00:00:00.000Z');
    });
});

describe('scheduler_timer', (): void => {
    it('waits for the requested delay', async (): Promise<void> => {
        vi.useFakeTimers();
        let done: boolean = false;
        const waiting: Promise<void> = scheduler_timer().delay_wait(250).then((): void => {
            done = true;
        });

        await vi.advanceTimersByTimeAsync(249);
        expect(done).toBe(false);
        await vi.advanceTimersByTimeAsync(1);
        await waiting;
        expect(done).toBe(true);
    });

    it('skips the delay in fast mode', async (): Promise<void> => {
        vi.stubEnv('POSTCARD_FAST', 'true');
        expect(fastMode_check()).toBe(true);
        await expect(scheduler_timer().delay_wait(60_000)).resolves.toBeUndefined();
    });

    it('skips non-positive delays', async (): Promise<void> => {
        await expect(scheduler_timer().delay_wait(0)).resolves.toBeUndefined();
        await expect(scheduler_immediate().delay_wait(500)).resolves.toBeUndefined();
    });
});

describe('environment_create', (): void => {
    it('fills defaults around the supplied star service', (): void => {
        const starService = new MockStarService();
        const log = logger_silent();
        const env = environment_create({
            starService,
            settings: { apiDelay_ms: 0, revertOn: 'failure', logLevel: 'silent' },
            log
        });

        expect(env.starService).toBe(starService);
        expect(env.log).toBe(log);
        expect(env.session.currentUser_get()).toBeNull();
        expect(env.starredCache.starred_get(1)).toBeUndefined();
        expect(env.ubiquitousStore).not.toBe(env.userDefaults);
        expect(env.strings.percentage_format(12)).toBe('12%');
    });
});
