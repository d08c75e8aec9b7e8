/**
 * @file Date sources and schedulers.
 *
 * Owns request pacing policy. Delay is opt-in through settings; fast mode
 * (`POSTCARD_FAST=true`) skips it entirely.
 *
 * @module env/clock
 */

import type { DateSource, Scheduler } from './types.js';

export function dateSource_system(): DateSource {
    return { today_get: (): Date => new Date() };
}

/**
 * Date source pinned to one instant.
 */
export function dateSource_fixed(date: Date): DateSource {
    const pinned: number = date.getTime();
    return { today_get: (): Date => new Date(pinned) };
}

/**
 * Check whether scheduled delays should be skipped.
 *
 * @returns True when POSTCARD_FAST=true.
 */
export function fastMode_check(): boolean {
    return process.env.POSTCARD_FAST === 'true';
}

/**
 * Timer-backed scheduler. Non-positive delays and fast mode resolve
 * without a timer.
 */
export function scheduler_timer(): Scheduler {
    return {
        async delay_wait(ms: number): Promise<void> {
            if (ms <= 0 || fastMode_check()) {
                return;
            }
            await new Promise<void>((resolve): void => {
                setTimeout(resolve, ms);
            });
        }
    };
}

/** Scheduler that never waits. */
export function scheduler_immediate(): Scheduler {
    return {
        async delay_wait(): Promise<void> {
            return;
        }
    };
}
