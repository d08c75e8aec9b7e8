/**
 * @file Postcard Environment Factory
 *
 * Assembles the dependency bundle handed to every postcard presenter.
 * The host builds one environment and shares it across cards; tests build
 * one per case with fakes swapped in.
 *
 * @module env/Environment
 */

import { PostcardSettingsService, type ResolvedPostcardSettings } from '../config/settings.js';
import { logger_create } from '../logging/log.js';
import { strings_en } from '../strings/en.js';
import { dateSource_system, scheduler_timer } from './clock.js';
import { MemoryFlagStore, MemorySession, MemoryStarredCache } from './memory.js';
import type { PostcardEnvironment } from './types.js';

export type EnvironmentOverrides =
    Partial<PostcardEnvironment> & Pick<PostcardEnvironment, 'starService'>;

/**
 * Build an environment. Anything not supplied gets an in-memory or
 * system default; settings resolve through `PostcardSettingsService`.
 *
 * @param overrides - Must at least name the star service.
 */
export function environment_create(overrides: EnvironmentOverrides): PostcardEnvironment {
    const settings: ResolvedPostcardSettings = overrides.settings ?? new PostcardSettingsService().snapshot();

    return {
        session: overrides.session ?? new MemorySession(),
        starService: overrides.starService,
        starredCache: overrides.starredCache ?? new MemoryStarredCache(),
        ubiquitousStore: overrides.ubiquitousStore ?? new MemoryFlagStore(),
        userDefaults: overrides.userDefaults ?? new MemoryFlagStore(),
        dateSource: overrides.dateSource ?? dateSource_system(),
        scheduler: overrides.scheduler ?? scheduler_timer(),
        strings: overrides.strings ?? strings_en(),
        analytics: overrides.analytics ?? { projectStar_track: (): void => {} },
        settings,
        log: overrides.log ?? logger_create('postcard', { level: settings.logLevel })
    };
}
