/**
 * @file Environment Types
 *
 * Narrow contracts for every collaborator a postcard presenter consumes.
 * A single `PostcardEnvironment` bundle is built once by the host and
 * handed to each card, so shared state (the starred cache, the alert
 * flags) is shared by construction rather than through globals.
 *
 * @module env/types
 */

import type { AnalyticsContext, Project, User } from '../core/models/types.js';
import type { StarService } from '../api/StarService.js';
import type { PostcardStrings } from '../strings/types.js';
import type { ResolvedPostcardSettings } from '../config/settings.js';
import type { Logger } from '../logging/log.js';

/** Polled synchronously whenever the presenter needs the current user. */
export interface SessionProvider {
    currentUser_get(): User | null;
}

/**
 * Last confirmed starred flag per project id. Outlives individual cards.
 */
export interface StarredCache {
    starred_get(projectId: number): boolean | undefined;
    starred_set(projectId: number, starred: boolean | undefined): void;
}

/** Persisted boolean flags (cloud-synced or device-local). */
export interface FlagStore {
    flag_get(key: string): boolean;
    flag_set(key: string, value: boolean): void;
}

export interface DateSource {
    today_get(): Date;
}

/** Pacing hook for remote calls. */
export interface Scheduler {
    delay_wait(ms: number): Promise<void>;
}

/** Fire-and-forget analytics. */
export interface AnalyticsSink {
    projectStar_track(project: Project, context: AnalyticsContext): void;
}

/**
 * Everything a presenter reads from the outside world.
 */
export interface PostcardEnvironment {
    session: SessionProvider;
    starService: StarService;
    starredCache: StarredCache;
    /** Cloud-synced flag store. */
    ubiquitousStore: FlagStore;
    /** Device-local flag store. */
    userDefaults: FlagStore;
    dateSource: DateSource;
    scheduler: Scheduler;
    strings: PostcardStrings;
    analytics: AnalyticsSink;
    settings: ResolvedPostcardSettings;
    log: Logger;
}

/** Flag key shared by both stores. */
export const HAS_SEEN_SAVE_PROJECT_ALERT: string = 'hasSeenSaveProjectAlert';
