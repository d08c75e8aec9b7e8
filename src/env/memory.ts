/**
 * @file In-memory collaborators.
 *
 * Process-lifetime implementations of the cache, flag-store, session and
 * analytics contracts. They are the defaults `environment_create` uses
 * and the fakes tests assert against.
 *
 * @module
 */

import type { AnalyticsContext, Project, User } from '../core/models/types.js';
import type { AnalyticsSink, FlagStore, SessionProvider, StarredCache } from './types.js';

export class MemoryStarredCache implements StarredCache {
    private readonly byProject: Map<number, boolean> = new Map();

    starred_get(projectId: number): boolean | undefined {
        return this.byProject.get(projectId);
    }

    /**
     * Store a confirmed value. `undefined` forgets the entry.
     */
    starred_set(projectId: number, starred: boolean | undefined): void {
        if (starred === undefined) {
            this.byProject.delete(projectId);
            return;
        }
        this.byProject.set(projectId, starred);
    }

    get size(): number {
        return this.byProject.size;
    }
}

export class MemoryFlagStore implements FlagStore {
    private readonly flags: Map<string, boolean> = new Map();

    constructor(initial: Record<string, boolean> = {}) {
        for (const [key, value] of Object.entries(initial)) {
            this.flags.set(key, value);
        }
    }

    flag_get(key: string): boolean {
        return this.flags.get(key) ?? false;
    }

    flag_set(key: string, value: boolean): void {
        this.flags.set(key, value);
    }
}

/**
 * Session whose user is switched by hand (login/logout in tests and demos).
 */
export class MemorySession implements SessionProvider {
    constructor(private user: User | null = null) {}

    currentUser_get(): User | null {
        return this.user;
    }

    user_set(user: User | null): void {
        this.user = user;
    }
}

export interface TrackedStar {
    projectId: number;
    isStarred: boolean | undefined;
    context: AnalyticsContext;
}

/** Keeps every tracked event in order. */
export class RecordingAnalytics implements AnalyticsSink {
    readonly events: TrackedStar[] = [];

    projectStar_track(project: Project, context: AnalyticsContext): void {
        this.events.push({ projectId: project.id, isStarred: project.personalization.isStarred, context });
    }
}
