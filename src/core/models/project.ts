/**
 * @file Project predicates and transforms
 *
 * Pure helpers over the `Project` entity: calendar predicates evaluated
 * against an injected "today", the star flip used by the optimistic
 * toggle, and the starred-override merge.
 *
 * @module
 */

import type { Project } from './types.js';

const SECONDS_PER_DAY: number = 60 * 60 * 24;
const FORTY_EIGHT_HOURS: number = 60 * 60 * 48;

/**
 * Day index (days since epoch, UTC) of a timestamp in seconds.
 */
function utcDay_index(seconds: number): number {
    return Math.floor(seconds / SECONDS_PER_DAY);
}

function dateSeconds_get(date: Date): number {
    return date.getTime() / 1000;
}

function sameUtcDay_check(seconds: number | null | undefined, today: Date): boolean {
    if (seconds === null || seconds === undefined) return false;
    return utcDay_index(seconds) === utcDay_index(dateSeconds_get(today));
}

/**
 * True when the project was Project of the Day on `today`'s UTC date.
 */
export function project_isPotdToday(project: Project, today: Date): boolean {
    return sameUtcDay_check(project.dates.potdAt, today);
}

/**
 * True when the project was featured on `today`'s UTC date.
 */
export function project_isFeaturedToday(project: Project, today: Date): boolean {
    return sameUtcDay_check(project.dates.featuredAt, today);
}

/**
 * True when the deadline is at most 48 hours after `today`.
 * Already-ended projects count as ending within 48 hours.
 */
export function project_endsIn48Hours(project: Project, today: Date): boolean {
    return project.dates.deadline - dateSeconds_get(today) <= FORTY_EIGHT_HOURS;
}

/**
 * Returns a copy of the project with `isStarred` flipped.
 * An absent flag counts as not starred.
 */
export function project_toggleStarred(project: Project): Project {
    return project_withStarred(project, !(project.personalization.isStarred ?? false));
}

/**
 * Returns a copy of the project with `isStarred` replaced.
 */
export function project_withStarred(project: Project, isStarred: boolean | undefined): Project {
    return {
        ...project,
        personalization: { ...project.personalization, isStarred }
    };
}

/**
 * Overrides a (possibly stale) server `isStarred` with a locally cached value.
 *
 * @param project - Project as delivered by the feed.
 * @param cachedStarred - Last confirmed value for this project id, if any.
 */
export function project_cached(project: Project, cachedStarred: boolean | undefined): Project {
    if (cachedStarred === undefined) return project;
    return project_withStarred(project, cachedStarred);
}
