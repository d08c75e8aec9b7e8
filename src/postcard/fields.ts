/**
 * @file Postcard field derivations.
 *
 * Pure functions from a configured project to the strings, flags and
 * colours the card renders. Each is independent; the presenter maps its
 * configured-project stream through them one by one.
 *
 * @module
 */

import { PostcardColor, ProjectState, type Project, type User } from '../core/models/types.js';
import { project_isFeaturedToday, project_isPotdToday } from '../core/models/project.js';
import type { DurationParts, PostcardStrings } from '../strings/types.js';

const EMPTY_PAIR: DurationParts = ['', ''];

// ─── Stats ──────────────────────────────────────────────────────────────────

/**
 * Splits the localized "count, line break, noun" composite into title and
 * subtitle. Empty segments are skipped; a single segment fills both.
 */
export function backers_split(composite: string): [title: string, subtitle: string] {
    const parts: string[] = composite.split('\n').filter((part: string): boolean => part.length > 0);
    if (parts.length === 0) return ['', ''];
    return [parts[0], parts[parts.length - 1]];
}

export function deadline_parts(project: Project, strings: PostcardStrings, now: Date): DurationParts {
    if (project.state !== ProjectState.LIVE) return EMPTY_PAIR;
    return strings.duration_format(project.dates.deadline, now);
}

export function percentFunded_text(project: Project, strings: PostcardStrings): string {
    return project.state === ProjectState.LIVE ? strings.percentage_format(project.stats.percentFunded) : '';
}

/** Funding progress clamped to [0, 1]. Non-finite input maps to 0. */
export function progress_clamp(fundingProgress: number): number {
    if (!Number.isFinite(fundingProgress)) return fundingProgress === Infinity ? 1 : 0;
    return Math.min(1, Math.max(0, fundingProgress));
}

/**
 * Parse a URL string; anything unparsable yields `null`.
 */
export function url_parse(raw: string | null | undefined): URL | null {
    if (!raw) return null;
    try {
        return new URL(raw);
    } catch (e: unknown) {
        return null;
    }
}

// ─── Funding State ──────────────────────────────────────────────────────────

export function stateIcon_hidden(project: Project): boolean {
    return project.state !== ProjectState.SUCCESSFUL;
}

export function stateStack_hidden(project: Project): boolean {
    return project.state === ProjectState.LIVE;
}

export function stateSubtitle_text(project: Project, strings: PostcardStrings): string {
    return project.state === ProjectState.LIVE ? '' : strings.date_format(project.dates.stateChangedAt);
}

export function stateTitle_color(project: Project): PostcardColor {
    return project.state === ProjectState.SUCCESSFUL ? PostcardColor.GREEN_700 : PostcardColor.NAVY_700;
}

export function stateTitle_text(project: Project, strings: PostcardStrings): string {
    switch (project.state) {
        case ProjectState.CANCELED:   return strings.projectCancelled();
        case ProjectState.FAILED:     return strings.fundingUnsuccessful();
        case ProjectState.SUCCESSFUL: return strings.fundingSuccessful();
        case ProjectState.SUSPENDED:  return strings.fundingSuspended();
        case ProjectState.LIVE:
        case ProjectState.PURGED:
        case ProjectState.STARTED:
        case ProjectState.SUBMITTED:
            return '';
    }
}

export function fundingProgressBar_hidden(project: Project): boolean {
    return project.state === ProjectState.FAILED;
}

export function fundingProgressContainer_hidden(project: Project): boolean {
    return project.state === ProjectState.CANCELED || project.state === ProjectState.SUSPENDED;
}

// ─── Social ─────────────────────────────────────────────────────────────────

export function socialImage_url(project: Project): URL | null {
    const first: User | undefined = project.personalization.friends?.[0];
    return first ? url_parse(first.avatar.medium) : null;
}

/**
 * "Friends are backers" line. `null` when there are no friends.
 */
export function social_text(friends: User[], strings: PostcardStrings): string | null {
    if (friends.length === 1) {
        return strings.socialFriendIsBacker(friends[0].name);
    }
    if (friends.length === 2) {
        return strings.socialFriendsAreBackers(friends[0].name, friends[1].name);
    }
    if (friends.length > 2) {
        const remaining: number = Math.max(0, friends.length - 2);
        return strings.socialFriendsAndOthersAreBackers(friends[0].name, friends[1].name, remaining);
    }
    return null;
}

export function socialLabel_text(project: Project, strings: PostcardStrings): string {
    const friends: User[] | undefined = project.personalization.friends;
    return friends ? social_text(friends, strings) ?? '' : '';
}

export function socialStack_hidden(project: Project): boolean {
    return (project.personalization.friends?.length ?? 0) === 0;
}

// ─── Metadata & Accessibility ───────────────────────────────────────────────

/**
 * Hidden unless the viewer backs the project or it is POTD / featured today.
 */
export function metadata_hidden(project: Project, today: Date): boolean {
    return project.personalization.isBacking !== true
        && !project_isPotdToday(project, today)
        && !project_isFeaturedToday(project, today);
}

export function accessibility_value(project: Project, stateTitle: string): string {
    return `${project.blurb}. ${stateTitle}`;
}
