/**
 * @file Postcard Strings Contract
 *
 * Localized text and number/date formatting consumed by the presenter.
 * The presenter treats every method as a black box; swap the English
 * implementation for another locale without touching derivation logic.
 *
 * @module strings/types
 */

import type { AttributedText, Project } from '../core/models/types.js';

/** Value and unit of a countdown, e.g. `["12", "days to go"]`. */
export type DurationParts = [title: string, subtitle: string];

export interface PostcardStrings {
    // ─── Formatting ─────────────────────────────────────────────────────
    /** Composite "count, line break, noun", e.g. `"1,200\nbackers"`. */
    backersCount_format(count: number): string;
    duration_format(deadlineSeconds: number, now: Date): DurationParts;
    percentage_format(percent: number): string;
    /** Medium-style date for an epoch-seconds timestamp. */
    date_format(seconds: number): string;
    nameAndBlurb_format(project: Project): AttributedText;

    // ─── Funding State ──────────────────────────────────────────────────
    projectCancelled(): string;
    fundingUnsuccessful(): string;
    fundingSuccessful(): string;
    fundingSuspended(): string;

    // ─── Metadata Ribbon ────────────────────────────────────────────────
    metadataBacker(): string;
    metadataProjectOfTheDay(): string;
    metadataFeatured(categoryName: string): string;

    // ─── Social ─────────────────────────────────────────────────────────
    socialFriendIsBacker(friendName: string): string;
    socialFriendsAreBackers(friendName: string, secondFriendName: string): string;
    socialFriendsAndOthersAreBackers(friendName: string, secondFriendName: string, remainingCount: number): string;
}
