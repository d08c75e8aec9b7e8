/**
 * @file Core type definitions for the discovery postcard
 *
 * Defines the project entity consumed by the card, the users that appear
 * on it (the viewer and backer friends), and the small value types the
 * presenter hands to the hosting view.
 *
 * @module
 */

/**
 * Funding lifecycle of a project.
 */
export enum ProjectState {
    LIVE = 'live',
    SUCCESSFUL = 'successful',
    FAILED = 'failed',
    CANCELED = 'canceled',
    SUSPENDED = 'suspended',
    SUBMITTED = 'submitted',
    STARTED = 'started',
    PURGED = 'purged'
}

/**
 * A user as seen by the feed: the logged-in viewer or a backer friend.
 */
export interface User {
    id: number;
    name: string;
    avatar: {
        medium: string;
        small?: string;
    };
}

export interface Category {
    id: number;
    name: string;
    parent?: { id: number; name: string } | null;
}

/**
 * Viewer-specific facts attached to a project by the API.
 */
export interface Personalization {
    isBacking?: boolean;
    isStarred?: boolean;
    friends?: User[];
}

/**
 * Represents one project in the discovery feed.
 *
 * All dates are epoch seconds, UTC.
 */
export interface Project {
    id: number;
    name: string;
    blurb: string;
    state: ProjectState;
    stats: {
        backersCount: number;
        percentFunded: number;
        /** Raw funding ratio; may exceed 1 for overfunded projects. */
        fundingProgress: number;
    };
    dates: {
        deadline: number;
        stateChangedAt: number;
        launchedAt?: number;
        featuredAt?: number | null;
        potdAt?: number | null;
    };
    category: Category;
    photo: {
        full: string;
    };
    personalization: Personalization;
}

// ─── Presentation Values ────────────────────────────────────────────────────

/** Named colour tokens the view maps onto its palette. */
export enum PostcardColor {
    GREEN_700 = 'green-700',
    NAVY_700 = 'navy-700'
}

/**
 * Icon, label and colour shown in the metadata ribbon.
 */
export interface PostcardMetadataData {
    iconImage: string;
    labelText: string;
    iconAndTextColor: PostcardColor;
}

export interface TextRun {
    text: string;
    style: 'name' | 'blurb';
}

/** Styled text as an ordered list of runs. */
export type AttributedText = TextRun[];

/**
 * Payload handed to the host when the share button is tapped.
 */
export interface ShareContext {
    kind: 'discovery';
    project: Project;
}

/** Screen context reported alongside analytics events. */
export type AnalyticsContext = 'discovery';
