/**
 * @file Postcard Presenter Contract
 *
 * Inputs the hosting view calls and the output streams it binds to.
 * Every output is hot: attach observers before the first `configure`.
 *
 * @module postcard/types
 */

import type {
    AttributedText,
    PostcardColor,
    PostcardMetadataData,
    Project,
    ShareContext
} from '../core/models/types.js';
import type { Signal } from '../core/reactive/Signal.js';

export interface PostcardInputs {
    /** Call with the project the cell displays. */
    configure(project: Project): void;
    tapShare(): void;
    tapStar(): void;
    /** Call when a user session started notification arrives. */
    sessionStarted(): void;
    /** Call when a user session ended notification arrives. */
    sessionEnded(): void;
}

export interface PostcardOutputs {
    backersTitleLabelText: Signal<string>;
    backersSubtitleLabelText: Signal<string>;
    /** Read aloud by screen readers. */
    cellAccessibilityLabel: Signal<string>;
    cellAccessibilityValue: Signal<string>;
    deadlineTitleLabelText: Signal<string>;
    deadlineSubtitleLabelText: Signal<string>;
    fundingProgressBarViewHidden: Signal<boolean>;
    fundingProgressContainerViewHidden: Signal<boolean>;
    metadataData: Signal<PostcardMetadataData>;
    metadataViewHidden: Signal<boolean>;
    percentFundedTitleLabelText: Signal<string>;
    /** Between 0 and 1. */
    progressPercentage: Signal<number>;
    projectImageURL: Signal<URL | null>;
    projectNameAndBlurbLabelText: Signal<AttributedText>;
    projectStateIconHidden: Signal<boolean>;
    projectStateStackViewHidden: Signal<boolean>;
    projectStateSubtitleLabelText: Signal<string>;
    projectStateTitleLabelColor: Signal<PostcardColor>;
    projectStateTitleLabelText: Signal<string>;
    projectStatsStackViewHidden: Signal<boolean>;
    socialImageURL: Signal<URL | null>;
    socialLabelText: Signal<string>;
    socialStackViewHidden: Signal<boolean>;
    starButtonSelected: Signal<boolean>;

    // ─── Host notifications ─────────────────────────────────────────────
    shareButtonTapped: Signal<ShareContext>;
    showSaveAlert: Signal<void>;
    showLoginPrompt: Signal<void>;
}
