/**
 * @file Postcard Presenter
 *
 * Presentation logic for one discovery-feed project card. The hosting
 * view pushes events in through `PostcardInputs` and binds its labels,
 * images and visibility flags to the streams in `PostcardOutputs`.
 *
 * Everything is derived from a single "configured project" stream (the
 * last project passed to `configure`, with `isStarred` overridden from
 * the shared starred cache). The star button additionally follows the
 * merged stream of the star toggle pipeline.
 *
 * @module postcard/PostcardPresenter
 */

import type {
    AttributedText,
    PostcardColor,
    PostcardMetadataData,
    Project,
    ShareContext,
    User
} from '../core/models/types.js';
import { project_cached, project_endsIn48Hours } from '../core/models/project.js';
import { Pipe, Signal } from '../core/reactive/Signal.js';
import { HAS_SEEN_SAVE_PROJECT_ALERT, type PostcardEnvironment } from '../env/types.js';
import type { DurationParts } from '../strings/types.js';
import {
    accessibility_value,
    backers_split,
    deadline_parts,
    fundingProgressBar_hidden,
    fundingProgressContainer_hidden,
    metadata_hidden,
    percentFunded_text,
    progress_clamp,
    socialImage_url,
    socialLabel_text,
    socialStack_hidden,
    stateIcon_hidden,
    stateStack_hidden,
    stateSubtitle_text,
    stateTitle_color,
    stateTitle_text,
    url_parse
} from './fields.js';
import { metadata_data } from './metadata.js';
import { starToggle_build, type StarTogglePipeline } from './starToggle.js';
import type { PostcardInputs, PostcardOutputs } from './types.js';

/**
 * Users are the same session user when their ids match.
 */
function user_equals(a: User | null, b: User | null): boolean {
    if (a === null || b === null) return a === b;
    return a.id === b.id;
}

/**
 * One card's presenter, from configuration to disposal.
 */
export class PostcardPresenter implements PostcardInputs {
    readonly outputs: PostcardOutputs;

    private readonly projectInput: Pipe<Project> = new Pipe<Project>();
    private readonly shareTapInput: Pipe<void> = new Pipe<void>();
    private readonly starTapInput: Pipe<void> = new Pipe<void>();
    private readonly sessionStartedInput: Pipe<void> = new Pipe<void>();
    private readonly sessionEndedInput: Pipe<void> = new Pipe<void>();
    private readonly starToggle: StarTogglePipeline;

    /**
     * @param env - Shared collaborators; build with `environment_create`.
     */
    constructor(private readonly env: PostcardEnvironment) {
        const { strings, dateSource, starredCache, session } = env;
        const today_get = (): Date => dateSource.today_get();

        const configuredProject: Signal<Project> = this.projectInput
            .map((project: Project): Project => project_cached(project, starredCache.starred_get(project.id)));

        const currentUser: Signal<User | null> = Signal.merge(
            this.sessionStartedInput,
            this.sessionEndedInput,
            configuredProject.ignoreValues()
        )
            .map((): User | null => session.currentUser_get())
            .skipRepeats(user_equals);

        // ─── Stats ──────────────────────────────────────────────────────

        const backersTitleAndSubtitle: Signal<[string, string]> = configuredProject
            .map((p: Project): [string, string] => backers_split(strings.backersCount_format(p.stats.backersCount)));

        const deadlineTitleAndSubtitle: Signal<DurationParts> = configuredProject
            .map((p: Project): DurationParts => deadline_parts(p, strings, today_get()));

        // ─── Funding state ──────────────────────────────────────────────

        const projectStateStackViewHidden: Signal<boolean> = configuredProject
            .map(stateStack_hidden)
            .skipRepeats();

        const projectStateTitleLabelText: Signal<string> = configuredProject
            .map((p: Project): string => stateTitle_text(p, strings));

        // ─── Star toggle ────────────────────────────────────────────────

        this.starToggle = starToggle_build({
            configuredProject,
            currentUser,
            starTapped: this.starTapInput,
            sessionStarted: this.sessionStartedInput
        }, env);

        const project: Signal<Project> = this.starToggle.project;

        this.starToggle.projectStarred.observe((starred: Project): void => {
            try {
                env.analytics.projectStar_track(starred, 'discovery');
            } catch (error: unknown) {
                env.log.warn(`star analytics failed: ${error instanceof Error ? error.message : String(error)}`);
            }
        });

        const showSaveAlert: Signal<void> = project
            .takeWhen(this.starTapInput)
            .filter((p: Project): boolean =>
                p.personalization.isStarred === true && !project_endsIn48Hours(p, today_get())
            )
            .filter((): boolean => !this.saveAlert_seen())
            .on((): void => {
                env.ubiquitousStore.flag_set(HAS_SEEN_SAVE_PROJECT_ALERT, true);
                env.userDefaults.flag_set(HAS_SEEN_SAVE_PROJECT_ALERT, true);
                env.log.debug('save alert shown');
            })
            .ignoreValues();

        this.outputs = {
            backersTitleLabelText: backersTitleAndSubtitle.map(([title]: [string, string]): string => title),
            backersSubtitleLabelText: backersTitleAndSubtitle.map(([, subtitle]: [string, string]): string => subtitle),
            cellAccessibilityLabel: configuredProject.map((p: Project): string => p.name),
            cellAccessibilityValue: Signal.zip(configuredProject, projectStateTitleLabelText)
                .map(([p, state]: [Project, string]): string => accessibility_value(p, state)),
            deadlineTitleLabelText: deadlineTitleAndSubtitle.map(([title]: DurationParts): string => title),
            deadlineSubtitleLabelText: deadlineTitleAndSubtitle.map(([, subtitle]: DurationParts): string => subtitle),
            fundingProgressBarViewHidden: configuredProject.map(fundingProgressBar_hidden),
            fundingProgressContainerViewHidden: configuredProject.map(fundingProgressContainer_hidden),
            metadataData: configuredProject
                .map((p: Project): PostcardMetadataData | null => metadata_data(p, today_get(), strings))
                .skipNil(),
            metadataViewHidden: configuredProject
                .map((p: Project): boolean => metadata_hidden(p, today_get()))
                .skipRepeats(),
            percentFundedTitleLabelText: configuredProject.map((p: Project): string => percentFunded_text(p, strings)),
            progressPercentage: configuredProject.map((p: Project): number => progress_clamp(p.stats.fundingProgress)),
            projectImageURL: configuredProject.map((p: Project): URL | null => url_parse(p.photo.full)),
            projectNameAndBlurbLabelText: configuredProject
                .map((p: Project): AttributedText => strings.nameAndBlurb_format(p)),
            projectStateIconHidden: configuredProject.map(stateIcon_hidden),
            projectStateStackViewHidden,
            projectStateSubtitleLabelText: configuredProject.map((p: Project): string => stateSubtitle_text(p, strings)),
            projectStateTitleLabelColor: configuredProject
                .map((p: Project): PostcardColor => stateTitle_color(p))
                .skipRepeats(),
            projectStateTitleLabelText,
            projectStatsStackViewHidden: projectStateStackViewHidden.map((hidden: boolean): boolean => !hidden),
            socialImageURL: configuredProject.map(socialImage_url),
            socialLabelText: configuredProject.map((p: Project): string => socialLabel_text(p, strings)),
            socialStackViewHidden: configuredProject.map(socialStack_hidden).skipRepeats(),
            starButtonSelected: project
                .map((p: Project): boolean => p.personalization.isStarred === true)
                .skipRepeats(),

            shareButtonTapped: configuredProject
                .map((p: Project): ShareContext => ({ kind: 'discovery', project: p }))
                .takeWhen(this.shareTapInput),
            showSaveAlert,
            showLoginPrompt: this.starToggle.loginPromptRequested
        };
    }

    // ─── Inputs ─────────────────────────────────────────────────────────

    configure(project: Project): void {
        this.projectInput.send(project);
    }

    tapShare(): void {
        this.shareTapInput.send();
    }

    tapStar(): void {
        this.starTapInput.send();
    }

    sessionStarted(): void {
        this.sessionStartedInput.send();
    }

    sessionEnded(): void {
        this.sessionEndedInput.send();
    }

    /**
     * Detach all inputs. Later input calls are ignored. A toggle already in
     * flight still writes its result into the shared starred cache.
     */
    dispose(): void {
        this.projectInput.dispose();
        this.shareTapInput.dispose();
        this.starTapInput.dispose();
        this.sessionStartedInput.dispose();
        this.sessionEndedInput.dispose();
        this.starToggle.dispose();
    }

    private saveAlert_seen(): boolean {
        return this.env.ubiquitousStore.flag_get(HAS_SEEN_SAVE_PROJECT_ALERT)
            || this.env.userDefaults.flag_get(HAS_SEEN_SAVE_PROJECT_ALERT);
    }
}
