/**
 * @file Star Toggle Pipeline
 *
 * Optimistic star/unstar for one card:
 *   1. A tap while logged out asks the host for a login prompt and arms a
 *      single retry on the next session start.
 *   2. A logged-in (or retried) tap flips `isStarred` on the accumulated
 *      project immediately and issues the remote toggle.
 *   3. A confirmed response is written to the starred cache and becomes
 *      the displayed state.
 *   4. The revert path flips the accumulated project back. Which outcome
 *      drives it is chosen by `settings.revertOn`:
 *        - 'failure' rolls back a rejected toggle. Reverted and confirmed
 *          projects both reset the accumulator, so it tracks the display;
 *        - 'success' keeps the legacy wiring, where a confirmed toggle
 *          also emits a flipped-back project just before the server value.
 *
 * Remote calls are never cancelled. Two quick taps issue two requests and
 * both outcomes land, in whatever order they settle.
 *
 * @module postcard/starToggle
 */

import type { Project, User } from '../core/models/types.js';
import { project_toggleStarred } from '../core/models/project.js';
import {
    Pipe,
    Signal,
    materialized_failures,
    materialized_values,
    type Materialized
} from '../core/reactive/Signal.js';
import type { PostcardEnvironment } from '../env/types.js';

export interface StarToggleSources {
    configuredProject: Signal<Project>;
    currentUser: Signal<User | null>;
    starTapped: Signal<void>;
    sessionStarted: Signal<void>;
}

export interface StarTogglePipeline {
    /** Fires for every tap made while logged out. */
    loginPromptRequested: Signal<void>;
    /** Optimistically flipped project, once per accepted tap. */
    projectOnStarToggle: Signal<Project>;
    /** Server-confirmed project, after the cache write. */
    projectStarred: Signal<Project>;
    starFailed: Signal<Error>;
    revertStarToggle: Signal<Project>;
    /** Configured, optimistic, confirmed and reverted projects, merged. */
    project: Signal<Project>;
    dispose(): void;
}

type AccumulatorStep =
    | { kind: 'toggle'; configured: Project }
    | { kind: 'reset'; project: Project };

interface Accumulated {
    project: Project;
    origin: AccumulatorStep['kind'];
}

/**
 * Wire the toggle pipeline onto a presenter's sources.
 */
export function starToggle_build(
    sources: StarToggleSources,
    env: Pick<PostcardEnvironment, 'starService' | 'starredCache' | 'scheduler' | 'settings' | 'log'>
): StarTogglePipeline {
    const { starService, starredCache, scheduler, settings, log } = env;

    // ─── Taps ───────────────────────────────────────────────────────────

    const tappedUser: Signal<User | null> = sources.currentUser.takeWhen(sources.starTapped);

    const loggedOutTap: Signal<void> = tappedUser
        .filter((user: User | null): boolean => user === null)
        .ignoreValues();

    const loggedInTap: Signal<void> = tappedUser
        .filter((user: User | null): boolean => user !== null)
        .ignoreValues();

    const loginAfterTap: Signal<void> = loggedOutTap
        .flatMapLatest((): Signal<void> => sources.sessionStarted.take(1));

    // ─── Optimistic accumulator ─────────────────────────────────────────

    const accumulatorReset: Pipe<Project> = new Pipe<Project>();

    const accumulated: Signal<Accumulated> = Signal.merge<AccumulatorStep>(
        sources.configuredProject
            .takeWhen(Signal.merge(loggedInTap, loginAfterTap))
            .map((configured: Project): AccumulatorStep => ({ kind: 'toggle', configured })),
        accumulatorReset
            .map((project: Project): AccumulatorStep => ({ kind: 'reset', project }))
    )
        .scan<Accumulated | null>(null, (previous: Accumulated | null, step: AccumulatorStep): Accumulated =>
            step.kind === 'toggle'
                ? { project: project_toggleStarred(accumulated_base(previous, step.configured)), origin: 'toggle' }
                : { project: step.project, origin: 'reset' }
        )
        .skipNil();

    const accumulatedProject: Signal<Project> = accumulated.map((a: Accumulated): Project => a.project);

    const projectOnStarToggle: Signal<Project> = accumulated
        .filter((a: Accumulated): boolean => a.origin === 'toggle')
        .map((a: Accumulated): Project => a.project);

    // ─── Remote round trip ──────────────────────────────────────────────

    const starProjectEvent: Signal<Materialized<Project>> = projectOnStarToggle
        .flatMapMaterialized(
            async (project: Project): Promise<Project> => {
                log.debug(`star toggle requested: project ${project.id} → ${starred_describe(project)}`);
                await scheduler.delay_wait(settings.apiDelay_ms);
                const envelope = await starService.star_toggle(project);
                return envelope.project;
            },
            (error: Error): void => {
                log.error(`star toggle delivery failed: ${error.message}`);
            }
        );

    const projectStarred: Signal<Project> = materialized_values(starProjectEvent)
        .on((project: Project): void => {
            starredCache.starred_set(project.id, project.personalization.isStarred);
            log.info(`star toggle confirmed: project ${project.id} → ${starred_describe(project)}`);
        });

    const starFailed: Signal<Error> = materialized_failures(starProjectEvent)
        .on((error: Error): void => {
            log.warn(`star toggle failed, reverting: ${error.message}`);
        });

    // ─── Revert ─────────────────────────────────────────────────────────

    const revertTrigger: Signal<unknown> = settings.revertOn === 'success' ? projectStarred : starFailed;

    const revertStarToggle: Signal<Project> = accumulatedProject
        .takeWhen(revertTrigger)
        .map(project_toggleStarred);

    if (settings.revertOn === 'failure') {
        revertStarToggle.observe((project: Project): void => accumulatorReset.send(project));
        projectStarred.observe((project: Project): void => accumulatorReset.send(project));
    }

    const project: Signal<Project> = Signal.merge(
        sources.configuredProject,
        projectOnStarToggle,
        projectStarred,
        revertStarToggle
    );

    return {
        loginPromptRequested: loggedOutTap,
        projectOnStarToggle,
        projectStarred,
        starFailed,
        revertStarToggle,
        project,
        dispose: (): void => accumulatorReset.dispose()
    };
}

/**
 * The project a toggle flips: the accumulated one while the card still
 * shows the same project, otherwise the freshly configured one.
 */
function accumulated_base(previous: Accumulated | null, configured: Project): Project {
    return previous !== null && previous.project.id === configured.id ? previous.project : configured;
}

function starred_describe(project: Project): string {
    return project.personalization.isStarred === true ? 'starred' : 'unstarred';
}
