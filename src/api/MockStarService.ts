/**
 * @file Mock Star Service.
 *
 * In-process stand-in for the star API. By default it confirms whatever
 * starred state it was asked to apply. Calls can be made to fail or be
 * held open so a caller can observe state while a request is in flight.
 *
 * @module
 */

import type { Project } from '../core/models/types.js';
import type { StarEnvelope } from '../core/models/schemas.js';
import { StarServiceError, type StarService } from './StarService.js';

interface HeldCall {
    project: Project;
    resolve: (envelope: StarEnvelope) => void;
    reject: (error: Error) => void;
}

type Mode = 'confirm' | 'fail' | 'hold';

export class MockStarService implements StarService {
    /** Every project passed to `star_toggle`, in call order. */
    readonly requests: Project[] = [];
    private readonly held: HeldCall[] = [];
    private queued: Mode[] = [];
    private mode: Mode = 'confirm';

    async star_toggle(project: Project): Promise<StarEnvelope> {
        this.requests.push(project);
        const mode: Mode = this.queued.shift() ?? this.mode;

        if (mode === 'fail') {
            throw new StarServiceError('http', 'Mock star request failed', 500);
        }
        if (mode === 'hold') {
            return new Promise<StarEnvelope>((resolve, reject): void => {
                this.held.push({ project, resolve, reject });
            });
        }
        return { project };
    }

    /** Fail only the next call. */
    failNext(): this {
        this.queued.push('fail');
        return this;
    }

    /** Fail every call from now on. */
    failAll(): this {
        this.mode = 'fail';
        return this;
    }

    /** Keep calls pending until `held_confirm` / `held_fail`. */
    hold(): this {
        this.mode = 'hold';
        return this;
    }

    get heldCount(): number {
        return this.held.length;
    }

    /**
     * Resolve the oldest held call. The server answer defaults to the
     * requested project.
     */
    held_confirm(answer?: Project): void {
        const call: HeldCall | undefined = this.held.shift();
        if (!call) throw new Error('No held star request to confirm');
        call.resolve({ project: answer ?? call.project });
    }

    /** Reject the oldest held call. */
    held_fail(): void {
        const call: HeldCall | undefined = this.held.shift();
        if (!call) throw new Error('No held star request to fail');
        call.reject(new StarServiceError('network', 'Mock star request dropped'));
    }
}
