/**
 * @file Star Service Contract
 *
 * The one fallible remote operation a postcard performs: toggling the
 * viewer's star on a project.
 *
 * @module api/StarService
 */

import type { Project } from '../core/models/types.js';
import type { StarEnvelope } from '../core/models/schemas.js';

export interface StarService {
    /**
     * Ask the server to apply the project's (already flipped) starred
     * state. Resolves with the server's view of the project.
     *
     * @throws {StarServiceError} When the request fails or the body is malformed.
     */
    star_toggle(project: Project): Promise<StarEnvelope>;
}

export type StarServiceErrorCode = 'http' | 'network' | 'decode';

/**
 * Failure of a star request. `status` is set for HTTP errors only.
 */
export class StarServiceError extends Error {
    readonly code: StarServiceErrorCode;
    readonly status: number | null;

    constructor(code: StarServiceErrorCode, message: string, status: number | null = null) {
        super(message);
        this.name = 'StarServiceError';
        this.code = code;
        this.status = status;
    }
}
