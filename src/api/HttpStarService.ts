/**
 * @file HTTP Star Service
 *
 * Toggles a project star over the REST API and validates the response
 * envelope with zod before handing it back.
 *
 * @module
 */

import type { Project } from '../core/models/types.js';
import { StarEnvelopeSchema, type StarEnvelope } from '../core/models/schemas.js';
import { StarServiceError, type StarService } from './StarService.js';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpStarServiceConfig {
    baseUrl: string;
    oauthToken?: string;
    /** Injected for tests; defaults to the global fetch. */
    fetch?: FetchFn;
}

/**
 * Client for `PUT /v1/projects/:id/star/toggle`.
 */
export class HttpStarService implements StarService {
    private readonly baseUrl: string;
    private readonly oauthToken: string | undefined;
    private readonly fetchFn: FetchFn;

    /**
     * @param config - Base URL, optional OAuth token and fetch override.
     */
    constructor(config: HttpStarServiceConfig) {
        this.baseUrl = config.baseUrl.replace(/\/+$/, '');
        this.oauthToken = config.oauthToken;
        this.fetchFn = config.fetch ?? ((input: string, init: RequestInit): Promise<Response> => fetch(input, init));
    }

    async star_toggle(project: Project): Promise<StarEnvelope> {
        const headers: Record<string, string> = { 'Accept': 'application/json' };
        if (this.oauthToken) {
            headers['Authorization'] = `token ${this.oauthToken}`;
        }

        let response: Response;
        try {
            response = await this.fetchFn(this.url_build(project.id), { method: 'PUT', headers });
        } catch (e: unknown) {
            const detail: string = e instanceof Error ? e.message : String(e);
            throw new StarServiceError('network', `Star request failed: ${detail}`);
        }

        if (!response.ok) {
            throw new StarServiceError('http', `Star request rejected with HTTP ${response.status}`, response.status);
        }

        let body: unknown;
        try {
            body = await response.json();
        } catch (e: unknown) {
            throw new StarServiceError('decode', 'Star response was not JSON', response.status);
        }

        const parsed = StarEnvelopeSchema.safeParse(body);
        if (!parsed.success) {
            const issue: string = parsed.error.issues
                .map((i): string => `${i.path.join('.') || '(root)'}: ${i.message}`)
                .join('; ');
            throw new StarServiceError('decode', `Malformed star response: ${issue}`, response.status);
        }
        return parsed.data;
    }

    private url_build(projectId: number): string {
        return `${this.baseUrl}/v1/projects/${projectId}/star/toggle`;
    }
}
