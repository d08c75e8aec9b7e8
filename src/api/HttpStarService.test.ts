/**
 * @file HttpStarService Unit Tests
 *
 * Exercises request shape, envelope validation and error classification
 * against a stubbed fetch. No network access.
 */

import { describe, it, expect, vi } from 'vitest';
import { HttpStarService } from './HttpStarService.js';
import { StarServiceError } from './StarService.js';
import { project_mock } from '../core/data/projects.js';

function json_respond(body: unknown, status: number = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'Content-Type': 'application/json' }
    });
}

function fetch_stub(respond: () => Response) {
    return vi.fn(async (_input: string, _init: RequestInit): Promise<Response> => respond());
}

async function error_capture(promise: Promise<unknown>): Promise<StarServiceError> {
    try {
        await promise;
    } catch (e: unknown) {
        if (e instanceof StarServiceError) return e;
        throw e;
    }
    throw new Error('expected a StarServiceError');
}

describe('HttpStarService', (): void => {
    const project = project_mock({ personalization: { isStarred: true } });

    it('PUTs to the toggle endpoint with the oauth token', async (): Promise<void> => {
        const fetchFn = fetch_stub((): Response => json_respond({ project }));
        const service = new HttpStarService({ baseUrl: 'https://api.example.test/', oauthToken: 'test-token', fetch: fetchFn });

        const envelope = await service.star_toggle(project);

        expect(envelope.project.personalization.isStarred).toBe(true);
        expect(fetchFn).toHaveBeenCalledWith('https://api.example.test/v1/projects/4242/star/toggle', {
            method: 'PUT',
            headers: { 'Accept': 'application/json', 'Authorization': 'token test-token' }
        });
    });

    it('omits the authorization header without a token', async (): Promise<void> => {
        const fetchFn = fetch_stub((): Response => json_respond({ project }));
        const service = new HttpStarService({ baseUrl: 'https://api.example.test', fetch: fetchFn });

        await service.star_toggle(project);

        expect(fetchFn.mock.calls[0][1].headers).toEqual({ 'Accept': 'application/json' });
    });

    it('classifies non-2xx responses as http errors', async (): Promise<void> => {
        const fetchFn = fetch_stub((): Response => json_respond({ error: 'nope' }, 401));
        const service = new HttpStarService({ baseUrl: 'https://api.example.test', fetch: fetchFn });

        const error = await error_capture(service.star_toggle(project));

        expect(error.code).toBe('http');
        expect(error.status).toBe(401);
        expect(error.message).toBe('Star request rejected with HTTP 401');
    });

    it('classifies fetch rejections as network errors', async (): Promise<void> => {
        const fetchFn = fetch_stub((): Response => {
            throw new Error('socket hang up');
        });
        const service = new HttpStarService({ baseUrl: 'https://api.example.test', fetch: fetchFn });

        const error = await error_capture(service.star_toggle(project));

        expect(error.code).toBe('network');
        expect(error.status).toBeNull();
        expect(error.message).toBe('Star request failed: socket hang up');
    });

    it('rejects malformed envelopes as decode errors', async (): Promise<void> => {
        const fetchFn = fetch_stub((): Response => json_respond({ project: { id: 'not-a-number' } }));
        const service = new HttpStarService({ baseUrl: 'https://api.example.test', fetch: fetchFn });

        const error = await error_capture(service.star_toggle(project));

        expect(error.code).toBe('decode');
        expect(error.message.startsWith('Malformed star response: project.id:')).toBe(true);
    });

    it('rejects non-JSON bodies as decode errors', async (): Promise<void> => {
        const fetchFn = fetch_stub((): Response => new Response('<html>', { status: 200 }));
        const service = new HttpStarService({ baseUrl: 'https://api.example.test', fetch: fetchFn });

        const error = await error_capture(service.star_toggle(project));

        expect(error.code).toBe('decode');
        expect(error.message).toBe('Star response was not JSON');
    });
});
