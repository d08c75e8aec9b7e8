import { describe, it, expect } from 'vitest';
import {
    project_cached,
    project_endsIn48Hours,
    project_isFeaturedToday,
    project_isPotdToday,
    project_toggleStarred
} from './project.js';
import { ProjectSchema, StarEnvelopeSchema } from './schemas.js';
import { MOCK_TODAY_SECONDS, project_mock } from '../data/projects.js';

const TODAY: Date = new Date((MOCK_TODAY_SECONDS + 15 * 3_600) * 1000); // 15:00 UTC

describe('calendar predicates', (): void => {
    it('matches POTD on the same UTC day only', (): void => {
        expect(project_isPotdToday(project_mock({ dates: { potdAt: MOCK_TODAY_SECONDS } }), TODAY)).toBe(true);
        expect(project_isPotdToday(project_mock({ dates: { potdAt: MOCK_TODAY_SECONDS + 86_399 } }), TODAY)).toBe(true);
        expect(project_isPotdToday(project_mock({ dates: { potdAt: MOCK_TODAY_SECONDS - 1 } }), TODAY)).toBe(false);
        expect(project_isPotdToday(project_mock({ dates: { potdAt: null } }), TODAY)).toBe(false);
    });

    it('matches featured on the same UTC day only', (): void => {
        expect(project_isFeaturedToday(project_mock({ dates: { featuredAt: MOCK_TODAY_SECONDS + 60 } }), TODAY)).toBe(true);
        expect(project_isFeaturedToday(project_mock({ dates: { featuredAt: MOCK_TODAY_SECONDS + 86_400 } }), TODAY)).toBe(false);
    });

    it('treats deadlines within 48 hours (or past) as ending soon', (): void => {
        const now: number = MOCK_TODAY_SECONDS + 15 * 3_600;
        expect(project_endsIn48Hours(project_mock({ dates: { deadline: now + 48 * 3_600 } }), TODAY)).toBe(true);
        expect(project_endsIn48Hours(project_mock({ dates: { deadline: now + 48 * 3_600 + 1 } }), TODAY)).toBe(false);
        expect(project_endsIn48Hours(project_mock({ dates: { deadline: now - 10 } }), TODAY)).toBe(true);
    });
});

describe('star transforms', (): void => {
    it('flips isStarred, treating absent as false', (): void => {
        expect(project_toggleStarred(project_mock()).personalization.isStarred).toBe(true);
        expect(project_toggleStarred(project_mock({ personalization: { isStarred: true } })).personalization.isStarred).toBe(false);
    });

    it('does not mutate the source project', (): void => {
        const source = project_mock({ personalization: { isStarred: false, isBacking: true } });
        const flipped = project_toggleStarred(source);

        expect(source.personalization.isStarred).toBe(false);
        expect(flipped.personalization).toEqual({ isStarred: true, isBacking: true });
    });

    it('overrides the server value only when a cached value exists', (): void => {
        const stale = project_mock({ personalization: { isStarred: false } });

        expect(project_cached(stale, true).personalization.isStarred).toBe(true);
        expect(project_cached(stale, undefined)).toBe(stale);
    });
});

describe('ProjectSchema', (): void => {
    it('accepts a well-formed project', (): void => {
        expect(ProjectSchema.safeParse(project_mock()).success).toBe(true);
    });

    it('rejects an unknown state', (): void => {
        const result = ProjectSchema.safeParse({ ...project_mock(), state: 'archived' });
        expect(result.success).toBe(false);
    });

    it('accepts an envelope without a user', (): void => {
        const result = StarEnvelopeSchema.safeParse({ project: project_mock() });
        expect(result.success).toBe(true);
    });
});
