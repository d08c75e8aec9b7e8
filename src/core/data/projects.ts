/**
 * @file Mock Project Repository
 *
 * Sample feed projects and a builder for variants of them, for tests.
 *
 * @module
 */

import { ProjectState, type Project, type User } from '../models/types.js';

/** Sample backer friends. */
export const MOCK_FRIENDS: User[] = [
    { id: 101, name: 'Amy', avatar: { medium: 'https://img.example.test/avatars/amy.jpg' } },
    { id: 102, name: 'Bo', avatar: { medium: 'https://img.example.test/avatars/bo.jpg' } },
    { id: 103, name: 'Cy', avatar: { medium: 'https://img.example.test/avatars/cy.jpg' } },
    { id: 104, name: 'Dee', avatar: { medium: 'https://img.example.test/avatars/dee.jpg' } },
    { id: 105, name: 'Eli', avatar: { medium: 'https://img.example.test/avatars/eli.jpg' } }
];

/** 2026-10-18T00:00:00Z */
export const MOCK_TODAY_SECONDS: number = 1_792_281_600;

export const MOCK_PROJECT: Project = {
    id: 4242,
    name: 'Tiny Robot',
    blurb: 'A very small robot that sorts your screws',
    state: ProjectState.LIVE,
    stats: {
        backersCount: 1200,
        percentFunded: 45,
        fundingProgress: 0.45
    },
    dates: {
        deadline: MOCK_TODAY_SECONDS + 10 * 86_400,
        stateChangedAt: 1_700_000_000,
        launchedAt: MOCK_TODAY_SECONDS - 20 * 86_400,
        featuredAt: null,
        potdAt: null
    },
    category: {
        id: 16,
        name: 'Gadgets',
        parent: { id: 16_000, name: 'Technology' }
    },
    photo: {
        full: 'https://img.example.test/projects/4242/full.jpg'
    },
    personalization: {}
};

export interface ProjectOverrides {
    id?: number;
    name?: string;
    blurb?: string;
    state?: ProjectState;
    stats?: Partial<Project['stats']>;
    dates?: Partial<Project['dates']>;
    category?: Project['category'];
    photo?: Project['photo'];
    personalization?: Project['personalization'];
}

/**
 * Copy of `MOCK_PROJECT` with nested fields replaced.
 */
export function project_mock(overrides: ProjectOverrides = {}): Project {
    return {
        ...MOCK_PROJECT,
        ...overrides,
        stats: { ...MOCK_PROJECT.stats, ...overrides.stats },
        dates: { ...MOCK_PROJECT.dates, ...overrides.dates },
        category: overrides.category ?? MOCK_PROJECT.category,
        photo: overrides.photo ?? MOCK_PROJECT.photo,
        personalization: overrides.personalization ?? { ...MOCK_PROJECT.personalization }
    };
}
