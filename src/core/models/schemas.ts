/**
 * @file Project API Schemas
 *
 * Zod runtime schemas for payloads that arrive from the star API.
 *
 * Every response body is validated here before it reaches the presenter.
 * A malformed field produces a structured parse error instead of an
 * undefined surfacing later in a derived label.
 *
 * Usage:
 *   const result = StarEnvelopeSchema.safeParse(await response.json());
 *   if (!result.success) { ... reject with a decode error ... }
 *   const project: Project = result.data.project;
 *
 * @module core/models/schemas
 */

import { z } from 'zod';
import { ProjectState } from './types.js';

// ─── Shared ──────────────────────────────────────────────────────────────────

/** Epoch seconds. */
const TimestampSchema = z.number().finite();

export const UserSchema = z.object({
    id:     z.number().int(),
    name:   z.string(),
    avatar: z.object({
        medium: z.string(),
        small:  z.string().optional()
    })
});

export const CategorySchema = z.object({
    id:     z.number().int(),
    name:   z.string(),
    parent: z.object({ id: z.number().int(), name: z.string() }).nullable().optional()
});

// ─── Project ─────────────────────────────────────────────────────────────────

export const ProjectSchema = z.object({
    id:    z.number().int(),
    name:  z.string(),
    blurb: z.string(),
    state: z.nativeEnum(ProjectState),
    stats: z.object({
        backersCount:    z.number().int().nonnegative(),
        percentFunded:   z.number(),
        fundingProgress: z.number()
    }),
    dates: z.object({
        deadline:       TimestampSchema,
        stateChangedAt: TimestampSchema,
        launchedAt:     TimestampSchema.optional(),
        featuredAt:     TimestampSchema.nullable().optional(),
        potdAt:         TimestampSchema.nullable().optional()
    }),
    category: CategorySchema,
    photo: z.object({
        full: z.string()
    }),
    personalization: z.object({
        isBacking: z.boolean().optional(),
        isStarred: z.boolean().optional(),
        friends:   z.array(UserSchema).optional()
    })
});

/**
 * Body returned by the toggle-star endpoint.
 */
export const StarEnvelopeSchema = z.object({
    project: ProjectSchema,
    user:    UserSchema.optional()
});

export type StarEnvelope = z.infer<typeof StarEnvelopeSchema>;
