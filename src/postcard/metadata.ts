/**
 * @file Postcard metadata ribbon.
 *
 * Chooses the single ribbon a card shows, by precedence:
 * backing > project of the day > featured. Featured additionally needs a
 * parent category to name; without one there is no ribbon at all.
 *
 * @module postcard/metadata
 */

import { PostcardColor, type PostcardMetadataData, type Project } from '../core/models/types.js';
import { project_isFeaturedToday, project_isPotdToday } from '../core/models/project.js';
import type { PostcardStrings } from '../strings/types.js';

export type PostcardMetadataType =
    | { kind: 'backing' }
    | { kind: 'potd' }
    | { kind: 'featured'; rootCategory: string | null };

/**
 * Highest-precedence ribbon type that applies on `today`, if any.
 */
export function metadataType_select(project: Project, today: Date): PostcardMetadataType | null {
    if (project.personalization.isBacking === true) {
        return { kind: 'backing' };
    }
    if (project_isPotdToday(project, today)) {
        return { kind: 'potd' };
    }
    if (project_isFeaturedToday(project, today)) {
        return { kind: 'featured', rootCategory: project.category.parent?.name ?? null };
    }
    return null;
}

/**
 * Display data for one ribbon type.
 */
export function metadataType_data(type: PostcardMetadataType, strings: PostcardStrings): PostcardMetadataData | null {
    switch (type.kind) {
        case 'backing':
            return {
                iconImage: 'metadata-backing',
                labelText: strings.metadataBacker(),
                iconAndTextColor: PostcardColor.GREEN_700
            };
        case 'potd':
            return {
                iconImage: 'metadata-potd',
                labelText: strings.metadataProjectOfTheDay(),
                iconAndTextColor: PostcardColor.NAVY_700
            };
        case 'featured':
            if (type.rootCategory === null) return null;
            return {
                iconImage: 'metadata-featured',
                labelText: strings.metadataFeatured(type.rootCategory),
                iconAndTextColor: PostcardColor.NAVY_700
            };
    }
}

export function metadata_data(project: Project, today: Date, strings: PostcardStrings): PostcardMetadataData | null {
    const type: PostcardMetadataType | null = metadataType_select(project, today);
    return type ? metadataType_data(type, strings) : null;
}
