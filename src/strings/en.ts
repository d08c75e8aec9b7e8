/**
 * @file English postcard strings.
 *
 * Default `PostcardStrings` built on the platform `Intl` formatters.
 * Dates are rendered in UTC so output does not depend on the host zone.
 *
 * @module
 */

import type { AttributedText, Project } from '../core/models/types.js';
import type { DurationParts, PostcardStrings } from './types.js';

const SECONDS_PER_MINUTE: number = 60;
const SECONDS_PER_HOUR: number = 60 * 60;
const SECONDS_PER_DAY: number = 60 * 60 * 24;

/**
 * Countdown parts for the largest unit that still has more than one whole
 * step left; seconds otherwise.
 */
export function durationToGo_compute(deadlineSeconds: number, now: Date, integer: Intl.NumberFormat): DurationParts {
    const remaining: number = Math.max(0, Math.floor(deadlineSeconds - now.getTime() / 1000));
    const days: number = Math.floor(remaining / SECONDS_PER_DAY);
    const hours: number = Math.floor(remaining / SECONDS_PER_HOUR);
    const minutes: number = Math.floor(remaining / SECONDS_PER_MINUTE);

    if (days > 1) return [integer.format(days), 'days to go'];
    if (hours > 1) return [integer.format(hours), 'hours to go'];
    if (minutes > 1) return [integer.format(minutes), 'mins to go'];
    return [integer.format(remaining), 'secs to go'];
}

/**
 * Build the English string table.
 */
export function strings_en(): PostcardStrings {
    const integer: Intl.NumberFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
    const mediumDate: Intl.DateTimeFormat = new Intl.DateTimeFormat('en-US', {
        dateStyle: 'medium',
        timeZone: 'UTC'
    });

    return {
        backersCount_format: (count: number): string =>
            `${integer.format(count)}\n${count === 1 ? 'backer' : 'backers'}`,
        duration_format: (deadlineSeconds: number, now: Date): DurationParts =>
            durationToGo_compute(deadlineSeconds, now, integer),
        percentage_format: (percent: number): string => `${integer.format(percent)}%`,
        date_format: (seconds: number): string => mediumDate.format(new Date(seconds * 1000)),
        nameAndBlurb_format: (project: Project): AttributedText => [
            { text: `${project.name}: `, style: 'name' },
            { text: project.blurb, style: 'blurb' }
        ],

        projectCancelled: (): string => 'Project cancelled',
        fundingUnsuccessful: (): string => 'Funding unsuccessful',
        fundingSuccessful: (): string => 'Funding successful',
        fundingSuspended: (): string => 'Funding suspended',

        metadataBacker: (): string => "You're a backer",
        metadataProjectOfTheDay: (): string => 'Project of the Day',
        metadataFeatured: (categoryName: string): string => `Featured in ${categoryName}`,

        socialFriendIsBacker: (friendName: string): string => `${friendName} is a backer`,
        socialFriendsAreBackers: (friendName: string, secondFriendName: string): string =>
            `${friendName} and ${secondFriendName} are backers`,
        socialFriendsAndOthersAreBackers: (friendName: string, secondFriendName: string, remainingCount: number): string =>
            `${friendName}, ${secondFriendName}, and ${integer.format(remainingCount)} others are backers`
    };
}
