import { describe, it, expect } from 'vitest';
import { strings_en } from './en.js';
import { project_mock } from '../core/data/projects.js';

const NOW: Date = new Date('2026-10-18T00:00:00Z');
const NOW_SECONDS: number = NOW.getTime() / 1000;

describe('strings_en', (): void => {
    const strings = strings_en();

    it('formats backer counts with grouping and a line break', (): void => {
        expect(strings.backersCount_format(1200)).toBe('1,200\nbackers');
        expect(strings.backersCount_format(1)).toBe('1\nbacker');
        expect(strings.backersCount_format(0)).toBe('0\nbackers');
    });

    it('picks the largest countdown unit with more than one step left', (): void => {
        expect(strings.duration_format(NOW_SECONDS + 5 * 86_400 + 30, NOW)).toEqual(['5', 'days to go']);
        expect(strings.duration_format(NOW_SECONDS + 36 * 3_600, NOW)).toEqual(['36', 'hours to go']);
        expect(strings.duration_format(NOW_SECONDS + 90 * 60, NOW)).toEqual(['90', 'mins to go']);
        expect(strings.duration_format(NOW_SECONDS + 45, NOW)).toEqual(['45', 'secs to go']);
    });

    it('floors an expired countdown at zero seconds', (): void => {
        expect(strings.duration_format(NOW_SECONDS - 100, NOW)).toEqual(['0', 'secs to go']);
    });

    it('formats percentages and medium UTC dates', (): void => {
        expect(strings.percentage_format(45)).toBe('45%');
        expect(strings.percentage_format(1234.4)).toBe('1,234%');
        expect(strings.date_format(1_700_000_000)).toBe('Nov 14, 2023');
    });

    it('builds name and blurb runs', (): void => {
        const project = project_mock({ name: 'Tiny Robot', blurb: 'A very small robot.' });

        expect(strings.nameAndBlurb_format(project)).toEqual([
            { text: 'Tiny Robot: ', style: 'name' },
            { text: 'A very small robot.', style: 'blurb' }
        ]);
    });

    it('pluralizes social messages', (): void => {
        expect(strings.socialFriendIsBacker('Amy')).toBe('Amy is a backer');
        expect(strings.socialFriendsAreBackers('Amy', 'Bo')).toBe('Amy and Bo are backers');
        expect(strings.socialFriendsAndOthersAreBackers('Amy', 'Bo', 2)).toBe('Amy, Bo, and 2 others are backers');
    });
});

