import { describe, expect, test } from 'vitest';
import { UsageError } from '../src/errors.js';
import {
	addCalendarDays,
	dayWindow,
	isWeekendDay,
	localHourToInstant,
	tileWindow,
	todayIn,
	weekdayLabel,
} from '../src/windows.js';
import { d, usageErrorCode } from './support.js';

const NEW_YORK = 'America/New_York';

describe('calendar days', () => {
	test('adds days across month and year ends', () => {
		expect(addCalendarDays('2024-01-31', 1)).toBe('2024-02-01');
		expect(addCalendarDays('2024-02-28', 1)).toBe('2024-02-29');
		expect(addCalendarDays('2024-12-31', 1)).toBe('2025-01-01');
		expect(addCalendarDays('2024-03-10', 1)).toBe('2024-03-11');
	});

	test('labels weekdays with two letters', () => {
		expect(weekdayLabel('2024-01-15')).toBe('Mo');
		expect(weekdayLabel('2024-01-18')).toBe('Th');
		expect(weekdayLabel('2024-01-21')).toBe('Su');
	});

	test('recognizes weekends', () => {
		expect(isWeekendDay('2024-01-13')).toBe(true);
		expect(isWeekendDay('2024-01-14')).toBe(true);
		expect(isWeekendDay('2024-01-15')).toBe(false);
	});

	test('rejects malformed days', () => {
		expect(() => addCalendarDays('01/15/2024', 1)).toThrow(UsageError);
		expect(() => weekdayLabel('2024-02-30')).toThrow(/not a valid date/);
	});

	test('reads today in the given timezone', () => {
		const now = d('2024-01-15T05:00:00Z');
		expect(todayIn(NEW_YORK, now)).toBe('2024-01-15');
		expect(todayIn('America/Los_Angeles', now)).toBe('2024-01-14');
	});
});

describe('localHourToInstant', () => {
	test('converts wall-clock hours in the zone', () => {
		expect(localHourToInstant('2024-01-15', 9, NEW_YORK)).toEqual(d('2024-01-15T14:00:00Z'));
		expect(localHourToInstant('2024-07-15', 9, NEW_YORK)).toEqual(d('2024-07-15T13:00:00Z'));
	});

	test('treats hour 24 as the next midnight', () => {
		expect(localHourToInstant('2024-01-15', 24, NEW_YORK)).toEqual(d('2024-01-16T05:00:00Z'));
	});
});

describe('dayWindow', () => {
	test('standard mode runs from 09:00 to the next midnight', () => {
		expect(dayWindow('2024-01-15', 'standard', { timezone: NEW_YORK })).toEqual({
			day: '2024-01-15',
			windowStart: d('2024-01-15T14:00:00Z'),
			windowEnd: d('2024-01-16T05:00:00Z'),
		});
	});

	test('professional mode runs from 09:00 to 17:00', () => {
		expect(dayWindow('2024-01-15', 'professional', { timezone: NEW_YORK })).toEqual({
			day: '2024-01-15',
			windowStart: d('2024-01-15T14:00:00Z'),
			windowEnd: d('2024-01-15T22:00:00Z'),
		});
	});

	test('uses configured work hours', () => {
		const window = dayWindow('2024-01-15', 'professional', {
			timezone: 'UTC',
			workHours: { start: 8, end: 12 },
		});
		expect(window.windowStart).toEqual(d('2024-01-15T08:00:00Z'));
		expect(window.windowEnd).toEqual(d('2024-01-15T12:00:00Z'));
	});

	test('still produces a window on weekends', () => {
		const window = dayWindow('2024-01-13', 'professional', { timezone: 'UTC' });
		expect(window.windowStart).toEqual(d('2024-01-13T09:00:00Z'));
	});

	test('follows the offset change on a DST day', () => {
		// Clocks spring forward at 02:00 on 2024-03-10; 09:00 is already EDT
		expect(dayWindow('2024-03-10', 'standard', { timezone: NEW_YORK })).toEqual({
			day: '2024-03-10',
			windowStart: d('2024-03-10T13:00:00Z'),
			windowEnd: d('2024-03-11T04:00:00Z'),
		});
	});

	test('rejects inverted work hours', () => {
		expect(
			usageErrorCode(() =>
				dayWindow('2024-01-15', 'professional', { timezone: 'UTC', workHours: { start: 17, end: 9 } }),
			),
		).toBe('INVALID_WORK_HOURS');
	});
});

describe('tileWindow', () => {
	const professional = dayWindow('2024-01-15', 'professional', { timezone: NEW_YORK });

	test('tiles 15-minute blocks by default', () => {
		const slots = tileWindow(professional);
		expect(slots).toHaveLength(32);
		expect(slots[0]).toEqual({ start: d('2024-01-15T14:00:00Z'), end: d('2024-01-15T14:15:00Z') });
		expect(slots[31]).toEqual({ start: d('2024-01-15T21:45:00Z'), end: d('2024-01-15T22:00:00Z') });
	});

	test('slots are consecutive and non-overlapping', () => {
		const slots = tileWindow(professional, 30);
		for (let i = 1; i < slots.length; i++) {
			expect(slots[i].start).toEqual(slots[i - 1].end);
		}
	});

	test('drops a trailing partial block', () => {
		const slots = tileWindow(professional, 25);
		expect(slots).toHaveLength(19);
		expect(slots[18].end).toEqual(d('2024-01-15T21:55:00Z'));
	});

	test('returns nothing for a window shorter than one block', () => {
		const window = {
			day: '2024-01-15',
			windowStart: d('2024-01-15T14:00:00Z'),
			windowEnd: d('2024-01-15T14:10:00Z'),
		};
		expect(tileWindow(window, 15)).toEqual([]);
	});

	test('covers the 15 hours of a standard DST day', () => {
		const window = dayWindow('2024-03-10', 'standard', { timezone: NEW_YORK });
		expect(tileWindow(window, 15)).toHaveLength(60);
	});

	test.each([0, -15, 7.5])('rejects a block size of %s', (blockMinutes) => {
		expect(usageErrorCode(() => tileWindow(professional, blockMinutes))).toBe('INVALID_BLOCK_SIZE');
	});
});
