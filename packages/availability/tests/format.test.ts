import { describe, expect, test } from 'vitest';
import { NO_SLOTS_MESSAGE, formatAvailability } from '../src/format.js';
import { planDays } from '../src/planner.js';
import type { Interval } from '../src/types.js';
import { d } from './support.js';

const NEW_YORK = 'America/New_York';

function render(startDay: string, days: number, mode: 'standard' | 'professional', busy: Interval[] = []) {
	const result = planDays({ startDay, days, mode, busy, timezone: NEW_YORK });
	return formatAvailability({ startDay, days, mode, timezone: NEW_YORK, result });
}

describe('formatAvailability', () => {
	test('short ranges show the weekday and every free block', () => {
		const busy = [{ start: d('2024-01-15T15:00:00Z'), end: d('2024-01-15T15:30:00Z') }];
		expect(render('2024-01-15', 1, 'standard', busy)).toBe('Mo - 9:00 AM - 10:00 AM // 10:30 AM - 12:00 AM');
	});

	test('lists fully booked days as unavailable', () => {
		const busy = [{ start: d('2024-01-16T14:00:00Z'), end: d('2024-01-16T22:00:00Z') }];
		expect(render('2024-01-15', 2, 'professional', busy)).toBe(
			['Mo - 9:00 AM - 5:00 PM', 'Tu - No availability'].join('\n'),
		);
	});

	test('a week within one month adds the ordinal day', () => {
		expect(render('2024-01-15', 7, 'professional').split('\n')).toEqual([
			'Mo 15th - 9:00 AM - 5:00 PM',
			'Tu 16th - 9:00 AM - 5:00 PM',
			'We 17th - 9:00 AM - 5:00 PM',
			'Th 18th - 9:00 AM - 5:00 PM',
			'Fr 19th - 9:00 AM - 5:00 PM',
		]);
	});

	test('ordinal suffixes for the first days of a month', () => {
		const lines = render('2024-01-01', 7, 'professional').split('\n');
		expect(lines.slice(0, 3)).toEqual([
			'Mo 1st - 9:00 AM - 5:00 PM',
			'Tu 2nd - 9:00 AM - 5:00 PM',
			'We 3rd - 9:00 AM - 5:00 PM',
		]);
	});

	test('the 11th to the 13th take th', () => {
		expect(render('2024-03-11', 7, 'professional').split('\n')).toEqual([
			'Mo 11th - 9:00 AM - 5:00 PM',
			'Tu 12th - 9:00 AM - 5:00 PM',
			'We 13th - 9:00 AM - 5:00 PM',
			'Th 14th - 9:00 AM - 5:00 PM',
			'Fr 15th - 9:00 AM - 5:00 PM',
		]);
	});

	test('a range crossing a month leads with the month name', () => {
		expect(render('2024-01-29', 7, 'professional').split('\n')).toEqual([
			'January 29 Mo - 9:00 AM - 5:00 PM',
			'January 30 Tu - 9:00 AM - 5:00 PM',
			'January 31 We - 9:00 AM - 5:00 PM',
			'February 1 Th - 9:00 AM - 5:00 PM',
			'February 2 Fr - 9:00 AM - 5:00 PM',
		]);
	});

	test('reports when nothing is free at all', () => {
		const busy = [{ start: d('2024-01-15T00:00:00Z'), end: d('2024-01-17T00:00:00Z') }];
		expect(render('2024-01-15', 1, 'professional', busy)).toBe(NO_SLOTS_MESSAGE);
		expect(NO_SLOTS_MESSAGE).toBe('No available slots found.');
	});
});
