import { describe, expect, test } from 'vitest';
import { mergeIntervals } from '../src/intervals.js';
import { planDays, planDaysInRange } from '../src/planner.js';
import type { PlanInput } from '../src/types.js';
import { d, usageErrorCode } from './support.js';

const NEW_YORK = 'America/New_York';

function plan(overrides: Partial<PlanInput>) {
	return planDays({
		startDay: '2024-01-15',
		days: 1,
		mode: 'standard',
		busy: [],
		timezone: NEW_YORK,
		...overrides,
	});
}

describe('planDays', () => {
	test('a free standard day is one block from 09:00 to midnight', () => {
		const result = plan({});
		expect([...result.keys()]).toEqual(['2024-01-15']);
		expect(result.get('2024-01-15')).toEqual({
			day: '2024-01-15',
			label: 'Mo',
			free: [{ start: d('2024-01-15T14:00:00Z'), end: d('2024-01-16T05:00:00Z') }],
		});
	});

	test('a busy half hour splits the day in two', () => {
		const busy = mergeIntervals([{ start: d('2024-01-15T15:00:00Z'), end: d('2024-01-15T15:30:00Z') }]);
		expect(plan({ busy }).get('2024-01-15')?.free).toEqual([
			{ start: d('2024-01-15T14:00:00Z'), end: d('2024-01-15T15:00:00Z') },
			{ start: d('2024-01-15T15:30:00Z'), end: d('2024-01-16T05:00:00Z') },
		]);
	});

	test('professional mode leaves weekends out of the result', () => {
		const result = plan({ startDay: '2024-01-13', days: 7, mode: 'professional' });
		expect([...result.keys()]).toEqual(['2024-01-15', '2024-01-16', '2024-01-17', '2024-01-18', '2024-01-19']);
		expect(result.get('2024-01-19')?.free).toEqual([
			{ start: d('2024-01-19T14:00:00Z'), end: d('2024-01-19T22:00:00Z') },
		]);
	});

	test('standard mode keeps weekends', () => {
		const result = plan({ startDay: '2024-01-13', days: 3 });
		expect([...result.values()].map((entry) => entry.label)).toEqual(['Sa', 'Su', 'Mo']);
	});

	test('busy time spanning midnight affects both days', () => {
		const busy = [{ start: d('2024-01-16T03:00:00Z'), end: d('2024-01-16T15:00:00Z') }];
		const result = plan({ days: 2, busy });
		expect(result.get('2024-01-15')?.free).toEqual([
			{ start: d('2024-01-15T14:00:00Z'), end: d('2024-01-16T03:00:00Z') },
		]);
		expect(result.get('2024-01-16')?.free).toEqual([
			{ start: d('2024-01-16T15:00:00Z'), end: d('2024-01-17T05:00:00Z') },
		]);
	});

	test('unsorted, overlapping busy input is merged first', () => {
		const busy = [
			{ start: d('2024-01-15T18:00:00Z'), end: d('2024-01-15T19:00:00Z') },
			{ start: d('2024-01-15T15:00:00Z'), end: d('2024-01-15T16:00:00Z') },
			{ start: d('2024-01-15T15:30:00Z'), end: d('2024-01-15T16:30:00Z') },
		];
		expect(plan({ mode: 'professional', busy }).get('2024-01-15')?.free).toEqual([
			{ start: d('2024-01-15T14:00:00Z'), end: d('2024-01-15T15:00:00Z') },
			{ start: d('2024-01-15T16:30:00Z'), end: d('2024-01-15T18:00:00Z') },
			{ start: d('2024-01-15T19:00:00Z'), end: d('2024-01-15T22:00:00Z') },
		]);
	});

	test('fully booked days are omitted', () => {
		const busy = [{ start: d('2024-01-15T13:00:00Z'), end: d('2024-01-15T23:00:00Z') }];
		const result = plan({ mode: 'professional', days: 2, busy });
		expect([...result.keys()]).toEqual(['2024-01-16']);
	});

	test('fully booked days can be kept as empty entries', () => {
		const busy = [{ start: d('2024-01-15T13:00:00Z'), end: d('2024-01-15T23:00:00Z') }];
		const result = plan({ mode: 'professional', days: 2, busy, keepEmptyDays: true });
		expect(result.get('2024-01-15')).toEqual({ day: '2024-01-15', label: 'Mo', free: [] });
		expect(result.size).toBe(2);
	});

	test('uses the configured block size and work hours', () => {
		const busy = [{ start: d('2024-01-15T15:10:00Z'), end: d('2024-01-15T15:20:00Z') }];
		const result = plan({ mode: 'professional', busy, blockMinutes: 30, workHours: { start: 10, end: 12 } });
		expect(result.get('2024-01-15')?.free).toEqual([
			{ start: d('2024-01-15T15:30:00Z'), end: d('2024-01-15T17:00:00Z') },
		]);
	});

	test('planning twice gives identical output', () => {
		const busy = mergeIntervals([
			{ start: d('2024-01-15T16:00:00Z'), end: d('2024-01-15T17:00:00Z') },
			{ start: d('2024-01-17T20:00:00Z'), end: d('2024-01-17T21:15:00Z') },
		]);
		const input: PlanInput = {
			startDay: '2024-01-15',
			days: 5,
			mode: 'professional',
			busy,
			timezone: NEW_YORK,
		};
		expect(JSON.stringify([...planDays(input)])).toBe(JSON.stringify([...planDays(input)]));
	});

	test.each([0, -1, 2.5])('rejects %s days before planning', (days) => {
		expect(usageErrorCode(() => plan({ days }))).toBe('INVALID_DAYS');
	});

	test('rejects a zero block size', () => {
		expect(usageErrorCode(() => plan({ blockMinutes: 0 }))).toBe('INVALID_BLOCK_SIZE');
	});
});

describe('planDaysInRange', () => {
	test('counts calendar days, not business days', () => {
		expect(planDaysInRange('2024-01-19', 3, 'professional')).toEqual(['2024-01-19']);
	});

	test('crosses month boundaries', () => {
		expect(planDaysInRange('2024-01-30', 3, 'standard')).toEqual(['2024-01-30', '2024-01-31', '2024-02-01']);
	});
});
