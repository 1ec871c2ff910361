/**
 * Day planning: walks a date range and resolves each day's free time.
 */

import { assertPositiveInteger } from './errors.js';
import { clipToRange, mergeIntervals } from './intervals.js';
import { freeSlots } from './resolver.js';
import {
	DEFAULT_BLOCK_MINUTES,
	addCalendarDays,
	dayWindow,
	isWeekendDay,
	tileWindow,
	weekdayLabel,
} from './windows.js';
import type { AvailabilityResult, CalendarDate, PlanInput, PlanMode } from './types.js';

/**
 * Lists the days a plan covers: `days` consecutive calendar days from
 * `startDay`, minus weekends in professional mode.
 */
export function planDaysInRange(startDay: CalendarDate, days: number, mode: PlanMode): CalendarDate[] {
	assertPositiveInteger(days, 'INVALID_DAYS', 'Number of days');

	const result: CalendarDate[] = [];
	for (let offset = 0; offset < days; offset++) {
		const day = addCalendarDays(startDay, offset);
		if (mode === 'professional' && isWeekendDay(day)) {
			continue;
		}
		result.push(day);
	}
	return result;
}

/**
 * Computes the merged free intervals for each day of a range.
 *
 * Professional-mode weekends have no entry at all; they still count towards
 * `days`, which is a number of calendar days scanned. Days without any free
 * time are omitted unless `keepEmptyDays` is set. `busy` may arrive unsorted
 * and overlapping; it is merged before any day is resolved.
 *
 * @throws {UsageError} when `days` or `blockMinutes` is not a positive integer,
 * before any day is computed
 *
 * @example
 * ```typescript
 * const result = planDays({
 *   startDay: '2024-01-15',
 *   days: 1,
 *   mode: 'standard',
 *   busy: fetchedBusy,
 *   timezone: 'America/New_York',
 * });
 * result.get('2024-01-15')?.free;
 * ```
 */
export function planDays(input: PlanInput): AvailabilityResult {
	const { startDay, days, mode, busy, timezone, workHours, keepEmptyDays = false } = input;
	const blockMinutes = input.blockMinutes ?? DEFAULT_BLOCK_MINUTES;

	assertPositiveInteger(blockMinutes, 'INVALID_BLOCK_SIZE', 'Block size in minutes');
	const plannedDays = planDaysInRange(startDay, days, mode);
	const busySet = mergeIntervals(busy);

	const result: AvailabilityResult = new Map();

	for (const day of plannedDays) {
		const window = dayWindow(day, mode, { timezone, workHours });
		const dayBusy = clipToRange(busySet, { start: window.windowStart, end: window.windowEnd });

		const free = freeSlots(tileWindow(window, blockMinutes), dayBusy);

		if (free.length > 0 || keepEmptyDays) {
			result.set(day, { day, label: weekdayLabel(day), free });
		}
	}

	return result;
}
