/**
 * Day windows and fixed-width slot tiling.
 */

import { addDays, format, isValid, isWeekend, parseISO } from 'date-fns';
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';
import { MINUTE_MS } from '@freeslots/core';
import { UsageError, assertPositiveInteger } from './errors.js';
import type {
	CalendarDate,
	CandidateSlot,
	DayWindow,
	DayWindowOptions,
	PlanMode,
	WorkHours,
} from './types.js';

export const DEFAULT_BLOCK_MINUTES = 15;

export const DEFAULT_WORK_HOURS: Readonly<WorkHours> = Object.freeze({ start: 9, end: 17 });

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses a YYYY-MM-DD string as a local calendar date.
 * Only used for date arithmetic; never read as an instant.
 */
function toCalendarDay(day: CalendarDate): Date {
	if (!CALENDAR_DATE_PATTERN.test(day)) {
		throw new UsageError('INVALID_DATE', `Day must be in YYYY-MM-DD format (got "${day}")`);
	}
	const parsed = parseISO(day);
	if (!isValid(parsed)) {
		throw new UsageError('INVALID_DATE', `Day is not a valid date: ${day}`);
	}
	return parsed;
}

export function addCalendarDays(day: CalendarDate, amount: number): CalendarDate {
	return format(addDays(toCalendarDay(day), amount), 'yyyy-MM-dd');
}

export function isWeekendDay(day: CalendarDate): boolean {
	return isWeekend(toCalendarDay(day));
}

/**
 * Two-letter weekday abbreviation ("Mo", "Tu", ...).
 */
export function weekdayLabel(day: CalendarDate): string {
	return format(toCalendarDay(day), 'EEEEEE');
}

/**
 * The calendar date of an instant in the given timezone.
 */
export function todayIn(timezone: string, now: Date = new Date()): CalendarDate {
	return formatInTimeZone(now, timezone, 'yyyy-MM-dd');
}

/**
 * Converts a local wall-clock hour on a day to an instant.
 * Hour 24 is midnight at the start of the following day.
 */
export function localHourToInstant(day: CalendarDate, hour: number, timezone: string): Date {
	if (hour === 24) {
		return localHourToInstant(addCalendarDays(day, 1), 0, timezone);
	}
	const hh = String(hour).padStart(2, '0');
	return fromZonedTime(`${day}T${hh}:00:00`, timezone);
}

export function assertWorkHours(workHours: WorkHours): void {
	const { start, end } = workHours;
	const inRange = (hour: number) => Number.isInteger(hour) && hour >= 0 && hour <= 24;
	if (!inRange(start) || !inRange(end) || start >= end) {
		throw new UsageError(
			'INVALID_WORK_HOURS',
			`Work hours must be whole hours with 0 <= start < end <= 24 (got ${start}-${end})`,
		);
	}
}

/**
 * Computes the eligible window of a day.
 *
 * - standard: [day start:00, next day 00:00)
 * - professional: [day start:00, day end:00)
 *
 * Weekend exclusion is the planner's job; a Saturday still gets a window here.
 *
 * @example
 * ```typescript
 * dayWindow('2024-01-15', 'professional', { timezone: 'America/New_York' });
 * // { day: '2024-01-15', windowStart: 2024-01-15T14:00:00Z, windowEnd: 2024-01-15T22:00:00Z }
 * ```
 */
export function dayWindow(day: CalendarDate, mode: PlanMode, options: DayWindowOptions): DayWindow {
	const workHours = options.workHours ?? DEFAULT_WORK_HOURS;
	assertWorkHours(workHours);

	const windowStart = localHourToInstant(day, workHours.start, options.timezone);
	const windowEnd =
		mode === 'professional'
			? localHourToInstant(day, workHours.end, options.timezone)
			: localHourToInstant(addCalendarDays(day, 1), 0, options.timezone);

	return { day, windowStart, windowEnd };
}

/**
 * Tiles a window into consecutive [t, t + block) slots starting at windowStart.
 * A trailing remainder shorter than one block is dropped.
 */
export function tileWindow(window: DayWindow, blockMinutes: number = DEFAULT_BLOCK_MINUTES): CandidateSlot[] {
	assertPositiveInteger(blockMinutes, 'INVALID_BLOCK_SIZE', 'Block size in minutes');

	const blockMs = blockMinutes * MINUTE_MS;
	const end = window.windowEnd.getTime();
	const slots: CandidateSlot[] = [];

	for (let cursor = window.windowStart.getTime(); cursor + blockMs <= end; cursor += blockMs) {
		slots.push({ start: new Date(cursor), end: new Date(cursor + blockMs) });
	}

	return slots;
}
