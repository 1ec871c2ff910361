/**
 * Plain-text rendering of planned availability.
 */

import { format, parseISO } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { planDaysInRange } from './planner.js';
import { weekdayLabel } from './windows.js';
import type { AvailabilityResult, CalendarDate, Interval, PlanMode } from './types.js';

export const NO_SLOTS_MESSAGE = 'No available slots found.';

export interface FormatInput {
	startDay: CalendarDate;
	/** Number of calendar days that were planned */
	days: number;
	mode: PlanMode;
	timezone: string;
	result: AvailabilityResult;
}

function formatInterval(interval: Interval, timezone: string): string {
	const start = formatInTimeZone(interval.start, timezone, 'h:mm a');
	const end = formatInTimeZone(interval.end, timezone, 'h:mm a');
	return `${start} - ${end}`;
}

function dayHeading(day: CalendarDate, days: number, crossMonth: boolean): string {
	const label = weekdayLabel(day);
	const date = parseISO(day);
	if (days < 7) {
		return label;
	}
	if (crossMonth) {
		return `${format(date, 'MMMM d')} ${label}`;
	}
	return `${label} ${format(date, 'do')}`;
}

/**
 * One line per planned day: `<day> - 9:00 AM - 10:00 AM // 10:30 AM - 12:00 AM`.
 *
 * Headings are the weekday alone for short ranges, `Mo 15th` for a week or
 * more within one month, and `January 31 We` once the range crosses a month.
 * Days without free time print "No availability".
 */
export function formatAvailability(input: FormatInput): string {
	const { startDay, days, mode, timezone, result } = input;

	const hasFreeTime = [...result.values()].some((entry) => entry.free.length > 0);
	if (!hasFreeTime) {
		return NO_SLOTS_MESSAGE;
	}

	const listed = planDaysInRange(startDay, days, mode);
	const startMonth = startDay.slice(0, 7);
	const crossMonth = listed.some((day) => day.slice(0, 7) !== startMonth);

	return listed
		.map((day) => {
			const heading = dayHeading(day, days, crossMonth);
			const free = result.get(day)?.free ?? [];
			if (free.length === 0) {
				return `${heading} - No availability`;
			}
			return `${heading} - ${free.map((interval) => formatInterval(interval, timezone)).join(' // ')}`;
		})
		.join('\n');
}
