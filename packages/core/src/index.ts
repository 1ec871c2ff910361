/**
 * freeslots core
 *
 * Shared time primitives for freeslots packages.
 * All intervals are half-open: [start, end)
 */

/**
 * A half-open interval [start, end).
 * Dates are absolute instants; the timezone of a computation is carried
 * separately as an IANA identifier.
 */
export interface Interval {
	start: Date;
	end: Date;
}

/**
 * A date range for querying time-bounded data.
 * Semantically identical to Interval.
 */
export interface DateRange {
	start: Date;
	end: Date;
}

/**
 * A calendar day in YYYY-MM-DD format, read in the computation's timezone.
 *
 * @example "2024-01-15"
 */
export type CalendarDate = string;

/**
 * Duration in milliseconds.
 */
export type DurationMs = number;

export const MINUTE_MS: DurationMs = 60 * 1000;
