/**
 * Availability Engine Type Definitions
 *
 * All intervals are half-open: [start, end)
 * All instants are absolute (Date); the timezone of a computation is an IANA
 * identifier passed alongside them and only matters where days are windowed.
 */

import type { CalendarDate, DateRange, Interval } from '@freeslots/core';

export type { CalendarDate, DateRange, Interval };

/**
 * Which part of each day counts as eligible time.
 *
 * - `standard`: from the start of the working day until the next midnight
 * - `professional`: working hours only, weekends skipped
 */
export type PlanMode = 'standard' | 'professional';

/**
 * A merged busy set: sorted ascending by start, and strictly separated
 * (`end_i < start_{i+1}`).
 */
export type BusySet = Interval[];

/**
 * A fixed-width slot tiled from a day window.
 */
export type CandidateSlot = Interval;

/**
 * Working-hour bounds in local hours (0-24).
 *
 * @example
 * const officeHours: WorkHours = { start: 9, end: 17 };
 */
export interface WorkHours {
	/** Hour the eligible window opens in both modes */
	start: number;
	/** Hour the eligible window closes in professional mode */
	end: number;
}

/**
 * The eligible span of a single day under the active mode.
 */
export interface DayWindow {
	/** The day this window belongs to */
	day: CalendarDate;
	/** Start of the window (inclusive) */
	windowStart: Date;
	/** End of the window (exclusive) */
	windowEnd: Date;
}

export interface DayWindowOptions {
	/** IANA timezone identifier the day is read in */
	timezone: string;
	/** Defaults to 09:00-17:00 */
	workHours?: WorkHours;
}

/**
 * Free time for one day, after adjacent free blocks have been merged.
 */
export interface DayAvailability {
	day: CalendarDate;
	/** Two-letter weekday abbreviation, e.g. "Mo" */
	label: string;
	free: Interval[];
}

/**
 * Free intervals keyed by calendar day, in ascending date order.
 */
export type AvailabilityResult = Map<CalendarDate, DayAvailability>;

/**
 * Input for planDays.
 *
 * @example
 * const input: PlanInput = {
 *   startDay: '2024-01-15',
 *   days: 5,
 *   mode: 'professional',
 *   busy: rawBusy,
 *   timezone: 'America/New_York'
 * };
 */
export interface PlanInput {
	/** First day to plan, usually today in the active timezone */
	startDay: CalendarDate;
	/** Number of consecutive calendar days to scan (weekends included in the count) */
	days: number;
	mode: PlanMode;
	/** Busy intervals, in any order */
	busy: Interval[];
	/** IANA timezone identifier */
	timezone: string;
	/** Candidate slot width in minutes; defaults to 15 */
	blockMinutes?: number;
	workHours?: WorkHours;
	/** Keep days without any free time as empty entries instead of omitting them */
	keepEmptyDays?: boolean;
}

// ============================================================================
// Busy sources
// ============================================================================

/**
 * Why a source contributed nothing.
 *
 * - `disabled`: turned off in configuration
 * - `unconfigured`: no credentials or client available
 * - `failed`: the fetch threw or the provider answered with an error
 */
export type EmptyReason = 'disabled' | 'unconfigured' | 'failed';

export type SourceResult =
	| {
			status: 'ok';
			source: string;
			intervals: Interval[];
			/** Periods dropped because they were unparseable or had start >= end */
			dropped: number;
			/** True when the intervals came from the cache */
			cached?: boolean;
	  }
	| {
			status: 'empty';
			source: string;
			reason: EmptyReason;
			message: string;
	  };

/**
 * A provider of busy intervals.
 * Sources should report missing configuration as an `empty` result; anything
 * they throw is recovered by the collector as `empty/failed`.
 */
export interface BusySource {
	readonly name: string;
	fetchBusy(range: DateRange): Promise<SourceResult>;
}

/**
 * A busy period as delivered by a provider, before normalization.
 */
export interface BusyPeriod {
	/** Start time as ISO string or Date */
	start: string | Date;
	/** End time as ISO string or Date */
	end: string | Date;
}

// ============================================================================
// Logging
// ============================================================================

export interface Logger {
	debug(message: string, ...details: unknown[]): void;
	info(message: string, ...details: unknown[]): void;
	warn(message: string, ...details: unknown[]): void;
	error(message: string, ...details: unknown[]): void;
}
