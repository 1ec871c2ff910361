/**
 * Busy-interval collection across calendar providers.
 */

import { parseISO } from 'date-fns';
import { describeError } from './errors.js';
import { isValidInterval } from './intervals.js';
import { silentLogger } from './logger.js';
import type {
	BusyPeriod,
	BusySource,
	DateRange,
	EmptyReason,
	Interval,
	Logger,
	SourceResult,
} from './types.js';

function toInstant(value: string | Date): Date {
	return value instanceof Date ? value : parseISO(value);
}

/**
 * Normalizes provider periods into intervals.
 * Unparseable bounds and periods with start >= end are dropped and counted;
 * the rest are kept.
 *
 * @example
 * ```typescript
 * buildIntervalsFromPeriods([
 *   { start: '2024-01-15T10:00:00Z', end: '2024-01-15T11:00:00Z' },
 *   { start: 'not a date', end: '2024-01-15T12:00:00Z' },
 * ]);
 * // { intervals: [10:00-11:00], dropped: 1 }
 * ```
 */
export function buildIntervalsFromPeriods(periods: BusyPeriod[]): { intervals: Interval[]; dropped: number } {
	const intervals: Interval[] = [];
	let dropped = 0;

	for (const period of periods) {
		const interval = { start: toInstant(period.start), end: toInstant(period.end) };
		if (isValidInterval(interval)) {
			intervals.push(interval);
		} else {
			dropped++;
		}
	}

	return { intervals, dropped };
}

/**
 * Builds an `ok` result from provider periods.
 */
export function busyResult(source: string, periods: BusyPeriod[]): SourceResult {
	const { intervals, dropped } = buildIntervalsFromPeriods(periods);
	return { status: 'ok', source, intervals, dropped };
}

export function emptyResult(source: string, reason: EmptyReason, message: string): SourceResult {
	return { status: 'empty', source, reason, message };
}

export interface CollectOptions {
	/** Per-source switch keyed by source name; sources missing from the map are enabled */
	enabled?: Record<string, boolean>;
	logger?: Logger;
}

export interface CollectedBusy {
	/** Concatenated, unmerged intervals from every source that answered */
	intervals: Interval[];
	results: SourceResult[];
}

async function fetchFromSource(source: BusySource, range: DateRange): Promise<SourceResult> {
	try {
		return await source.fetchBusy(range);
	} catch (error) {
		return emptyResult(source.name, 'failed', describeError(error));
	}
}

/**
 * Fetches every enabled source concurrently and concatenates what they return.
 *
 * A source that is disabled, unconfigured or failing contributes nothing and
 * is logged as a warning; the collection itself never rejects. When every
 * source fails the busy list is simply empty.
 */
export async function collectBusyIntervals(
	sources: BusySource[],
	range: DateRange,
	options: CollectOptions = {},
): Promise<CollectedBusy> {
	const { enabled = {}, logger = silentLogger } = options;

	const results = await Promise.all(
		sources.map((source) =>
			enabled[source.name] === false
				? Promise.resolve(emptyResult(source.name, 'disabled', `${source.name} is disabled`))
				: fetchFromSource(source, range),
		),
	);

	const intervals: Interval[] = [];

	for (const result of results) {
		if (result.status === 'ok') {
			intervals.push(...result.intervals);
			if (result.dropped > 0) {
				logger.warn(`${result.source}: dropped ${result.dropped} malformed busy period(s)`);
			}
			logger.debug(
				`${result.source}: ${result.intervals.length} busy interval(s)${result.cached ? ' (cached)' : ''}`,
			);
		} else if (result.reason === 'disabled') {
			logger.debug(result.message);
		} else {
			logger.warn(`${result.source} unavailable (${result.reason}): ${result.message}`);
		}
	}

	return { intervals, results };
}
