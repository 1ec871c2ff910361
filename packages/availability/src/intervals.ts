/**
 * Interval arithmetic for busy and free time.
 * All intervals are half-open [start, end): start is inclusive, end is exclusive.
 */

import type { BusySet, DateRange, Interval } from './types.js';

export type { Interval };

function cloneInterval(interval: Interval): Interval {
	return {
		start: new Date(interval.start.getTime()),
		end: new Date(interval.end.getTime()),
	};
}

function compareIntervals(a: Interval, b: Interval): number {
	const startDiff = a.start.getTime() - b.start.getTime();
	if (startDiff !== 0) return startDiff;
	return a.end.getTime() - b.end.getTime();
}

/**
 * True when the interval has real bounds and a positive length.
 */
export function isValidInterval(interval: Interval): boolean {
	const start = interval.start.getTime();
	const end = interval.end.getTime();
	return Number.isFinite(start) && Number.isFinite(end) && start < end;
}

/**
 * Checks if two intervals strictly overlap (share some time, not just an endpoint).
 * [a, b) and [b, c) do not overlap.
 */
export function intervalsOverlap(a: Interval, b: Interval): boolean {
	return a.start < b.end && b.start < a.end;
}

/**
 * Merges overlapping or touching intervals into a busy set.
 *
 * Intervals with start >= end (or an invalid date) are dropped. The result is
 * sorted by start and strictly separated: for consecutive intervals,
 * `end_i < start_{i+1}`. The input is not mutated.
 *
 * @example
 * ```typescript
 * const merged = mergeIntervals([
 *   { start: new Date('2024-01-01T09:00:00Z'), end: new Date('2024-01-01T10:00:00Z') },
 *   { start: new Date('2024-01-01T09:30:00Z'), end: new Date('2024-01-01T11:00:00Z') },
 * ]);
 * // Result: [{ start: 2024-01-01T09:00:00Z, end: 2024-01-01T11:00:00Z }]
 * ```
 */
export function mergeIntervals(intervals: Interval[]): BusySet {
	const valid = intervals.filter(isValidInterval).map(cloneInterval);
	if (valid.length === 0) {
		return [];
	}

	// Array.prototype.sort is stable
	valid.sort(compareIntervals);

	const merged: Interval[] = [valid[0]];

	for (let i = 1; i < valid.length; i++) {
		const current = valid[i];
		const last = merged[merged.length - 1];

		// Touching counts: [9, 10) and [10, 11) become [9, 11)
		if (current.start <= last.end) {
			if (current.end > last.end) {
				last.end = current.end;
			}
		} else {
			merged.push(current);
		}
	}

	return merged;
}

/**
 * Joins intervals that follow each other exactly (`next.start == current.end`).
 * Expects sorted, non-overlapping input such as the free candidate slots of a day.
 *
 * @example
 * ```typescript
 * mergeAdjacentIntervals([
 *   { start: d('09:00'), end: d('09:15') },
 *   { start: d('09:15'), end: d('09:30') },
 *   { start: d('10:00'), end: d('10:15') },
 * ]);
 * // Result: [09:00-09:30, 10:00-10:15]
 * ```
 */
export function mergeAdjacentIntervals(intervals: Interval[]): Interval[] {
	if (intervals.length === 0) {
		return [];
	}

	const merged: Interval[] = [cloneInterval(intervals[0])];

	for (let i = 1; i < intervals.length; i++) {
		const current = intervals[i];
		const last = merged[merged.length - 1];

		if (current.start.getTime() === last.end.getTime()) {
			last.end = new Date(current.end.getTime());
		} else {
			merged.push(cloneInterval(current));
		}
	}

	return merged;
}

/**
 * Subtracts a set of intervals from another set of intervals.
 * May split intervals when the subtraction punches holes in the middle.
 *
 * @example
 * ```typescript
 * subtractIntervals(
 *   [{ start: d('08:00'), end: d('17:00') }],
 *   [{ start: d('12:00'), end: d('13:00') }],
 * );
 * // Result: [08:00-12:00, 13:00-17:00]
 * ```
 */
export function subtractIntervals(from: Interval[], subtract: Interval[]): Interval[] {
	const base = mergeIntervals(from);
	if (base.length === 0 || subtract.length === 0) {
		return base;
	}

	const busy = mergeIntervals(subtract);
	const result: Interval[] = [];

	for (const segment of base) {
		let cursor = segment.start;

		for (const block of busy) {
			if (block.end <= cursor) continue;
			if (block.start >= segment.end) break;

			if (block.start > cursor) {
				result.push({ start: new Date(cursor.getTime()), end: new Date(block.start.getTime()) });
			}
			cursor = block.end;
			if (cursor >= segment.end) break;
		}

		if (cursor < segment.end) {
			result.push({ start: new Date(cursor.getTime()), end: new Date(segment.end.getTime()) });
		}
	}

	return result;
}

/**
 * The parts of a merged busy set that fall inside `range`, cut at its bounds.
 * Intervals that only touch the range are left out.
 *
 * @example
 * ```typescript
 * clipToRange([08:00-10:00, 16:30-18:00], { start: 09:00, end: 17:00 });
 * // [09:00-10:00, 16:30-17:00]
 * ```
 */
export function clipToRange(busy: BusySet, range: DateRange): Interval[] {
	const clipped: Interval[] = [];

	for (const interval of busy) {
		if (interval.start >= range.end) break;
		if (interval.end <= range.start) continue;
		clipped.push({
			start: interval.start < range.start ? range.start : interval.start,
			end: interval.end > range.end ? range.end : interval.end,
		});
	}

	return clipped;
}

/**
 * Keeps the intervals of a sorted set that overlap the range, unclipped.
 */
export function overlappingRange(intervals: Interval[], range: DateRange): Interval[] {
	return intervals.filter((interval) => intervalsOverlap(interval, range));
}

/**
 * Total time covered by a set of intervals, in milliseconds.
 */
export function totalDuration(intervals: Interval[]): number {
	return mergeIntervals(intervals).reduce(
		(sum, interval) => sum + (interval.end.getTime() - interval.start.getTime()),
		0,
	);
}
