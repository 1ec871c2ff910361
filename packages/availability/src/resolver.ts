/**
 * Free-slot resolution: candidate slots minus the busy set.
 */

import { mergeAdjacentIntervals } from './intervals.js';
import type { BusySet, CandidateSlot, Interval } from './types.js';

/**
 * Keeps the candidates that no busy interval overlaps, then joins the ones
 * that follow each other exactly.
 *
 * A slot is free iff, for every busy interval, `slot.end <= busy.start` or
 * `slot.start >= busy.end`. Touching a busy interval at a boundary is fine.
 *
 * Both inputs must be sorted by start and `busy` must be merged, which lets a
 * single pointer walk the busy set alongside the candidates.
 *
 * @example
 * ```typescript
 * freeSlots(tileWindow(window, 15), [{ start: d('10:00'), end: d('10:30') }]);
 * // Result: [09:00-10:00, 10:30-...]
 * ```
 */
export function freeSlots(candidates: CandidateSlot[], busy: BusySet): Interval[] {
	const available: Interval[] = [];
	let pointer = 0;

	for (const slot of candidates) {
		// Busy intervals ending at or before this slot can't block it or any later one
		while (pointer < busy.length && busy[pointer].end <= slot.start) {
			pointer++;
		}

		const blocking = pointer < busy.length && busy[pointer].start < slot.end;
		if (!blocking) {
			available.push(slot);
		}
	}

	return mergeAdjacentIntervals(available);
}
