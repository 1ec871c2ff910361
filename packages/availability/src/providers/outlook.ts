/**
 * Outlook (Microsoft Graph) busy source.
 */

import { fromZonedTime } from 'date-fns-tz';
import { z } from 'zod';
import { busyResult, emptyResult } from '../sources.js';
import type { BusyPeriod, BusySource, DateRange, SourceResult } from '../types.js';

export const OUTLOOK_SOURCE = 'outlook';

const GRAPH_BASE_URL = 'https://graph.microsoft.com/v1.0';

const graphDateTime = z.object({
	dateTime: z.string(),
	timeZone: z.string().optional(),
});

const calendarViewSchema = z.object({
	value: z.array(
		z.object({
			start: graphDateTime.optional(),
			end: graphDateTime.optional(),
			isAllDay: z.boolean().optional(),
			isCancelled: z.boolean().optional(),
			showAs: z.string().optional(),
		}),
	),
	'@odata.nextLink': z.string().optional(),
});

export type CalendarViewPage = z.infer<typeof calendarViewSchema>;

/**
 * Graph returns wall-clock times plus the zone they are in (UTC by default).
 * A value that already carries an offset is taken as is.
 */
function toInstant(value: z.infer<typeof graphDateTime>): string | Date {
	if (/(Z|[+-]\d{2}:\d{2})$/.test(value.dateTime)) {
		return value.dateTime;
	}
	// Graph sends seven fractional digits; keep milliseconds
	const wallClock = value.dateTime.replace(/(\.\d{3})\d+$/, '$1');
	return fromZonedTime(wallClock, value.timeZone ?? 'UTC');
}

/**
 * Maps calendar view events to busy periods, skipping cancelled, all-day
 * and free events.
 */
export function periodsFromCalendarView(events: CalendarViewPage['value']): BusyPeriod[] {
	const periods: BusyPeriod[] = [];

	for (const event of events) {
		if (event.isCancelled || event.isAllDay || event.showAs?.toLowerCase() === 'free') {
			continue;
		}
		if (!event.start || !event.end) {
			continue;
		}
		periods.push({ start: toInstant(event.start), end: toInstant(event.end) });
	}

	return periods;
}

export interface OutlookSourceOptions {
	/** Missing when no credentials are available; the source then reports `unconfigured` */
	accessToken?: string;
	fetch?: typeof fetch;
	baseUrl?: string;
}

/**
 * Busy intervals from the default calendar via `/me/calendarView`, which
 * already expands recurring events. Follows `@odata.nextLink` paging.
 */
export function outlookCalendarSource(options: OutlookSourceOptions): BusySource {
	const { accessToken, fetch: fetchImpl = fetch, baseUrl = GRAPH_BASE_URL } = options;

	async function fetchPage(url: string, token: string): Promise<CalendarViewPage> {
		const res = await fetchImpl(url, {
			headers: {
				Authorization: `Bearer ${token}`,
				Prefer: 'outlook.timezone="UTC"',
			},
		});
		if (!res.ok) {
			throw new Error(`Outlook calendarView failed: ${res.status} ${await res.text()}`);
		}
		return calendarViewSchema.parse(await res.json());
	}

	return {
		name: OUTLOOK_SOURCE,
		async fetchBusy(range: DateRange): Promise<SourceResult> {
			if (!accessToken) {
				return emptyResult(OUTLOOK_SOURCE, 'unconfigured', 'Outlook Calendar API not set up');
			}

			const url = new URL(`${baseUrl}/me/calendarView`);
			url.searchParams.set('startDateTime', range.start.toISOString());
			url.searchParams.set('endDateTime', range.end.toISOString());
			url.searchParams.set('$select', 'start,end,isAllDay,isCancelled,showAs');

			const events: CalendarViewPage['value'] = [];
			let next: string | undefined = url.toString();
			while (next) {
				const page: CalendarViewPage = await fetchPage(next, accessToken);
				events.push(...page.value);
				next = page['@odata.nextLink'];
			}

			return busyResult(OUTLOOK_SOURCE, periodsFromCalendarView(events));
		},
	};
}
