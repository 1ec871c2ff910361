/**
 * Google Calendar busy source.
 *
 * Token acquisition and refresh happen elsewhere; this module only needs an
 * authorized client (or an access token to build one).
 */

import { google, type calendar_v3 } from 'googleapis';
import { busyResult, emptyResult } from '../sources.js';
import type { BusyPeriod, BusySource, DateRange, SourceResult } from '../types.js';

export const GOOGLE_SOURCE = 'google';

/**
 * Start or end of a Google event. Timed events carry `dateTime`;
 * all-day events only carry `date`.
 */
export interface GoogleEventTime {
	dateTime?: string | null;
	date?: string | null;
}

export interface GoogleEvent {
	status?: string | null;
	transparency?: string | null;
	start?: GoogleEventTime;
	end?: GoogleEventTime;
}

/**
 * The slice of the Calendar API this source needs.
 */
export interface GoogleEventsApi {
	listCalendarIds(): Promise<string[]>;
	/** Expanded (single) event instances of one calendar overlapping the range */
	listEvents(calendarId: string, range: DateRange): Promise<GoogleEvent[]>;
}

interface ListPage<T> {
	data: {
		items?: T[] | null;
		nextPageToken?: string | null;
	};
}

/**
 * The two list calls of a Calendar v3 client this source pages through.
 * A `calendar_v3.Calendar` satisfies it.
 */
export interface CalendarClient {
	calendarList: {
		list(params: { pageToken?: string }): Promise<ListPage<calendar_v3.Schema$CalendarListEntry>>;
	};
	events: {
		list(params: calendar_v3.Params$Resource$Events$List): Promise<ListPage<calendar_v3.Schema$Event>>;
	};
}

/**
 * Adapts a `googleapis` Calendar v3 client, following page tokens.
 */
export function googleEventsApi(calendar: CalendarClient): GoogleEventsApi {
	return {
		async listCalendarIds() {
			const ids: string[] = [];
			let pageToken: string | undefined;
			do {
				const res = await calendar.calendarList.list({ pageToken });
				for (const item of res.data.items ?? []) {
					if (item.id) ids.push(item.id);
				}
				pageToken = res.data.nextPageToken ?? undefined;
			} while (pageToken);
			return ids;
		},

		async listEvents(calendarId, range) {
			const events: GoogleEvent[] = [];
			let pageToken: string | undefined;
			do {
				const res = await calendar.events.list({
					calendarId,
					timeMin: range.start.toISOString(),
					timeMax: range.end.toISOString(),
					singleEvents: true,
					orderBy: 'startTime',
					pageToken,
				});
				events.push(...(res.data.items ?? []));
				pageToken = res.data.nextPageToken ?? undefined;
			} while (pageToken);
			return events;
		},
	};
}

/**
 * Builds a Calendar v3 client from an already acquired OAuth access token.
 */
export function createGoogleCalendar(accessToken: string): calendar_v3.Calendar {
	const auth = new google.auth.OAuth2();
	auth.setCredentials({ access_token: accessToken });
	return google.calendar({ version: 'v3', auth });
}

/**
 * Maps events to busy periods. All-day, cancelled and transparent
 * ("show as available") events don't block time.
 */
export function periodsFromGoogleEvents(events: GoogleEvent[]): BusyPeriod[] {
	const periods: BusyPeriod[] = [];

	for (const event of events) {
		if (event.status === 'cancelled' || event.transparency === 'transparent') {
			continue;
		}
		const start = event.start?.dateTime;
		const end = event.end?.dateTime;
		if (!start || !end) {
			continue;
		}
		periods.push({ start, end });
	}

	return periods;
}

export interface GoogleSourceOptions {
	/** Missing when no credentials are available; the source then reports `unconfigured` */
	api?: GoogleEventsApi;
}

/**
 * Busy intervals from every calendar in the user's list.
 * Calendars are fetched concurrently.
 */
export function googleCalendarSource(options: GoogleSourceOptions): BusySource {
	const { api } = options;

	return {
		name: GOOGLE_SOURCE,
		async fetchBusy(range: DateRange): Promise<SourceResult> {
			if (!api) {
				return emptyResult(GOOGLE_SOURCE, 'unconfigured', 'Google Calendar API not set up');
			}

			const calendarIds = await api.listCalendarIds();
			const perCalendar = await Promise.all(calendarIds.map((id) => api.listEvents(id, range)));

			return busyResult(GOOGLE_SOURCE, periodsFromGoogleEvents(perCalendar.flat()));
		},
	};
}
