/**
 * Availability engine: gathers busy time from the configured sources and
 * plans free time over the requested days.
 */

import { withCache, type CacheStore } from './cache.js';
import { resolveTimezone, type AvailabilityConfig } from './config.js';
import { UsageError, assertPositiveInteger } from './errors.js';
import { silentLogger } from './logger.js';
import { planDays } from './planner.js';
import { collectBusyIntervals } from './sources.js';
import { addCalendarDays, assertWorkHours, localHourToInstant, todayIn } from './windows.js';
import type {
	AvailabilityResult,
	BusySource,
	CalendarDate,
	DateRange,
	Logger,
	PlanMode,
	SourceResult,
} from './types.js';

export interface AvailabilityRequest {
	/** Number of calendar days to scan, starting today */
	days: number;
	/** Weekday working hours only */
	professional?: boolean;
	/** Alias (EST, PST) or IANA name; defaults to the configured zone */
	timezone?: string;
	/** Keep days without free time, for display */
	keepEmptyDays?: boolean;
}

export type AvailabilityOutcome =
	| {
			ok: true;
			/** IANA timezone the days were planned in */
			timezone: string;
			mode: PlanMode;
			startDay: CalendarDate;
			range: DateRange;
			days: AvailabilityResult;
			sources: SourceResult[];
	  }
	| {
			ok: false;
			error: UsageError;
	  };

export interface CreateAvailabilityOptions {
	config: AvailabilityConfig;
	sources: BusySource[];
	/** Used when `config.cache.enabled` */
	cache?: CacheStore;
	logger?: Logger;
	now?: () => Date;
}

export interface AvailabilityEngine {
	computeAvailability(request: AvailabilityRequest): Promise<AvailabilityOutcome>;
}

interface ValidatedRequest {
	days: number;
	mode: PlanMode;
	timezone: string;
}

function validateRequest(request: AvailabilityRequest, config: AvailabilityConfig): ValidatedRequest {
	assertPositiveInteger(request.days, 'INVALID_DAYS', 'Number of days');
	assertPositiveInteger(config.blockMinutes, 'INVALID_BLOCK_SIZE', 'Block size in minutes');
	assertWorkHours(config.workHours);

	return {
		days: request.days,
		mode: request.professional ? 'professional' : 'standard',
		timezone: resolveTimezone(request.timezone ?? config.defaultTimezone),
	};
}

/**
 * Create an availability engine over the given sources.
 *
 * Usage errors are returned as `{ ok: false }` before any source is called.
 * Sources that are disabled, unconfigured or failing contribute no busy time;
 * they show up in `sources` and in the log, never as a failed computation.
 *
 * @example
 * ```typescript
 * const engine = createAvailability({
 *   config: loadConfig(),
 *   sources: [googleCalendarSource({ api }), outlookCalendarSource({ accessToken })],
 *   cache: new FileCacheStore(cacheDir),
 * });
 * const outcome = await engine.computeAvailability({ days: 3, timezone: 'PST' });
 * ```
 */
export function createAvailability(options: CreateAvailabilityOptions): AvailabilityEngine {
	const { config, cache, logger = silentLogger, now = () => new Date() } = options;

	const sources =
		config.cache.enabled && cache
			? options.sources.map((source) =>
					withCache(source, {
						store: cache,
						maxAgeSeconds: config.cache.expirationSeconds,
						now,
						logger,
					}),
				)
			: options.sources;

	async function computeAvailability(request: AvailabilityRequest): Promise<AvailabilityOutcome> {
		let validated: ValidatedRequest;
		try {
			validated = validateRequest(request, config);
		} catch (error) {
			if (error instanceof UsageError) {
				return { ok: false, error };
			}
			throw error;
		}

		const { days, mode, timezone } = validated;
		const startDay = todayIn(timezone, now());
		const range: DateRange = {
			start: localHourToInstant(startDay, 0, timezone),
			end: localHourToInstant(addCalendarDays(startDay, days), 0, timezone),
		};

		logger.info(`Planning ${days} day(s) from ${startDay} in ${timezone} (${mode})`);

		const collected = await collectBusyIntervals(sources, range, {
			enabled: { ...config.providers },
			logger,
		});

		const result = planDays({
			startDay,
			days,
			mode,
			busy: collected.intervals,
			timezone,
			blockMinutes: config.blockMinutes,
			workHours: config.workHours,
			keepEmptyDays: request.keepEmptyDays,
		});

		return { ok: true, timezone, mode, startDay, range, days: result, sources: collected.results };
	}

	return { computeAvailability };
}
