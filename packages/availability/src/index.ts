/**
 * freeslots availability
 *
 * Busy time from several calendar providers, merged and inverted against a
 * working-hours template, answering: "When am I free?"
 *
 * @packageDocumentation
 */

// Interval arithmetic
export {
	clipToRange,
	intervalsOverlap,
	isValidInterval,
	mergeAdjacentIntervals,
	mergeIntervals,
	overlappingRange,
	subtractIntervals,
	totalDuration,
} from './intervals.js';
// Day windows
export {
	DEFAULT_BLOCK_MINUTES,
	DEFAULT_WORK_HOURS,
	addCalendarDays,
	dayWindow,
	isWeekendDay,
	localHourToInstant,
	tileWindow,
	todayIn,
	weekdayLabel,
} from './windows.js';
// Resolution and planning
export { freeSlots } from './resolver.js';
export { planDays, planDaysInRange } from './planner.js';
// Sources and cache
export { buildIntervalsFromPeriods, busyResult, collectBusyIntervals, emptyResult } from './sources.js';
export {
	DEFAULT_CACHE_EXPIRATION_SECONDS,
	FileCacheStore,
	MemoryCacheStore,
	coversRange,
	isFresh,
	tryCachedIntervals,
	withCache,
} from './cache.js';
export {
	GOOGLE_SOURCE,
	createGoogleCalendar,
	googleCalendarSource,
	googleEventsApi,
	periodsFromGoogleEvents,
} from './providers/google.js';
export { OUTLOOK_SOURCE, outlookCalendarSource, periodsFromCalendarView } from './providers/outlook.js';
// Configuration, errors, logging
export {
	TIMEZONE_ALIASES,
	configFromEnv,
	loadConfig,
	parseConfig,
	resolveTimezone,
	selectTimezone,
} from './config.js';
export { UsageError, isUsageError } from './errors.js';
export { createConsoleLogger, silentLogger } from './logger.js';
// Engine and output
export { createAvailability } from './engine.js';
export { NO_SLOTS_MESSAGE, formatAvailability } from './format.js';

export type {
	AvailabilityResult,
	BusyPeriod,
	BusySet,
	BusySource,
	CalendarDate,
	CandidateSlot,
	DateRange,
	DayAvailability,
	DayWindow,
	DayWindowOptions,
	EmptyReason,
	Interval,
	Logger,
	PlanInput,
	PlanMode,
	SourceResult,
	WorkHours,
} from './types.js';
export type { CacheEntry, CacheStore, WithCacheOptions } from './cache.js';
export type { AvailabilityConfig, AvailabilityConfigInput, TimezoneAlias, TimezoneFlags } from './config.js';
export type { UsageErrorCode } from './errors.js';
export type { ConsoleLoggerOptions } from './logger.js';
export type { CollectOptions, CollectedBusy } from './sources.js';
export type {
	AvailabilityEngine,
	AvailabilityOutcome,
	AvailabilityRequest,
	CreateAvailabilityOptions,
} from './engine.js';
export type { FormatInput } from './format.js';
export type { CalendarClient, GoogleEvent, GoogleEventTime, GoogleEventsApi, GoogleSourceOptions } from './providers/google.js';
export type { CalendarViewPage, OutlookSourceOptions } from './providers/outlook.js';
