/**
 * Configuration value object.
 *
 * Built once per invocation and passed down explicitly; nothing in the engine
 * reads process state on its own.
 */

import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_CACHE_EXPIRATION_SECONDS } from './cache.js';
import { UsageError } from './errors.js';
import { DEFAULT_BLOCK_MINUTES, DEFAULT_WORK_HOURS } from './windows.js';

/**
 * Short timezone names accepted wherever a zone is selected.
 */
export const TIMEZONE_ALIASES = {
	EST: 'America/New_York',
	PST: 'America/Los_Angeles',
} as const;

export type TimezoneAlias = keyof typeof TIMEZONE_ALIASES;

const hour = z.number().int().min(0).max(24);

const configSchema = z.object({
	defaultTimezone: z.enum(['EST', 'PST']).default('EST'),
	quiet: z.boolean().default(true),
	providers: z
		.object({
			google: z.boolean().default(true),
			outlook: z.boolean().default(true),
		})
		.default({}),
	cache: z
		.object({
			enabled: z.boolean().default(true),
			expirationSeconds: z.number().int().nonnegative().default(DEFAULT_CACHE_EXPIRATION_SECONDS),
		})
		.default({}),
	blockMinutes: z.number().int().positive().default(DEFAULT_BLOCK_MINUTES),
	workHours: z
		.object({
			start: hour.default(DEFAULT_WORK_HOURS.start),
			end: hour.default(DEFAULT_WORK_HOURS.end),
		})
		.default({})
		.refine((hours) => hours.start < hours.end, { message: 'start must be before end' }),
});

export type AvailabilityConfig = Readonly<z.output<typeof configSchema>>;
export type AvailabilityConfigInput = z.input<typeof configSchema>;

/**
 * Validates raw configuration and fills in defaults.
 *
 * @throws {UsageError} `INVALID_CONFIG` listing every problem found
 */
export function parseConfig(raw: unknown = {}): AvailabilityConfig {
	const parsed = configSchema.safeParse(raw);

	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
			.join('; ');
		throw new UsageError('INVALID_CONFIG', `Invalid configuration: ${details}`);
	}

	return Object.freeze(parsed.data);
}

function readBoolean(value: string | undefined): boolean | string | undefined {
	if (value === undefined || value === '') return undefined;
	const normalized = value.trim().toLowerCase();
	if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
	if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
	// Left as a string so validation reports it
	return value;
}

function readNumber(value: string | undefined): number | string | undefined {
	if (value === undefined || value === '') return undefined;
	const parsed = Number(value);
	return Number.isNaN(parsed) ? value : parsed;
}

/**
 * Builds configuration from `FREESLOTS_*` environment variables.
 *
 * | variable | key |
 * |---|---|
 * | FREESLOTS_DEFAULT_TIMEZONE | defaultTimezone |
 * | FREESLOTS_QUIET | quiet |
 * | FREESLOTS_GOOGLE | providers.google |
 * | FREESLOTS_OUTLOOK | providers.outlook |
 * | FREESLOTS_CACHE | cache.enabled |
 * | FREESLOTS_CACHE_EXPIRATION | cache.expirationSeconds |
 * | FREESLOTS_BLOCK_MINUTES | blockMinutes |
 * | FREESLOTS_WORK_START / FREESLOTS_WORK_END | workHours |
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): AvailabilityConfig {
	return parseConfig({
		defaultTimezone: env.FREESLOTS_DEFAULT_TIMEZONE?.trim().toUpperCase() || undefined,
		quiet: readBoolean(env.FREESLOTS_QUIET),
		providers: {
			google: readBoolean(env.FREESLOTS_GOOGLE),
			outlook: readBoolean(env.FREESLOTS_OUTLOOK),
		},
		cache: {
			enabled: readBoolean(env.FREESLOTS_CACHE),
			expirationSeconds: readNumber(env.FREESLOTS_CACHE_EXPIRATION),
		},
		blockMinutes: readNumber(env.FREESLOTS_BLOCK_MINUTES),
		workHours: {
			start: readNumber(env.FREESLOTS_WORK_START),
			end: readNumber(env.FREESLOTS_WORK_END),
		},
	});
}

/**
 * Loads `.env` (when present) into the environment, then reads the configuration.
 */
export function loadConfig(options: { path?: string } = {}): AvailabilityConfig {
	loadEnv({ path: options.path });
	return configFromEnv(process.env);
}

// ============================================================================
// Timezones
// ============================================================================

function isAlias(zone: string): zone is TimezoneAlias {
	return Object.prototype.hasOwnProperty.call(TIMEZONE_ALIASES, zone);
}

function isKnownTimezone(zone: string): boolean {
	try {
		new Intl.DateTimeFormat('en-US', { timeZone: zone });
		return true;
	} catch {
		return false;
	}
}

/**
 * Maps an alias (EST, PST) or an IANA name to an IANA name.
 *
 * @throws {UsageError} `INVALID_TIMEZONE` for unknown zones
 */
export function resolveTimezone(zone: string): string {
	const upper = zone.trim().toUpperCase();
	if (isAlias(upper)) {
		return TIMEZONE_ALIASES[upper];
	}
	if (!isKnownTimezone(zone)) {
		throw new UsageError('INVALID_TIMEZONE', `Unknown timezone: ${zone}`);
	}
	return zone;
}

export interface TimezoneFlags {
	pst?: boolean;
	est?: boolean;
}

/**
 * Picks the zone from mutually exclusive flags, falling back to the configured default.
 *
 * @throws {UsageError} `CONFLICTING_TIMEZONE` when both flags are set
 */
export function selectTimezone(flags: TimezoneFlags, fallback: TimezoneAlias): TimezoneAlias {
	if (flags.pst && flags.est) {
		throw new UsageError('CONFLICTING_TIMEZONE', 'Cannot select both PST and EST');
	}
	if (flags.pst) return 'PST';
	if (flags.est) return 'EST';
	return fallback;
}
