/**
 * Busy-interval cache: entries that remember the range they were fetched for
 * and when, plus stores to keep them in.
 */

import { mkdir, readFile, readdir, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { overlappingRange } from './intervals.js';
import { describeError } from './errors.js';
import { silentLogger } from './logger.js';
import type { BusySource, DateRange, Interval, Logger, SourceResult } from './types.js';

export const DEFAULT_CACHE_EXPIRATION_SECONDS = 300;

export interface CacheEntry {
	/** Start of the fetched range (inclusive) */
	rangeStart: Date;
	/** End of the fetched range (exclusive) */
	rangeEnd: Date;
	fetchedAt: Date;
	intervals: Interval[];
}

/**
 * An entry is fresh while it is at most `maxAgeSeconds` old.
 * Entries stamped in the future are treated as stale.
 */
export function isFresh(entry: CacheEntry, now: Date, maxAgeSeconds: number): boolean {
	const age = now.getTime() - entry.fetchedAt.getTime();
	return age >= 0 && age <= maxAgeSeconds * 1000;
}

export function coversRange(entry: CacheEntry, range: DateRange): boolean {
	return entry.rangeStart <= range.start && entry.rangeEnd >= range.end;
}

/**
 * Returns the cached intervals overlapping `range`, or undefined when the
 * entry is stale or was fetched for a range that doesn't fully cover it.
 */
export function tryCachedIntervals(
	entry: CacheEntry | undefined,
	range: DateRange,
	now: Date,
	maxAgeSeconds: number,
): Interval[] | undefined {
	if (!entry || !isFresh(entry, now, maxAgeSeconds) || !coversRange(entry, range)) {
		return undefined;
	}
	return overlappingRange(entry.intervals, range);
}

// ============================================================================
// Stores
// ============================================================================

export interface CacheStore {
	read(key: string): Promise<CacheEntry | undefined>;
	write(key: string, entry: CacheEntry): Promise<void>;
	clear(): Promise<void>;
}

export class MemoryCacheStore implements CacheStore {
	private readonly entries = new Map<string, CacheEntry>();

	async read(key: string): Promise<CacheEntry | undefined> {
		return this.entries.get(key);
	}

	async write(key: string, entry: CacheEntry): Promise<void> {
		this.entries.set(key, entry);
	}

	async clear(): Promise<void> {
		this.entries.clear();
	}
}

const isoDate = z
	.string()
	.datetime({ offset: true })
	.transform((value) => new Date(value));

const cacheFileSchema = z.object({
	rangeStart: isoDate,
	rangeEnd: isoDate,
	fetchedAt: isoDate,
	intervals: z.array(z.object({ start: isoDate, end: isoDate })),
});

function serializeEntry(entry: CacheEntry): z.input<typeof cacheFileSchema> {
	return {
		rangeStart: entry.rangeStart.toISOString(),
		rangeEnd: entry.rangeEnd.toISOString(),
		fetchedAt: entry.fetchedAt.toISOString(),
		intervals: entry.intervals.map((interval) => ({
			start: interval.start.toISOString(),
			end: interval.end.toISOString(),
		})),
	};
}

const CACHE_FILE_PATTERN = /^[A-Za-z0-9_-]+_cache\.json$/;

function isMissing(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * One JSON file per key (`<key>_cache.json`) in a directory.
 * A missing, unreadable or malformed file reads as a miss.
 */
export class FileCacheStore implements CacheStore {
	constructor(private readonly directory: string) {}

	private fileFor(key: string): string {
		return path.join(this.directory, `${key.replace(/[^a-z0-9-]/gi, '_')}_cache.json`);
	}

	async read(key: string): Promise<CacheEntry | undefined> {
		let raw: string;
		try {
			raw = await readFile(this.fileFor(key), 'utf8');
		} catch {
			return undefined;
		}

		let json: unknown;
		try {
			json = JSON.parse(raw);
		} catch {
			return undefined;
		}

		const parsed = cacheFileSchema.safeParse(json);
		return parsed.success ? parsed.data : undefined;
	}

	async write(key: string, entry: CacheEntry): Promise<void> {
		await mkdir(this.directory, { recursive: true });
		await writeFile(this.fileFor(key), JSON.stringify(serializeEntry(entry), null, 2), 'utf8');
	}

	/**
	 * Removes every `*_cache.json` file in the directory, including entries
	 * from earlier runs. Other files and the directory itself stay.
	 */
	async clear(): Promise<void> {
		let names: string[];
		try {
			names = await readdir(this.directory);
		} catch (error) {
			if (isMissing(error)) return;
			throw error;
		}

		await Promise.all(
			names.filter((name) => CACHE_FILE_PATTERN.test(name)).map((name) => unlink(path.join(this.directory, name))),
		);
	}
}

// ============================================================================
// Cached sources
// ============================================================================

export interface WithCacheOptions {
	store: CacheStore;
	maxAgeSeconds?: number;
	now?: () => Date;
	logger?: Logger;
}

/**
 * Wraps a source so a fresh covering cache entry answers instead of the
 * provider. Only `ok` results are written back; an empty or failed fetch
 * leaves the previous entry alone. A failed write is logged and the fetched
 * result is still returned.
 */
export function withCache(source: BusySource, options: WithCacheOptions): BusySource {
	const {
		store,
		maxAgeSeconds = DEFAULT_CACHE_EXPIRATION_SECONDS,
		now = () => new Date(),
		logger = silentLogger,
	} = options;

	return {
		name: source.name,
		async fetchBusy(range: DateRange): Promise<SourceResult> {
			const cached = tryCachedIntervals(await store.read(source.name), range, now(), maxAgeSeconds);
			if (cached) {
				return { status: 'ok', source: source.name, intervals: cached, dropped: 0, cached: true };
			}

			const result = await source.fetchBusy(range);
			if (result.status === 'ok') {
				try {
					await store.write(source.name, {
						rangeStart: range.start,
						rangeEnd: range.end,
						fetchedAt: now(),
						intervals: result.intervals,
					});
				} catch (error) {
					logger.warn(`${source.name}: could not write cache entry: ${describeError(error)}`);
				}
			}
			return result;
		},
	};
}
