/**
 * Errors raised before a computation starts.
 */

export type UsageErrorCode =
	| 'INVALID_DAYS'
	| 'INVALID_DATE'
	| 'INVALID_BLOCK_SIZE'
	| 'INVALID_TIMEZONE'
	| 'CONFLICTING_TIMEZONE'
	| 'INVALID_WORK_HOURS'
	| 'INVALID_CONFIG';

/**
 * Invalid input from the caller: bad day count, block size, timezone or
 * configuration. Nothing is fetched or computed once one is raised.
 */
export class UsageError extends Error {
	readonly code: UsageErrorCode;

	constructor(code: UsageErrorCode, message: string) {
		super(message);
		this.name = 'UsageError';
		this.code = code;
	}
}

export function isUsageError(error: unknown): error is UsageError {
	return error instanceof UsageError;
}

export function assertPositiveInteger(value: number, code: UsageErrorCode, label: string): void {
	if (!Number.isInteger(value) || value <= 0) {
		throw new UsageError(code, `${label} must be a positive integer (got ${value})`);
	}
}

/**
 * Extracts a printable message from anything thrown.
 */
export function describeError(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
