import { UsageError } from '../src/errors.js';

export const d = (iso: string) => new Date(iso);

/**
 * Runs fn and returns the code of the UsageError it throws.
 */
export function usageErrorCode(fn: () => unknown): string | undefined {
	try {
		fn();
	} catch (error) {
		if (error instanceof UsageError) {
			return error.code;
		}
		throw error;
	}
	return undefined;
}
