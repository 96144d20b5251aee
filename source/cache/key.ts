import {ALL_SCHEMAS_KEY} from '../lib/constants.js';

/**
 * Deterministic cache key for a catalog request.
 *
 * @example
 * cacheKey()              // 'ALL_SCHEMAS'
 * cacheKey('test', 10)    // 'TEST_LIMIT10_OFFSET0'
 * cacheKey('X', 0, 5)     // 'X_LIMIT0_OFFSET5'
 *
 * An offset without a limit is not pagination and does not change the key.
 */
export function cacheKey(
	schemaFilter?: string | null,
	limit?: number | null,
	offset?: number | null,
): string {
	const base = schemaFilter ? schemaFilter.toUpperCase() : ALL_SCHEMAS_KEY;
	if (limit === undefined || limit === null) return base;
	return `${base}_LIMIT${limit}_OFFSET${offset ?? 0}`;
}
