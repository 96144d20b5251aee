/**
 * Constants - Paths and tuning defaults.
 *
 * All persisted state (config, cache file, logs) lives under the
 * schema-scout home directory, never next to the caller's working tree.
 */

import os from 'node:os';
import path from 'node:path';

// ============================================================================
// Directory Paths
// ============================================================================

/**
 * Environment variable to override the schema-scout home directory.
 */
export const SCOUT_HOME_ENV = 'SCHEMA_SCOUT_HOME';

/**
 * Get the schema-scout home directory.
 *
 * Default: ~/.cache/schema-scout
 * Override: $SCHEMA_SCOUT_HOME
 * Linux (conventional): $XDG_CACHE_HOME/schema-scout
 */
export function getScoutHomeDir(): string {
	const override = process.env[SCOUT_HOME_ENV]?.trim();
	if (override) return override;

	const xdg = process.env['XDG_CACHE_HOME']?.trim();
	if (xdg) return path.join(xdg, 'schema-scout');

	return path.join(os.homedir(), '.cache', 'schema-scout');
}

/**
 * Get the path to the config file.
 */
export function getConfigPath(): string {
	return path.join(getScoutHomeDir(), 'config.json');
}

/**
 * File name of the compressed metadata cache.
 */
export const CACHE_FILE_NAME = 'schema_cache.json.gz';

/**
 * Get the path to the metadata cache file inside a cache directory.
 */
export function getCacheFilePath(cacheDir: string = getScoutHomeDir()): string {
	return path.join(cacheDir, CACHE_FILE_NAME);
}

// ============================================================================
// Logging Paths
// ============================================================================

/**
 * Get the path to the logs directory.
 */
export function getLogsDir(): string {
	return path.join(getScoutHomeDir(), 'logs');
}

/**
 * Service names for logging.
 */
export type ServiceName = 'engine' | 'loader' | 'cache';

/**
 * Get the path to a service's log directory.
 */
export function getServiceLogsDir(service: ServiceName): string {
	return path.join(getLogsDir(), service);
}

/**
 * Get the path to a service's current hourly log file.
 * Format: {home}/logs/{service}/YYYY-MM-DD-HH.log
 */
export function getServiceLogPath(service: ServiceName): string {
	const now = new Date();
	const year = now.getFullYear();
	const month = String(now.getMonth() + 1).padStart(2, '0');
	const day = String(now.getDate()).padStart(2, '0');
	const hour = String(now.getHours()).padStart(2, '0');
	const filename = `${year}-${month}-${day}-${hour}.log`;
	return path.join(getServiceLogsDir(service), filename);
}

// ============================================================================
// Defaults
// ============================================================================

/**
 * Cache entries older than this are ignored (1 hour).
 */
export const DEFAULT_CACHE_TTL_MS = 60 * 60 * 1000;

/**
 * gzip level used when writing the cache file.
 */
export const DEFAULT_COMPRESSION_LEVEL = 5;

/**
 * First page fetched by the streaming loader, kept small so the UI has
 * something to show quickly.
 */
export const DEFAULT_INITIAL_PAGE_SIZE = 200;

/**
 * Page size for the remaining streamed pages.
 */
export const DEFAULT_PAGE_SIZE = 500;

/**
 * Max schemas fetched at once by prefetchSchemas.
 */
export const DEFAULT_PREFETCH_CONCURRENCY = 4;

/**
 * Cap on the number of hits returned by the search manager.
 */
export const DEFAULT_MAX_RESULTS = 1000;

/**
 * Key used in the cache file when no schema filter is active.
 */
export const ALL_SCHEMAS_KEY = 'ALL_SCHEMAS';
