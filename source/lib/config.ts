/**
 * Config - Engine configuration loading and management.
 *
 * Stored at {home}/config.json (home: $SCHEMA_SCOUT_HOME, default
 * ~/.cache/schema-scout). A missing file means defaults; a file that
 * exists but cannot be parsed is an error rather than a silent reset.
 */

import fsSync from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import {z} from 'zod';
import {
	DEFAULT_CACHE_TTL_MS,
	DEFAULT_COMPRESSION_LEVEL,
	DEFAULT_INITIAL_PAGE_SIZE,
	DEFAULT_MAX_RESULTS,
	DEFAULT_PAGE_SIZE,
	DEFAULT_PREFETCH_CONCURRENCY,
	getConfigPath,
	getScoutHomeDir,
} from './constants.js';
import {ConfigError, errorMessage} from './errors.js';

// ============================================================================
// Types
// ============================================================================

export interface ScoutConfig {
	version: number;
	/** Directory holding the metadata cache file (default: home dir) */
	cacheDir: string;
	/** Max age of a cache entry in ms (default: 1 hour) */
	cacheTtlMs: number;
	/** gzip level 0-9 for the cache file (default: 5) */
	compressionLevel: number;
	/** First page size for streamed loading (default: 200) */
	initialPageSize: number;
	/** Page size after the first page (default: 500) */
	pageSize: number;
	/** Parallel schema fetches in prefetchSchemas (default: 4) */
	prefetchConcurrency: number;
	/** Max age of cached search results in ms (default: 1 hour) */
	searchResultTtlMs: number;
	/** Max hits returned by the search manager (default: 1000) */
	maxResults: number;
	/** Module specifier of an optional acceleration provider */
	accelerationModule?: string;
}

const configFileSchema = z
	.object({
		version: z.number().int(),
		cacheDir: z.string().min(1),
		cacheTtlMs: z.number().int().nonnegative(),
		compressionLevel: z.number().int().min(0).max(9),
		initialPageSize: z.number().int().positive(),
		pageSize: z.number().int().positive(),
		prefetchConcurrency: z.number().int().positive(),
		searchResultTtlMs: z.number().int().nonnegative(),
		maxResults: z.number().int().positive(),
		accelerationModule: z.string().min(1),
	})
	.partial();

// ============================================================================
// Defaults
// ============================================================================

export function createDefaultConfig(): ScoutConfig {
	return {
		version: 1,
		cacheDir: getScoutHomeDir(),
		cacheTtlMs: DEFAULT_CACHE_TTL_MS,
		compressionLevel: DEFAULT_COMPRESSION_LEVEL,
		initialPageSize: DEFAULT_INITIAL_PAGE_SIZE,
		pageSize: DEFAULT_PAGE_SIZE,
		prefetchConcurrency: DEFAULT_PREFETCH_CONCURRENCY,
		searchResultTtlMs: DEFAULT_CACHE_TTL_MS,
		maxResults: DEFAULT_MAX_RESULTS,
	};
}

// ============================================================================
// Config I/O
// ============================================================================

function parseConfig(configPath: string, content: string): ScoutConfig {
	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (parseError) {
		throw new ConfigError(configPath, errorMessage(parseError));
	}

	const result = configFileSchema.safeParse(raw);
	if (!result.success) {
		const issue = result.error.issues[0];
		const where = issue ? issue.path.join('.') || '(root)' : '(root)';
		throw new ConfigError(
			configPath,
			`${where}: ${issue?.message ?? 'invalid value'}`,
		);
	}

	return {...createDefaultConfig(), ...result.data};
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load config from disk, merging with defaults.
 * Returns defaults if no config file exists.
 */
export async function loadConfig(): Promise<ScoutConfig> {
	const configPath = getConfigPath();

	let content: string;
	try {
		content = await fs.readFile(configPath, 'utf-8');
	} catch (error) {
		if (isMissingFile(error)) return createDefaultConfig();
		throw new ConfigError(configPath, errorMessage(error));
	}

	return parseConfig(configPath, content);
}

/**
 * Synchronous variant of loadConfig for batch callers.
 */
export function loadConfigSync(): ScoutConfig {
	const configPath = getConfigPath();

	let content: string;
	try {
		content = fsSync.readFileSync(configPath, 'utf-8');
	} catch (error) {
		if (isMissingFile(error)) return createDefaultConfig();
		throw new ConfigError(configPath, errorMessage(error));
	}

	return parseConfig(configPath, content);
}

/**
 * Save config to disk.
 * Creates the home directory if it doesn't exist.
 */
export async function saveConfig(config: ScoutConfig): Promise<void> {
	const configPath = getConfigPath();
	await fs.mkdir(path.dirname(configPath), {recursive: true});
	await fs.writeFile(configPath, JSON.stringify(config, null, '\t') + '\n');
}
