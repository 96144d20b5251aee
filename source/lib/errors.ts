/**
 * Error classes shared by the cache, loader and config modules.
 */

/**
 * Normalize an unknown thrown value into a message.
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}

/**
 * The row-fetch collaborator failed (connectivity, driver, bad SQL).
 * Surfaces to callers of the loader unless mock mode is on.
 */
export class FetchFailure extends Error {
	readonly query: string | null;

	constructor(message: string, options: {query?: string; cause?: unknown} = {}) {
		super(message, {cause: options.cause});
		this.name = 'FetchFailure';
		this.query = options.query ?? null;
	}
}

/**
 * The cache file could not be decoded. Never leaves the cache module;
 * it is logged and reported as a miss.
 */
export class CacheCorruptionError extends Error {
	readonly cachePath: string;

	constructor(cachePath: string, cause: unknown) {
		super(`Unreadable cache file at ${cachePath}: ${errorMessage(cause)}`, {
			cause,
		});
		this.name = 'CacheCorruptionError';
		this.cachePath = cachePath;
	}
}

/**
 * The cache file could not be written. Never leaves the cache module.
 */
export class CacheWriteError extends Error {
	readonly cachePath: string;

	constructor(cachePath: string, cause: unknown) {
		super(`Could not write cache file at ${cachePath}: ${errorMessage(cause)}`, {
			cause,
		});
		this.name = 'CacheWriteError';
		this.cachePath = cachePath;
	}
}

/**
 * config.json exists but cannot be used.
 */
export class ConfigError extends Error {
	readonly configPath: string;

	constructor(configPath: string, message: string) {
		super(`Invalid config.json at ${configPath}: ${message}`);
		this.name = 'ConfigError';
		this.configPath = configPath;
	}
}
