/**
 * Metadata Cache - gzip-compressed JSON file of catalog results.
 *
 * One file holds every entry: Record<cacheKey, {tables, columns, created_at}>.
 * The file is shared between processes without locking, so:
 * - any read or decode failure is a miss (the map is treated as empty)
 * - writes go to a temp file that is renamed over the cache file; the last
 *   writer wins
 *
 * Nothing in here throws. Caching is an optimization; failures are logged
 * at debug level and otherwise ignored.
 */

import fs from 'node:fs';
import path from 'node:path';
import zlib from 'node:zlib';
import {z} from 'zod';
import type {ColumnDescriptor, TableDescriptor} from '../engine/types.js';
import {
	DEFAULT_CACHE_TTL_MS,
	DEFAULT_COMPRESSION_LEVEL,
	getCacheFilePath,
	getScoutHomeDir,
} from '../lib/constants.js';
import {CacheCorruptionError, CacheWriteError} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import {cacheKey} from './key.js';

// ============================================================================
// Schemas
// ============================================================================

const tableSchema = z.object({
	schema: z.string(),
	name: z.string(),
	remarks: z.string(),
});

const columnSchema = z.object({
	schema: z.string(),
	table: z.string(),
	name: z.string(),
	typeName: z.string(),
	length: z.number().int().optional(),
	scale: z.number().int().optional(),
	nullable: z.enum(['Y', 'N']),
	remarks: z.string(),
});

const cacheEntrySchema = z.object({
	tables: z.array(tableSchema),
	columns: z.array(columnSchema),
	/** Epoch milliseconds */
	created_at: z.number(),
});

const cacheFileSchema = z.record(z.string(), z.unknown());

type CacheFile = Record<string, unknown>;

export interface CacheEntry {
	tables: TableDescriptor[];
	columns: ColumnDescriptor[];
	/** Epoch milliseconds */
	created_at: number;
}

export interface MetadataCacheOptions {
	/** Directory of the cache file (default: schema-scout home) */
	cacheDir?: string;
	/** Max entry age in ms (default: 1 hour) */
	ttlMs?: number;
	/** gzip level 0-9 (default: 5) */
	compressionLevel?: number;
	/** Clock, for tests */
	now?: () => number;
	logger?: Logger;
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// Cache
// ============================================================================

export class MetadataCache {
	readonly filePath: string;
	readonly ttlMs: number;
	private readonly compressionLevel: number;
	private readonly now: () => number;
	private readonly logger: Logger;

	constructor(options: MetadataCacheOptions = {}) {
		this.filePath = getCacheFilePath(options.cacheDir ?? getScoutHomeDir());
		this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
		this.compressionLevel =
			options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL;
		this.now = options.now ?? Date.now;
		this.logger = options.logger ?? createNullLogger();
	}

	/**
	 * Fresh entry for a request, or null on any kind of miss.
	 */
	load(
		schemaFilter?: string | null,
		limit?: number | null,
		offset?: number | null,
	): CacheEntry | null {
		const key = cacheKey(schemaFilter, limit, offset);
		const map = this.readOrEmpty();
		if (!Object.hasOwn(map, key)) return null;

		const parsed = cacheEntrySchema.safeParse(map[key]);
		if (!parsed.success) {
			this.logger.debug('MetadataCache', 'Ignoring malformed cache entry', {
				key,
				issue: parsed.error.issues[0]?.message,
			});
			return null;
		}

		const entry = parsed.data;
		if (this.isExpired(entry.created_at)) {
			this.logger.debug('MetadataCache', 'Cache entry expired', {key});
			return null;
		}

		return {
			tables: entry.tables.map(table => Object.freeze(table)),
			columns: entry.columns.map(column => Object.freeze(column)),
			created_at: entry.created_at,
		};
	}

	/**
	 * Upsert an entry stamped with the current time. Best effort.
	 */
	save(
		schemaFilter: string | null | undefined,
		tables: readonly TableDescriptor[],
		columns: readonly ColumnDescriptor[],
		limit?: number | null,
		offset?: number | null,
	): void {
		const key = cacheKey(schemaFilter, limit, offset);
		const map = this.readOrEmpty();
		map[key] = {tables, columns, created_at: this.now()};
		if (this.write(map)) {
			this.logger.debug('MetadataCache', 'Saved cache entry', {
				key,
				tables: tables.length,
				columns: columns.length,
			});
		}
	}

	/**
	 * Drop one entry. Best effort.
	 */
	invalidate(
		schemaFilter?: string | null,
		limit?: number | null,
		offset?: number | null,
	): void {
		const key = cacheKey(schemaFilter, limit, offset);
		const map = this.readOrEmpty();
		if (!Object.hasOwn(map, key)) return;
		delete map[key];
		this.write(map);
	}

	/**
	 * Delete the cache file. Best effort.
	 */
	clear(): void {
		try {
			fs.rmSync(this.filePath, {force: true});
		} catch (error) {
			this.logger.debug('MetadataCache', 'Could not delete cache file', {
				error: new CacheWriteError(this.filePath, error).message,
			});
		}
	}

	/**
	 * Remove expired and malformed entries. Returns how many were removed.
	 */
	prune(): number {
		const map = this.readOrEmpty();
		let removed = 0;
		for (const [key, value] of Object.entries(map)) {
			const parsed = cacheEntrySchema.safeParse(value);
			if (!parsed.success || this.isExpired(parsed.data.created_at)) {
				delete map[key];
				removed++;
			}
		}
		if (removed > 0 && !this.write(map)) return 0;
		return removed;
	}

	/**
	 * Keys currently stored in the file, fresh or not.
	 */
	keys(): string[] {
		return Object.keys(this.readOrEmpty());
	}

	private isExpired(createdAt: number): boolean {
		return this.now() - createdAt > this.ttlMs;
	}

	private readOrEmpty(): CacheFile {
		try {
			return this.read();
		} catch (error) {
			if (error instanceof CacheCorruptionError) {
				this.logger.debug('MetadataCache', 'Treating cache as empty', {
					error: error.message,
				});
				return {};
			}
			throw error;
		}
	}

	/**
	 * Decode the cache file. Missing file is an empty map; anything else
	 * that goes wrong is a CacheCorruptionError.
	 */
	private read(): CacheFile {
		let compressed: Buffer;
		try {
			compressed = fs.readFileSync(this.filePath);
		} catch (error) {
			if (isMissingFile(error)) return {};
			throw new CacheCorruptionError(this.filePath, error);
		}

		try {
			const json = zlib.gunzipSync(compressed).toString('utf-8');
			const parsed = cacheFileSchema.safeParse(JSON.parse(json));
			if (!parsed.success) {
				throw new Error('cache file is not an object map');
			}
			return parsed.data;
		} catch (error) {
			throw new CacheCorruptionError(this.filePath, error);
		}
	}

	private write(map: CacheFile): boolean {
		const tempPath = `${this.filePath}.${process.pid}.${this.now()}.tmp`;
		try {
			fs.mkdirSync(path.dirname(this.filePath), {recursive: true});
			const compressed = zlib.gzipSync(JSON.stringify(map), {
				level: this.compressionLevel,
			});
			fs.writeFileSync(tempPath, compressed);
			fs.renameSync(tempPath, this.filePath);
			return true;
		} catch (error) {
			this.logger.debug('MetadataCache', 'Cache write skipped', {
				error: new CacheWriteError(this.filePath, error).message,
			});
			try {
				fs.rmSync(tempPath, {force: true});
			} catch (cleanupError) {
				this.logger.debug('MetadataCache', 'Temp file left behind', {
					tempPath,
					error: String(cleanupError),
				});
			}
			return false;
		}
	}
}
