/**
 * Search Manager - owns the published index and answers UI searches.
 *
 * publish() builds a complete engine off to the side and swaps it in, so
 * a search never sees a half-built index. Results are cached per mode and
 * query until the TTL runs out or the next publish.
 */

import {ReferenceSearchEngine} from '../engine/search-index.js';
import {StringInterner} from '../engine/interner.js';
import {humanizeSchemaName} from '../engine/text.js';
import {
	tableIdentity,
	toTableDescriptor,
	type ColumnDescriptor,
	type ColumnInput,
	type InternFn,
	type SearchEngine,
	type TableDescriptor,
	type TableInput,
} from '../engine/types.js';
import {DEFAULT_CACHE_TTL_MS, DEFAULT_MAX_RESULTS} from '../lib/constants.js';
import {createNullLogger, type Logger} from '../lib/logger.js';

// ============================================================================
// Types
// ============================================================================

export type SearchMode = 'tables' | 'columns' | 'advanced';

/** A matching table; matchedColumns is filled in advanced mode */
export interface TableHit {
	type: 'table';
	table: TableDescriptor;
	schemaLabel: string;
	score: number;
	matchedColumns: string[];
}

/** Column-mode aggregate: how many columns of one table matched */
export interface TableSummaryHit {
	type: 'table-summary';
	schema: string;
	table: string;
	schemaLabel: string;
	matchCount: number;
	/** Best score among the matching columns */
	score: number;
}

export interface ColumnHit {
	type: 'column';
	column: ColumnDescriptor;
	score: number;
}

export type SearchHit = TableHit | TableSummaryHit | ColumnHit;

export interface SearchCacheStats {
	hits: number;
	misses: number;
	size: number;
	searches: number;
}

export interface SearchManagerOptions {
	/** Factory for a fresh engine per publish (default: reference engine) */
	createEngine?: () => SearchEngine;
	intern?: InternFn;
	/** Max age of a cached result in ms (default: 1 hour) */
	resultTtlMs?: number;
	/** Max hits per search (default: 1000) */
	maxResults?: number;
	/** Clock, for tests */
	now?: () => number;
	logger?: Logger;
}

interface CachedResult {
	hits: SearchHit[];
	createdAt: number;
}

/**
 * Callers get their own hit objects; cached ones are never handed out.
 * Descriptors are frozen and shared.
 */
function copyHit(hit: SearchHit): SearchHit {
	return hit.type === 'table'
		? {...hit, matchedColumns: [...hit.matchedColumns]}
		: {...hit};
}

// ============================================================================
// Manager
// ============================================================================

export class SearchManager {
	private engine: SearchEngine;
	private tablesById = new Map<string, TableDescriptor>();
	private readonly results = new Map<string, CachedResult>();
	private readonly createEngine: () => SearchEngine;
	private readonly intern: InternFn;
	private readonly resultTtlMs: number;
	private readonly maxResults: number;
	private readonly now: () => number;
	private readonly logger: Logger;
	private cacheHits = 0;
	private cacheMisses = 0;
	private searches = 0;

	constructor(options: SearchManagerOptions = {}) {
		if (options.intern) {
			this.intern = options.intern;
		} else {
			const interner = new StringInterner();
			this.intern = value => interner.intern(value);
		}
		this.logger = options.logger ?? createNullLogger();
		const intern = this.intern;
		const logger = this.logger;
		this.createEngine =
			options.createEngine ?? (() => new ReferenceSearchEngine({intern, logger}));
		this.resultTtlMs = options.resultTtlMs ?? DEFAULT_CACHE_TTL_MS;
		this.maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
		this.now = options.now ?? Date.now;
		this.engine = this.createEngine();
	}

	get tableCount(): number {
		return this.engine.tableCount;
	}

	get columnCount(): number {
		return this.engine.columnCount;
	}

	/**
	 * Build a new index from the given catalog and make it the live one.
	 * Cached results belong to the old index and are dropped.
	 */
	publish(
		tables: readonly TableInput[],
		columns: readonly ColumnInput[],
	): void {
		const engine = this.createEngine();
		engine.buildIndex(tables, columns);

		const tablesById = new Map<string, TableDescriptor>();
		for (const input of tables) {
			const table = toTableDescriptor(input, this.intern);
			if (table && !tablesById.has(tableIdentity(table))) {
				tablesById.set(tableIdentity(table), table);
			}
		}

		this.engine = engine;
		this.tablesById = tablesById;
		this.results.clear();
		this.logger.info('SearchManager', 'Index published', {
			tables: engine.tableCount,
			columns: engine.columnCount,
		});
	}

	search(query: string, mode: SearchMode = 'tables'): SearchHit[] {
		const trimmed = query.trim();
		if (trimmed.length === 0) return [];

		this.searches++;
		const key = `${mode}:${trimmed.toLowerCase()}`;
		const cached = this.results.get(key);
		if (cached) {
			if (this.now() - cached.createdAt <= this.resultTtlMs) {
				this.cacheHits++;
				return cached.hits.map(copyHit);
			}
			this.results.delete(key);
		}
		this.cacheMisses++;

		const start = Date.now();
		const hits = this.run(trimmed, mode).slice(0, this.maxResults);
		this.results.set(key, {hits, createdAt: this.now()});
		this.logger.debug('SearchManager', 'Search', {
			mode,
			query: trimmed,
			hits: hits.length,
			durationMs: Date.now() - start,
		});
		return hits.map(copyHit);
	}

	stats(): SearchCacheStats {
		return {
			hits: this.cacheHits,
			misses: this.cacheMisses,
			size: this.results.size,
			searches: this.searches,
		};
	}

	clearCache(): void {
		this.results.clear();
		this.cacheHits = 0;
		this.cacheMisses = 0;
		this.searches = 0;
	}

	// ==========================================================================
	// Modes
	// ==========================================================================

	private run(query: string, mode: SearchMode): SearchHit[] {
		switch (mode) {
			case 'tables':
				return this.tableHits(query);
			case 'columns':
				return this.columnHits(query);
			case 'advanced':
				return this.advancedHits(query);
		}
	}

	private tableHits(query: string): TableHit[] {
		return this.engine.scoreTables(query).map(hit => ({
			type: 'table',
			table: hit.item,
			schemaLabel: humanizeSchemaName(hit.item.schema),
			score: hit.score,
			matchedColumns: [],
		}));
	}

	/**
	 * One summary per table that has matching columns, in order of its best
	 * column, followed by the column hits themselves.
	 */
	private columnHits(query: string): SearchHit[] {
		const scored = this.engine.scoreColumns(query);
		const summaries = new Map<string, TableSummaryHit>();

		for (const hit of scored) {
			const id = `${hit.item.schema}.${hit.item.table}`;
			const summary = summaries.get(id);
			if (summary) {
				summary.matchCount++;
				summary.score = Math.max(summary.score, hit.score);
			} else {
				summaries.set(id, {
					type: 'table-summary',
					schema: hit.item.schema,
					table: hit.item.table,
					schemaLabel: humanizeSchemaName(hit.item.schema),
					matchCount: 1,
					score: hit.score,
				});
			}
		}

		const columns: ColumnHit[] = scored.map(hit => ({
			type: 'column',
			column: hit.item,
			score: hit.score,
		}));
		return [...summaries.values(), ...columns];
	}

	/**
	 * Tables matching by themselves or through their columns, one hit per
	 * schema.table, scored by the better of the two.
	 */
	private advancedHits(query: string): TableHit[] {
		const merged = new Map<string, TableHit>();
		for (const hit of this.tableHits(query)) {
			merged.set(tableIdentity(hit.table), hit);
		}

		for (const hit of this.engine.scoreColumns(query)) {
			const id = `${hit.item.schema}.${hit.item.table}`;
			const existing = merged.get(id);
			if (existing) {
				existing.matchedColumns.push(hit.item.name);
				existing.score = Math.max(existing.score, hit.score);
				continue;
			}
			const table = this.tablesById.get(id) ?? {
				schema: hit.item.schema,
				name: hit.item.table,
				remarks: '',
			};
			merged.set(id, {
				type: 'table',
				table,
				schemaLabel: humanizeSchemaName(table.schema),
				score: hit.score,
				matchedColumns: [hit.item.name],
			});
		}

		return [...merged.values()].sort((a, b) => b.score - a.score);
	}
}
