/**
 * Reference search engine: tries plus tiered relevance scoring.
 *
 * Table tiers: exact name 2.0, name substring 1.0, remarks substring 0.8,
 * every query word prefixes a name word 0.6.
 * Column tiers: exact name 2.0, name substring 1.0, type substring 0.7,
 * remarks substring 0.5.
 *
 * Ties keep insertion order. An empty query returns everything in
 * insertion order.
 */

import {createNullLogger, type Logger} from '../lib/logger.js';
import {StringInterner} from './interner.js';
import {identifierWords, normalize} from './text.js';
import {PrefixTrie} from './trie.js';
import {
	toColumnDescriptor,
	toTableDescriptor,
	type ColumnDescriptor,
	type ColumnInput,
	type InternFn,
	type Scored,
	type SearchEngine,
	type TableDescriptor,
	type TableInput,
} from './types.js';

// ============================================================================
// Scores
// ============================================================================

export const TABLE_SCORES = {
	exact: 2.0,
	name: 1.0,
	remarks: 0.8,
	words: 0.6,
} as const;

export const COLUMN_SCORES = {
	exact: 2.0,
	name: 1.0,
	typeName: 0.7,
	remarks: 0.5,
} as const;

// ============================================================================
// Prepared text
// ============================================================================

interface PreparedQuery {
	lower: string;
	normalized: string;
	words: string[];
}

function prepareQuery(query: string): PreparedQuery | null {
	const lower = query.trim().toLowerCase();
	if (lower.length === 0) return null;
	return {lower, normalized: normalize(lower), words: identifierWords(lower)};
}

interface TableEntry {
	descriptor: TableDescriptor;
	ordinal: number;
	nameLower: string;
	nameNormalized: string;
	remarksLower: string;
	words: string[];
}

interface ColumnEntry {
	descriptor: ColumnDescriptor;
	ordinal: number;
	nameLower: string;
	nameNormalized: string;
	typeLower: string;
	remarksLower: string;
}

function prepareTable(descriptor: TableDescriptor, ordinal: number): TableEntry {
	const nameLower = descriptor.name.toLowerCase();
	return {
		descriptor,
		ordinal,
		nameLower,
		nameNormalized: normalize(nameLower),
		remarksLower: descriptor.remarks.toLowerCase(),
		words: identifierWords(nameLower),
	};
}

function prepareColumn(
	descriptor: ColumnDescriptor,
	ordinal: number,
): ColumnEntry {
	const nameLower = descriptor.name.toLowerCase();
	return {
		descriptor,
		ordinal,
		nameLower,
		nameNormalized: normalize(nameLower),
		typeLower: descriptor.typeName.toLowerCase(),
		remarksLower: descriptor.remarks.toLowerCase(),
	};
}

function scoreTableEntry(entry: TableEntry, query: PreparedQuery): number {
	if (
		entry.nameLower === query.lower ||
		entry.nameNormalized === query.normalized
	) {
		return TABLE_SCORES.exact;
	}
	if (
		entry.nameLower.includes(query.lower) ||
		entry.nameNormalized.includes(query.normalized)
	) {
		return TABLE_SCORES.name;
	}
	if (entry.remarksLower.includes(query.lower)) return TABLE_SCORES.remarks;
	if (
		query.words.length > 0 &&
		query.words.every(word => entry.words.some(w => w.startsWith(word)))
	) {
		return TABLE_SCORES.words;
	}
	return 0;
}

function scoreColumnEntry(entry: ColumnEntry, query: PreparedQuery): number {
	if (
		entry.nameLower === query.lower ||
		entry.nameNormalized === query.normalized
	) {
		return COLUMN_SCORES.exact;
	}
	if (
		entry.nameLower.includes(query.lower) ||
		entry.nameNormalized.includes(query.normalized)
	) {
		return COLUMN_SCORES.name;
	}
	if (entry.typeLower.includes(query.lower)) return COLUMN_SCORES.typeName;
	if (entry.remarksLower.includes(query.lower)) return COLUMN_SCORES.remarks;
	return 0;
}

/**
 * Relevance of one table for a query (0 when it does not match).
 */
export function scoreTable(table: TableDescriptor, query: string): number {
	const prepared = prepareQuery(query);
	return prepared ? scoreTableEntry(prepareTable(table, 0), prepared) : 0;
}

/**
 * Relevance of one column for a query (0 when it does not match).
 */
export function scoreColumn(column: ColumnDescriptor, query: string): number {
	const prepared = prepareQuery(query);
	return prepared ? scoreColumnEntry(prepareColumn(column, 0), prepared) : 0;
}

function rank<E extends {ordinal: number}>(
	candidates: Iterable<E>,
	score: (entry: E) => number,
): Array<{entry: E; score: number}> {
	const hits: Array<{entry: E; score: number}> = [];
	for (const entry of candidates) {
		const value = score(entry);
		if (value > 0) hits.push({entry, score: value});
	}
	hits.sort((a, b) => b.score - a.score || a.entry.ordinal - b.entry.ordinal);
	return hits;
}

// ============================================================================
// Index state
// ============================================================================

/**
 * One complete index. Built off to the side and swapped in whole.
 */
interface IndexState {
	tables: TableEntry[];
	columns: ColumnEntry[];
	tableNames: PrefixTrie<string>;
	tableWords: PrefixTrie<string>;
	columnNames: PrefixTrie<string>;
	columnWords: PrefixTrie<string>;
	/** Lower-cased name -> every table with that name */
	tablesByKey: Map<string, TableEntry[]>;
	/** Lower-cased name -> every column with that name */
	columnsByKey: Map<string, ColumnEntry[]>;
}

function emptyState(): IndexState {
	return {
		tables: [],
		columns: [],
		tableNames: new PrefixTrie(),
		tableWords: new PrefixTrie(),
		columnNames: new PrefixTrie(),
		columnWords: new PrefixTrie(),
		tablesByKey: new Map(),
		columnsByKey: new Map(),
	};
}

function addToBucket<E>(map: Map<string, E[]>, key: string, entry: E): void {
	const bucket = map.get(key);
	if (bucket) bucket.push(entry);
	else map.set(key, [entry]);
}

export interface ReferenceSearchEngineOptions {
	/** Shared interner; a private pool is used when omitted */
	intern?: InternFn;
	logger?: Logger;
}

// ============================================================================
// Engine
// ============================================================================

export class ReferenceSearchEngine implements SearchEngine {
	private state: IndexState = emptyState();
	private readonly intern: InternFn;
	private readonly logger: Logger;

	constructor(options: ReferenceSearchEngineOptions = {}) {
		if (options.intern) {
			this.intern = options.intern;
		} else {
			const interner = new StringInterner();
			this.intern = value => interner.intern(value);
		}
		this.logger = options.logger ?? createNullLogger();
	}

	get tableCount(): number {
		return this.state.tables.length;
	}

	get columnCount(): number {
		return this.state.columns.length;
	}

	buildIndex(
		tables: readonly TableInput[],
		columns: readonly ColumnInput[],
	): void {
		const start = Date.now();
		const next = emptyState();
		let skipped = 0;

		for (const input of tables) {
			const descriptor = toTableDescriptor(input, this.intern);
			if (!descriptor) {
				skipped++;
				continue;
			}
			const entry = prepareTable(descriptor, next.tables.length);
			next.tables.push(entry);
			addToBucket(next.tablesByKey, entry.nameLower, entry);
			next.tableNames.insert(entry.nameLower, entry.nameLower);
			for (const word of entry.words) {
				next.tableWords.insert(word, entry.nameLower);
			}
		}

		for (const input of columns) {
			const descriptor = toColumnDescriptor(input, this.intern);
			if (!descriptor) {
				skipped++;
				continue;
			}
			const entry = prepareColumn(descriptor, next.columns.length);
			next.columns.push(entry);
			addToBucket(next.columnsByKey, entry.nameLower, entry);
			next.columnNames.insert(entry.nameLower, entry.nameLower);
			for (const word of identifierWords(entry.nameLower)) {
				next.columnWords.insert(word, entry.nameLower);
			}
		}

		this.state = next;
		this.logger.debug('SearchIndex', 'Index built', {
			tables: next.tables.length,
			columns: next.columns.length,
			skipped,
			durationMs: Date.now() - start,
		});
	}

	searchTables(query: string): TableDescriptor[] {
		return this.scoreTables(query).map(hit => hit.item);
	}

	searchColumns(query: string): ColumnDescriptor[] {
		return this.scoreColumns(query).map(hit => hit.item);
	}

	scoreTables(query: string): Array<Scored<TableDescriptor>> {
		const state = this.state;
		const prepared = prepareQuery(query);
		if (!prepared) {
			return state.tables.map(entry => ({item: entry.descriptor, score: 0}));
		}

		const keys = new Set<string>(state.tableNames.searchPrefix(prepared.lower));
		for (const word of prepared.words) {
			for (const key of state.tableWords.searchPrefix(word)) keys.add(key);
		}

		const candidates = new Set<TableEntry>();
		for (const key of keys) {
			for (const entry of state.tablesByKey.get(key) ?? []) {
				candidates.add(entry);
			}
		}
		for (const entry of state.tables) {
			if (
				entry.nameLower.includes(prepared.lower) ||
				entry.nameNormalized.includes(prepared.normalized) ||
				entry.remarksLower.includes(prepared.lower)
			) {
				candidates.add(entry);
			}
		}

		return rank(candidates, entry => scoreTableEntry(entry, prepared)).map(
			hit => ({item: hit.entry.descriptor, score: hit.score}),
		);
	}

	scoreColumns(query: string): Array<Scored<ColumnDescriptor>> {
		const state = this.state;
		const prepared = prepareQuery(query);
		if (!prepared) {
			return state.columns.map(entry => ({item: entry.descriptor, score: 0}));
		}

		const keys = new Set<string>(
			state.columnNames.searchPrefix(prepared.lower),
		);
		for (const word of prepared.words) {
			for (const key of state.columnWords.searchPrefix(word)) keys.add(key);
		}

		const candidates = new Set<ColumnEntry>();
		for (const key of keys) {
			for (const entry of state.columnsByKey.get(key) ?? []) {
				candidates.add(entry);
			}
		}
		for (const entry of state.columns) {
			if (
				entry.nameLower.includes(prepared.lower) ||
				entry.nameNormalized.includes(prepared.normalized) ||
				entry.typeLower.includes(prepared.lower) ||
				entry.remarksLower.includes(prepared.lower)
			) {
				candidates.add(entry);
			}
		}

		return rank(candidates, entry => scoreColumnEntry(entry, prepared)).map(
			hit => ({item: hit.entry.descriptor, score: hit.score}),
		);
	}
}
