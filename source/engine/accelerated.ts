/**
 * Optional acceleration provider.
 *
 * A provider is any module exporting:
 * - FastSearchIndex: class with buildIndex(tables, columns),
 *   searchTables(query), searchColumns(query)
 * - normalize(text), splitWords(text), intern(text)
 *
 * The module is loaded once at startup. When it is not configured, not
 * installed, or does not have the right shape, the reference engine is
 * used instead. That fallback is silent apart from a debug log.
 */

import {errorMessage} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import {StringInterner} from './interner.js';
import {
	ReferenceSearchEngine,
	scoreColumn,
	scoreTable,
} from './search-index.js';
import {normalize, splitWords} from './text.js';
import {
	columnIdentity,
	tableIdentity,
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
// Provider contract
// ============================================================================

export interface FastSearchIndex {
	buildIndex(
		tables: readonly TableDescriptor[],
		columns: readonly ColumnDescriptor[],
	): void;
	searchTables(query: string): unknown;
	searchColumns(query: string): unknown;
}

export interface AccelerationProvider {
	FastSearchIndex: new () => unknown;
	normalize(text: string): string;
	splitWords(text: string): string[];
	intern(text: string): string;
}

export interface TextFunctions {
	normalize(text: string): string;
	splitWords(text: string): string[];
	intern: InternFn;
}

export type EngineImplementation = 'reference' | 'accelerated';

export interface AccelerationStatus {
	implementation: EngineImplementation;
	accelerated: boolean;
	moduleId?: string;
	/** Why the reference engine is in use, when a module was configured */
	reason?: string;
}

export type ModuleImporter = (moduleId: string) => Promise<unknown>;

const defaultImporter: ModuleImporter = moduleId => import(moduleId);

function isObject(value: unknown): value is object {
	return (
		(typeof value === 'object' || typeof value === 'function') &&
		value !== null
	);
}

export function isAccelerationProvider(
	value: unknown,
): value is AccelerationProvider {
	return (
		isObject(value) &&
		'FastSearchIndex' in value &&
		typeof value.FastSearchIndex === 'function' &&
		'normalize' in value &&
		typeof value.normalize === 'function' &&
		'splitWords' in value &&
		typeof value.splitWords === 'function' &&
		'intern' in value &&
		typeof value.intern === 'function'
	);
}

export function isFastSearchIndex(value: unknown): value is FastSearchIndex {
	return (
		isObject(value) &&
		'buildIndex' in value &&
		typeof value.buildIndex === 'function' &&
		'searchTables' in value &&
		typeof value.searchTables === 'function' &&
		'searchColumns' in value &&
		typeof value.searchColumns === 'function'
	);
}

function createFastIndex(provider: AccelerationProvider): FastSearchIndex {
	const instance: unknown = new provider.FastSearchIndex();
	if (!isFastSearchIndex(instance)) {
		throw new TypeError(
			'FastSearchIndex instance lacks buildIndex/searchTables/searchColumns',
		);
	}
	return instance;
}

// ============================================================================
// Provider loading
// ============================================================================

export interface ProviderLoadOptions {
	moduleId?: string;
	importer?: ModuleImporter;
	logger?: Logger;
}

export interface ProviderLoadResult {
	provider: AccelerationProvider | null;
	status: AccelerationStatus;
}

/**
 * Try to load an acceleration provider. Never throws.
 */
export async function loadAccelerationProvider(
	options: ProviderLoadOptions = {},
): Promise<ProviderLoadResult> {
	const logger = options.logger ?? createNullLogger();
	const moduleId = options.moduleId?.trim();
	if (!moduleId) {
		return {
			provider: null,
			status: {implementation: 'reference', accelerated: false},
		};
	}

	const fallback = (reason: string): ProviderLoadResult => {
		logger.debug('Acceleration', 'Using reference engine', {moduleId, reason});
		return {
			provider: null,
			status: {
				implementation: 'reference',
				accelerated: false,
				moduleId,
				reason,
			},
		};
	};

	let loaded: unknown;
	try {
		loaded = await (options.importer ?? defaultImporter)(moduleId);
	} catch (error) {
		return fallback(`import failed: ${errorMessage(error)}`);
	}

	// CommonJS providers arrive under `default`
	const candidate =
		!isAccelerationProvider(loaded) && isObject(loaded) && 'default' in loaded
			? loaded.default
			: loaded;
	if (!isAccelerationProvider(candidate)) {
		return fallback('module does not export the acceleration API');
	}

	try {
		createFastIndex(candidate);
	} catch (error) {
		return fallback(`FastSearchIndex unusable: ${errorMessage(error)}`);
	}

	logger.info('Acceleration', 'Acceleration provider active', {moduleId});
	return {
		provider: candidate,
		status: {implementation: 'accelerated', accelerated: true, moduleId},
	};
}

// ============================================================================
// Accelerated engine
// ============================================================================

/**
 * Score provider results with the reference scoring and order them the
 * way the reference engine does: score descending, then build order.
 * Items scoring 0 are dropped.
 */
function rankFound<T>(
	found: readonly T[],
	ordinals: ReadonlyMap<T, number>,
	score: (item: T) => number,
): Array<Scored<T>> {
	const hits: Array<{item: T; score: number; ordinal: number}> = [];
	for (const item of new Set(found)) {
		const value = score(item);
		if (value > 0) {
			const ordinal = ordinals.get(item) ?? ordinals.size;
			hits.push({item, score: value, ordinal});
		}
	}
	hits.sort((a, b) => b.score - a.score || a.ordinal - b.ordinal);
	return hits.map(hit => ({item: hit.item, score: hit.score}));
}

/**
 * SearchEngine backed by a provider's FastSearchIndex.
 *
 * Descriptors are built here and handed to the provider; whatever the
 * provider returns is mapped back to those descriptors by identity.
 * If the provider throws, this instance switches to the reference engine
 * for good.
 */
export class AcceleratedSearchEngine implements SearchEngine {
	private index: FastSearchIndex | null = null;
	private tablesById = new Map<string, TableDescriptor>();
	private columnsById = new Map<string, ColumnDescriptor>();
	private tableOrdinals = new Map<TableDescriptor, number>();
	private columnOrdinals = new Map<ColumnDescriptor, number>();
	private tables: TableDescriptor[] = [];
	private columns: ColumnDescriptor[] = [];
	private fallback: ReferenceSearchEngine | null = null;
	private readonly logger: Logger;
	private readonly intern: InternFn;

	constructor(
		private readonly provider: AccelerationProvider,
		logger?: Logger,
	) {
		this.logger = logger ?? createNullLogger();
		this.intern = value => provider.intern(value);
	}

	get degraded(): boolean {
		return this.fallback !== null;
	}

	get tableCount(): number {
		return this.fallback ? this.fallback.tableCount : this.tables.length;
	}

	get columnCount(): number {
		return this.fallback ? this.fallback.columnCount : this.columns.length;
	}

	buildIndex(
		tables: readonly TableInput[],
		columns: readonly ColumnInput[],
	): void {
		if (this.fallback) {
			this.fallback.buildIndex(tables, columns);
			return;
		}

		const tableList: TableDescriptor[] = [];
		const tablesById = new Map<string, TableDescriptor>();
		for (const input of tables) {
			const descriptor = toTableDescriptor(input, this.intern);
			if (!descriptor) continue;
			tableList.push(descriptor);
			tablesById.set(tableIdentity(descriptor), descriptor);
		}

		const columnList: ColumnDescriptor[] = [];
		const columnsById = new Map<string, ColumnDescriptor>();
		for (const input of columns) {
			const descriptor = toColumnDescriptor(input, this.intern);
			if (!descriptor) continue;
			columnList.push(descriptor);
			columnsById.set(columnIdentity(descriptor), descriptor);
		}

		try {
			const index = createFastIndex(this.provider);
			index.buildIndex(tableList, columnList);
			this.index = index;
		} catch (error) {
			this.degrade(error).buildIndex(tables, columns);
			return;
		}

		this.tables = tableList;
		this.columns = columnList;
		this.tablesById = tablesById;
		this.columnsById = columnsById;
		this.tableOrdinals = new Map(
			tableList.map((table, i): [TableDescriptor, number] => [table, i]),
		);
		this.columnOrdinals = new Map(
			columnList.map((col, i): [ColumnDescriptor, number] => [col, i]),
		);
	}

	searchTables(query: string): TableDescriptor[] {
		return this.scoreTables(query).map(hit => hit.item);
	}

	searchColumns(query: string): ColumnDescriptor[] {
		return this.scoreColumns(query).map(hit => hit.item);
	}

	scoreTables(query: string): Array<Scored<TableDescriptor>> {
		if (this.fallback) return this.fallback.scoreTables(query);
		if (query.trim().length === 0) {
			return this.tables.map(item => ({item, score: 0}));
		}
		const index = this.index;
		if (!index) return [];

		let raw: unknown;
		try {
			raw = index.searchTables(query);
		} catch (error) {
			this.degradeAndRebuild(error);
			return this.scoreTables(query);
		}
		return rankFound(
			this.resolve(raw, item => this.lookupTable(item)),
			this.tableOrdinals,
			item => scoreTable(item, query),
		);
	}

	scoreColumns(query: string): Array<Scored<ColumnDescriptor>> {
		if (this.fallback) return this.fallback.scoreColumns(query);
		if (query.trim().length === 0) {
			return this.columns.map(item => ({item, score: 0}));
		}
		const index = this.index;
		if (!index) return [];

		let raw: unknown;
		try {
			raw = index.searchColumns(query);
		} catch (error) {
			this.degradeAndRebuild(error);
			return this.scoreColumns(query);
		}
		return rankFound(
			this.resolve(raw, item => this.lookupColumn(item)),
			this.columnOrdinals,
			item => scoreColumn(item, query),
		);
	}

	private resolve<T>(raw: unknown, lookup: (item: object) => T | undefined): T[] {
		if (!Array.isArray(raw)) return [];
		const results: T[] = [];
		for (const item of raw) {
			if (!isObject(item)) continue;
			const found = lookup(item);
			if (found) results.push(found);
		}
		return results;
	}

	private lookupTable(item: object): TableDescriptor | undefined {
		if (!('schema' in item) || !('name' in item)) return undefined;
		return this.tablesById.get(`${String(item.schema)}.${String(item.name)}`);
	}

	private lookupColumn(item: object): ColumnDescriptor | undefined {
		if (!('schema' in item) || !('table' in item) || !('name' in item)) {
			return undefined;
		}
		return this.columnsById.get(
			`${String(item.schema)}.${String(item.table)}.${String(item.name)}`,
		);
	}

	private degrade(error: unknown): ReferenceSearchEngine {
		this.logger.warn('Acceleration', 'Provider failed, using reference engine', {
			error: errorMessage(error),
		});
		const fallback = new ReferenceSearchEngine({
			intern: this.intern,
			logger: this.logger,
		});
		this.fallback = fallback;
		this.index = null;
		return fallback;
	}

	private degradeAndRebuild(error: unknown): void {
		this.degrade(error).buildIndex(this.tables, this.columns);
	}
}

// ============================================================================
// Selection
// ============================================================================

export interface SearchEngineSelection {
	createEngine(): SearchEngine;
	text: TextFunctions;
	status: AccelerationStatus;
}

export interface SelectOptions extends ProviderLoadOptions {
	/** Interner used by the reference implementation */
	interner?: StringInterner;
}

/**
 * Load the provider once and return a factory for the chosen implementation.
 */
export async function selectSearchEngine(
	options: SelectOptions = {},
): Promise<SearchEngineSelection> {
	const logger = options.logger ?? createNullLogger();
	const {provider, status} = await loadAccelerationProvider(options);

	if (provider) {
		return {
			createEngine: () => new AcceleratedSearchEngine(provider, logger),
			text: {
				normalize: value => provider.normalize(value),
				splitWords: value => provider.splitWords(value),
				intern: value => provider.intern(value),
			},
			status,
		};
	}

	const interner = options.interner ?? new StringInterner();
	const intern: InternFn = value => interner.intern(value);
	return {
		createEngine: () => new ReferenceSearchEngine({intern, logger}),
		text: {normalize, splitWords, intern},
		status,
	};
}
