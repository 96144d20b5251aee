/**
 * Metadata Loader - cache-first catalog retrieval with mock fallback.
 *
 * Every operation is written once, as a generator that yields the SQL it
 * needs and receives the fetched rows back. Two small drivers run those
 * generators: one against a synchronous RowFetcher, one against an
 * AsyncRowFetcher. The fetch is the only suspension point; cache access,
 * parsing and interning stay synchronous.
 *
 * A failed fetch reaches the generator as a FetchFailure. Outside mock mode
 * it propagates to the caller; in mock mode it is replaced by
 * deterministic mock data.
 */

import pLimit from 'p-limit';
import type {MetadataCache} from '../cache/metadata-cache.js';
import {StringInterner} from '../engine/interner.js';
import {
	toColumnDescriptor,
	toTableDescriptor,
	type ColumnDescriptor,
	type ColumnInput,
	type InternFn,
	type TableDescriptor,
	type TableInput,
} from '../engine/types.js';
import {
	DEFAULT_INITIAL_PAGE_SIZE,
	DEFAULT_PAGE_SIZE,
	DEFAULT_PREFETCH_CONCURRENCY,
} from '../lib/constants.js';
import {FetchFailure, errorMessage} from '../lib/errors.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import {
	generateMockCatalog,
	mockSchemas,
	synthesizeRows,
	type ColumnShape,
} from './mock.js';
import {
	columnsForTablesQuery,
	columnsQuery,
	parseColumnRows,
	parseSchemaRows,
	parseTableRows,
	schemaExistsQuery,
	schemasQuery,
	tableRowsQuery,
	tablesQuery,
	type Page,
	type QueryRow,
	type SchemaInfo,
} from './queries.js';

// ============================================================================
// Types
// ============================================================================

export type RowFetcher = (sql: string) => QueryRow[];
export type AsyncRowFetcher = (sql: string) => Promise<QueryRow[]>;

export type CatalogSource = 'cache' | 'database' | 'mock';

export interface CatalogRequest {
	schemaFilter?: string | null;
	/** Replace fetch failures with mock data (default: false) */
	useMock?: boolean;
	/** Read and write the metadata cache (default: true) */
	useCache?: boolean;
	limit?: number | null;
	offset?: number | null;
}

export interface CatalogResult {
	tables: TableDescriptor[];
	columns: ColumnDescriptor[];
	source: CatalogSource;
}

export interface TableRowsRequest {
	/** Table name, optionally schema-qualified (SCHEMA.TABLE) */
	table: string;
	/** Column metadata, used to type synthetic rows in mock mode */
	columns?: readonly ColumnShape[];
	limit: number;
	offset?: number;
	useMock?: boolean;
}

export interface TableRowsResult {
	columns: string[];
	rows: QueryRow[];
	source: 'database' | 'mock';
}

export interface StreamOptions {
	schemaFilter?: string | null;
	useMock?: boolean;
	useCache?: boolean;
	initialPageSize?: number;
	pageSize?: number;
	startOffset?: number;
}

export interface CatalogPage extends CatalogResult {
	offset: number;
}

export type PrefetchOutcome =
	| {
			schemaFilter: string;
			status: 'fulfilled';
			source: CatalogSource;
			tables: number;
			columns: number;
	  }
	| {schemaFilter: string; status: 'rejected'; error: Error};

export interface MetadataLoaderOptions {
	fetchRows?: RowFetcher;
	fetchRowsAsync?: AsyncRowFetcher;
	/** null disables caching entirely */
	cache?: MetadataCache | null;
	intern?: InternFn;
	logger?: Logger;
	initialPageSize?: number;
	pageSize?: number;
	prefetchConcurrency?: number;
}

// ============================================================================
// Drivers
// ============================================================================

/** An operation: yields SQL, receives rows, returns T. */
type Steps<T> = Generator<string, T, QueryRow[]>;

function toFetchFailure(error: unknown, sql: string): FetchFailure {
	if (error instanceof FetchFailure) return error;
	return new FetchFailure(`Catalog query failed: ${errorMessage(error)}`, {
		query: sql,
		cause: error,
	});
}

function runSync<T>(steps: Steps<T>, fetch: RowFetcher | undefined): T {
	let next = steps.next();
	while (!next.done) {
		const sql = next.value;
		let rows: QueryRow[];
		try {
			if (!fetch) {
				throw new FetchFailure('No row fetcher configured', {query: sql});
			}
			rows = fetch(sql);
		} catch (error) {
			next = steps.throw(toFetchFailure(error, sql));
			continue;
		}
		next = steps.next(rows);
	}
	return next.value;
}

async function runAsync<T>(
	steps: Steps<T>,
	fetch: AsyncRowFetcher | undefined,
): Promise<T> {
	let next = steps.next();
	while (!next.done) {
		const sql = next.value;
		let rows: QueryRow[];
		try {
			if (!fetch) {
				throw new FetchFailure('No row fetcher configured', {query: sql});
			}
			rows = await fetch(sql);
		} catch (error) {
			next = steps.throw(toFetchFailure(error, sql));
			continue;
		}
		next = steps.next(rows);
	}
	return next.value;
}

function toPage(
	limit: number | null | undefined,
	offset: number | null | undefined,
): Page | null {
	if (limit === undefined || limit === null) return null;
	return {limit, offset: offset ?? 0};
}

// ============================================================================
// Loader
// ============================================================================

export class MetadataLoader {
	private readonly fetchRows?: RowFetcher;
	private readonly fetchRowsAsync?: AsyncRowFetcher;
	private readonly cache: MetadataCache | null;
	private readonly intern: InternFn;
	private readonly logger: Logger;
	private readonly initialPageSize: number;
	private readonly pageSize: number;
	private readonly prefetchConcurrency: number;

	constructor(options: MetadataLoaderOptions = {}) {
		this.fetchRows = options.fetchRows;
		this.fetchRowsAsync = options.fetchRowsAsync;
		this.cache = options.cache ?? null;
		if (options.intern) {
			this.intern = options.intern;
		} else {
			const interner = new StringInterner();
			this.intern = value => interner.intern(value);
		}
		this.logger = options.logger ?? createNullLogger();
		this.initialPageSize = options.initialPageSize ?? DEFAULT_INITIAL_PAGE_SIZE;
		this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
		this.prefetchConcurrency =
			options.prefetchConcurrency ?? DEFAULT_PREFETCH_CONCURRENCY;
	}

	// ==========================================================================
	// Public API
	// ==========================================================================

	getAllTablesAndColumns(request: CatalogRequest = {}): CatalogResult {
		return runSync(this.catalogSteps(request), this.fetchRows);
	}

	getAllTablesAndColumnsAsync(
		request: CatalogRequest = {},
	): Promise<CatalogResult> {
		return runAsync(this.catalogSteps(request), this.asyncFetcher());
	}

	fetchTableRows(request: TableRowsRequest): TableRowsResult {
		return runSync(this.tableRowsSteps(request), this.fetchRows);
	}

	fetchTableRowsAsync(request: TableRowsRequest): Promise<TableRowsResult> {
		return runAsync(this.tableRowsSteps(request), this.asyncFetcher());
	}

	getAvailableSchemas(options: {useMock?: boolean} = {}): SchemaInfo[] {
		return runSync(this.schemasSteps(options.useMock ?? false), this.fetchRows);
	}

	getAvailableSchemasAsync(
		options: {useMock?: boolean} = {},
	): Promise<SchemaInfo[]> {
		return runAsync(
			this.schemasSteps(options.useMock ?? false),
			this.asyncFetcher(),
		);
	}

	schemaExists(schema: string, options: {useMock?: boolean} = {}): boolean {
		return runSync(
			this.schemaExistsSteps(schema, options.useMock ?? false),
			this.fetchRows,
		);
	}

	schemaExistsAsync(
		schema: string,
		options: {useMock?: boolean} = {},
	): Promise<boolean> {
		return runAsync(
			this.schemaExistsSteps(schema, options.useMock ?? false),
			this.asyncFetcher(),
		);
	}

	/**
	 * Load the catalog page by page: a small first page, then pageSize
	 * pages until a short or empty page, or a page of mock data. Each page
	 * is cache-first.
	 */
	async *streamCatalog(
		options: StreamOptions = {},
	): AsyncGenerator<CatalogPage, void, undefined> {
		let offset = options.startOffset ?? 0;
		let size = options.initialPageSize ?? this.initialPageSize;
		const pageSize = options.pageSize ?? this.pageSize;

		for (;;) {
			const page = await this.getAllTablesAndColumnsAsync({
				schemaFilter: options.schemaFilter,
				useMock: options.useMock,
				useCache: options.useCache,
				limit: size,
				offset,
			});
			if (page.tables.length === 0) return;

			yield {...page, offset};
			// Mock pages are always full, so the catalog has no end to reach
			if (page.source === 'mock' || page.tables.length < size) return;

			offset += page.tables.length;
			size = pageSize;
		}
	}

	/**
	 * Warm the cache for several schema filters at once. A failing schema
	 * is reported in its outcome and does not stop the others.
	 */
	async prefetchSchemas(
		schemaFilters: readonly string[],
		options: {concurrency?: number; useMock?: boolean} = {},
	): Promise<PrefetchOutcome[]> {
		const limit = pLimit(options.concurrency ?? this.prefetchConcurrency);

		return Promise.all(
			schemaFilters.map(schemaFilter =>
				limit(async (): Promise<PrefetchOutcome> => {
					try {
						const result = await this.getAllTablesAndColumnsAsync({
							schemaFilter,
							useMock: options.useMock,
						});
						return {
							schemaFilter,
							status: 'fulfilled',
							source: result.source,
							tables: result.tables.length,
							columns: result.columns.length,
						};
					} catch (error) {
						this.logger.warn('MetadataLoader', 'Prefetch failed', {
							schemaFilter,
							error: errorMessage(error),
						});
						return {
							schemaFilter,
							status: 'rejected',
							error: error instanceof Error ? error : new Error(String(error)),
						};
					}
				}),
			),
		);
	}

	// ==========================================================================
	// Operations
	// ==========================================================================

	private *catalogSteps(request: CatalogRequest): Steps<CatalogResult> {
		const useCache = (request.useCache ?? true) && this.cache !== null;
		const {schemaFilter, limit, offset} = request;
		const page = toPage(limit, offset);

		if (useCache) {
			const cached = this.cache?.load(schemaFilter, limit, offset);
			if (cached) {
				this.logger.debug('MetadataLoader', 'Catalog served from cache', {
					schemaFilter,
					limit,
					offset,
				});
				return {
					tables: this.toTables(cached.tables),
					columns: this.toColumns(cached.columns),
					source: 'cache',
				};
			}
		}

		let tables: TableDescriptor[];
		let columns: ColumnDescriptor[];
		try {
			const tableRows = yield tablesQuery(schemaFilter, page);
			tables = this.toTables(this.parsed('table', parseTableRows(tableRows)));

			if (page && tables.length === 0) {
				columns = [];
			} else {
				const columnRows = yield page
					? columnsForTablesQuery(tables)
					: columnsQuery(schemaFilter);
				columns = this.toColumns(
					this.parsed('column', parseColumnRows(columnRows)),
				);
			}
		} catch (error) {
			if (!request.useMock) throw error;
			this.logger.warn('MetadataLoader', 'Catalog fetch failed, using mock data', {
				error: errorMessage(error),
			});
			const mock = generateMockCatalog({schemaFilter, limit, offset});
			return {
				tables: this.toTables(mock.tables),
				columns: this.toColumns(mock.columns),
				source: 'mock',
			};
		}

		if (useCache && (tables.length > 0 || columns.length > 0)) {
			this.cache?.save(schemaFilter, tables, columns, limit, offset);
		}

		this.logger.info('MetadataLoader', 'Catalog loaded', {
			schemaFilter,
			limit,
			offset,
			tables: tables.length,
			columns: columns.length,
		});
		return {tables, columns, source: 'database'};
	}

	private *tableRowsSteps(request: TableRowsRequest): Steps<TableRowsResult> {
		const offset = request.offset ?? 0;
		const shapes = request.columns ?? [];

		try {
			const rows = yield tableRowsQuery(request.table, {
				limit: request.limit,
				offset,
			});
			const first = rows[0];
			return {
				columns: first ? Object.keys(first) : shapes.map(col => col.name),
				rows,
				source: 'database',
			};
		} catch (error) {
			// Without column metadata there is nothing to type the rows by
			if (!request.useMock || shapes.length === 0) throw error;
			this.logger.debug('MetadataLoader', 'Synthesizing table rows', {
				table: request.table,
				limit: request.limit,
				offset,
			});
			return {
				columns: shapes.map(col => col.name),
				rows: synthesizeRows(request.table, shapes, request.limit, offset),
				source: 'mock',
			};
		}
	}

	private *schemasSteps(useMock: boolean): Steps<SchemaInfo[]> {
		try {
			const rows = yield schemasQuery();
			return this.parsed('schema', parseSchemaRows(rows));
		} catch (error) {
			if (!useMock) throw error;
			return mockSchemas();
		}
	}

	private *schemaExistsSteps(schema: string, useMock: boolean): Steps<boolean> {
		try {
			const rows = yield schemaExistsQuery(schema);
			return rows.length > 0;
		} catch (error) {
			if (useMock) {
				const wanted = schema.toUpperCase();
				return mockSchemas().some(info => info.name === wanted);
			}
			this.logger.debug('MetadataLoader', 'Schema check failed', {
				schema,
				error: errorMessage(error),
			});
			return false;
		}
	}

	// ==========================================================================
	// Helpers
	// ==========================================================================

	private asyncFetcher(): AsyncRowFetcher | undefined {
		if (this.fetchRowsAsync) return this.fetchRowsAsync;
		const sync = this.fetchRows;
		return sync ? async sql => sync(sql) : undefined;
	}

	private parsed<T>(kind: string, result: {items: T[]; skipped: number}): T[] {
		if (result.skipped > 0) {
			this.logger.debug('MetadataLoader', `Skipped malformed ${kind} rows`, {
				skipped: result.skipped,
			});
		}
		return result.items;
	}

	private toTables(inputs: readonly TableInput[]): TableDescriptor[] {
		const tables: TableDescriptor[] = [];
		for (const input of inputs) {
			const table = toTableDescriptor(input, this.intern);
			if (table) tables.push(table);
		}
		return tables;
	}

	private toColumns(inputs: readonly ColumnInput[]): ColumnDescriptor[] {
		const columns: ColumnDescriptor[] = [];
		for (const input of inputs) {
			const col = toColumnDescriptor(input, this.intern);
			if (col) columns.push(col);
		}
		return columns;
	}
}
