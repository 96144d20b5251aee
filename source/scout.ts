/**
 * Composition root.
 *
 * Wires one string interner, the metadata cache, the chosen search engine
 * implementation, the loader and the search manager from a ScoutConfig.
 */

import {MetadataCache} from './cache/metadata-cache.js';
import {
	selectSearchEngine,
	type AccelerationStatus,
	type ModuleImporter,
	type TextFunctions,
} from './engine/accelerated.js';
import {StringInterner} from './engine/interner.js';
import {loadConfig, type ScoutConfig} from './lib/config.js';
import {
	createNullLogger,
	createServiceLogger,
	type Logger,
	type ServiceName,
} from './lib/logger.js';
import {
	MetadataLoader,
	type AsyncRowFetcher,
	type CatalogRequest,
	type CatalogSource,
	type RowFetcher,
} from './loader/loader.js';
import {SearchManager} from './search/manager.js';

export interface SchemaScoutOptions {
	/** Config to use instead of {home}/config.json */
	config?: ScoutConfig;
	fetchRows?: RowFetcher;
	fetchRowsAsync?: AsyncRowFetcher;
	/** Logger per service (default: hourly log files under {home}/logs) */
	loggers?: Partial<Record<ServiceName, Logger>>;
	/** Disable all logging */
	silent?: boolean;
	/** Clock shared by the cache and the result cache, for tests */
	now?: () => number;
	/** Module loader used to import an acceleration provider */
	importer?: ModuleImporter;
}

export interface SchemaScout {
	readonly config: ScoutConfig;
	readonly loader: MetadataLoader;
	readonly search: SearchManager;
	readonly cache: MetadataCache;
	readonly text: TextFunctions;
	readonly status: AccelerationStatus;
	/**
	 * Load the catalog through the loader and publish it to the search
	 * manager. Returns where the catalog came from and its size.
	 */
	loadAndIndex(request?: CatalogRequest): Promise<IndexSummary>;
}

export interface IndexSummary {
	source: CatalogSource;
	tables: number;
	columns: number;
}

export async function createSchemaScout(
	options: SchemaScoutOptions = {},
): Promise<SchemaScout> {
	const config = options.config ?? (await loadConfig());
	const loggerFor = (service: ServiceName): Logger => {
		if (options.silent) return createNullLogger();
		return options.loggers?.[service] ?? createServiceLogger(service);
	};

	const engineLogger = loggerFor('engine');
	const interner = new StringInterner();
	const selection = await selectSearchEngine({
		moduleId: config.accelerationModule,
		importer: options.importer,
		logger: engineLogger,
		interner,
	});

	const cache = new MetadataCache({
		cacheDir: config.cacheDir,
		ttlMs: config.cacheTtlMs,
		compressionLevel: config.compressionLevel,
		now: options.now,
		logger: loggerFor('cache'),
	});

	const loader = new MetadataLoader({
		fetchRows: options.fetchRows,
		fetchRowsAsync: options.fetchRowsAsync,
		cache,
		intern: selection.text.intern,
		logger: loggerFor('loader'),
		initialPageSize: config.initialPageSize,
		pageSize: config.pageSize,
		prefetchConcurrency: config.prefetchConcurrency,
	});

	const search = new SearchManager({
		createEngine: selection.createEngine,
		intern: selection.text.intern,
		resultTtlMs: config.searchResultTtlMs,
		maxResults: config.maxResults,
		now: options.now,
		logger: engineLogger,
	});

	return {
		config,
		loader,
		search,
		cache,
		text: selection.text,
		status: selection.status,
		async loadAndIndex(request: CatalogRequest = {}): Promise<IndexSummary> {
			const result = await loader.getAllTablesAndColumnsAsync(request);
			search.publish(result.tables, result.columns);
			return {
				source: result.source,
				tables: result.tables.length,
				columns: result.columns.length,
			};
		},
	};
}
