/**
 * schema-scout
 *
 * Schema metadata search with a persistent catalog cache.
 */

// Composition root
export {
	createSchemaScout,
	type IndexSummary,
	type SchemaScout,
	type SchemaScoutOptions,
} from './scout.js';

// Engine
export * from './engine/index.js';

// Search manager
export {
	SearchManager,
	type ColumnHit,
	type SearchCacheStats,
	type SearchHit,
	type SearchManagerOptions,
	type SearchMode,
	type TableHit,
	type TableSummaryHit,
} from './search/manager.js';

// Cache
export {
	MetadataCache,
	type CacheEntry,
	type MetadataCacheOptions,
} from './cache/metadata-cache.js';
export {cacheKey} from './cache/key.js';

// Loader
export {
	MetadataLoader,
	type AsyncRowFetcher,
	type CatalogPage,
	type CatalogRequest,
	type CatalogResult,
	type CatalogSource,
	type MetadataLoaderOptions,
	type PrefetchOutcome,
	type RowFetcher,
	type StreamOptions,
	type TableRowsRequest,
	type TableRowsResult,
} from './loader/loader.js';
export {
	generateHeavyCatalog,
	generateMockCatalog,
	mockSchemas,
	sampleColumns,
	sampleTables,
	synthesizeRows,
	synthesizeValue,
	type ColumnShape,
	type MockCatalog,
	type MockCatalogRequest,
} from './loader/mock.js';
export {
	columnsForTablesQuery,
	columnsQuery,
	schemaExistsQuery,
	schemasQuery,
	tableRowsQuery,
	tablesQuery,
	type Page,
	type QueryRow,
	type SchemaInfo,
} from './loader/queries.js';

// Config
export {
	createDefaultConfig,
	loadConfig,
	loadConfigSync,
	saveConfig,
	type ScoutConfig,
} from './lib/config.js';

// Constants
export {
	ALL_SCHEMAS_KEY,
	CACHE_FILE_NAME,
	SCOUT_HOME_ENV,
	getCacheFilePath,
	getConfigPath,
	getScoutHomeDir,
} from './lib/constants.js';

// Errors
export {
	CacheCorruptionError,
	CacheWriteError,
	ConfigError,
	FetchFailure,
} from './lib/errors.js';

// Logger
export {
	createNullLogger,
	createServiceLogger,
	type LogLevel,
	type Logger,
	type ServiceName,
} from './lib/logger.js';
