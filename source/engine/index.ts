/**
 * Search engine: matching primitives, tries, and the index implementations.
 */

export {editDistance, editDistanceBounded} from './distance.js';
export {fuzzyMatch, isSubsequence} from './fuzzy.js';
export {
	humanizeSchemaName,
	identifierWords,
	normalize,
	splitWords,
	tokenize,
} from './text.js';
export {PrefixTrie} from './trie.js';
export {StringInterner} from './interner.js';
export {
	COLUMN_SCORES,
	ReferenceSearchEngine,
	TABLE_SCORES,
	scoreColumn,
	scoreTable,
	type ReferenceSearchEngineOptions,
} from './search-index.js';
export {
	AcceleratedSearchEngine,
	isAccelerationProvider,
	loadAccelerationProvider,
	selectSearchEngine,
	type AccelerationProvider,
	type AccelerationStatus,
	type EngineImplementation,
	type FastSearchIndex,
	type ModuleImporter,
	type ProviderLoadOptions,
	type ProviderLoadResult,
	type SearchEngineSelection,
	type SelectOptions,
	type TextFunctions,
} from './accelerated.js';
export {
	columnIdentity,
	tableIdentity,
	toColumnDescriptor,
	toNullable,
	toTableDescriptor,
	type ColumnDescriptor,
	type ColumnInput,
	type InternFn,
	type Nullable,
	type Scored,
	type SearchEngine,
	type TableDescriptor,
	type TableInput,
} from './types.js';
