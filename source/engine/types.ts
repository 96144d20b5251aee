/**
 * Catalog descriptors and the search engine contract.
 */

// ============================================================================
// Descriptors
// ============================================================================

export type Nullable = 'Y' | 'N';

export interface TableDescriptor {
	readonly schema: string;
	readonly name: string;
	readonly remarks: string;
}

export interface ColumnDescriptor {
	readonly schema: string;
	readonly table: string;
	readonly name: string;
	readonly typeName: string;
	readonly length?: number;
	readonly scale?: number;
	readonly nullable: Nullable;
	readonly remarks: string;
}

/**
 * Loose table shape accepted by buildIndex. Anything may be missing.
 */
export interface TableInput {
	schema?: string | null;
	name?: string | null;
	remarks?: string | null;
}

/**
 * Loose column shape accepted by buildIndex. Anything may be missing.
 */
export interface ColumnInput {
	schema?: string | null;
	table?: string | null;
	name?: string | null;
	typeName?: string | null;
	length?: number | null;
	scale?: number | null;
	nullable?: string | boolean | null;
	remarks?: string | null;
}

export type InternFn = (value: string) => string;

export interface Scored<T> {
	item: T;
	score: number;
}

// ============================================================================
// Engine contract
// ============================================================================

/**
 * What a search index implementation must provide. Both the reference
 * engine and the accelerated wrapper satisfy it, with identical results.
 */
export interface SearchEngine {
	/** Replace the whole index. Never throws on malformed rows. */
	buildIndex(
		tables: readonly TableInput[],
		columns: readonly ColumnInput[],
	): void;
	searchTables(query: string): TableDescriptor[];
	searchColumns(query: string): ColumnDescriptor[];
	scoreTables(query: string): Array<Scored<TableDescriptor>>;
	scoreColumns(query: string): Array<Scored<ColumnDescriptor>>;
	readonly tableCount: number;
	readonly columnCount: number;
}

// ============================================================================
// Conversion
// ============================================================================

function text(value: unknown): string {
	return typeof value === 'string' ? value : '';
}

function integer(value: unknown): number | undefined {
	return typeof value === 'number' && Number.isInteger(value)
		? value
		: undefined;
}

/**
 * Map the many spellings of a nullable flag to Y/N.
 */
export function toNullable(value: unknown): Nullable {
	if (value === true) return 'Y';
	if (typeof value !== 'string') return 'N';
	const flag = value.trim().toUpperCase();
	return flag === 'Y' || flag === 'YES' ? 'Y' : 'N';
}

/**
 * Build a frozen table descriptor, or null when the row has no name.
 */
export function toTableDescriptor(
	input: TableInput,
	intern: InternFn,
): TableDescriptor | null {
	const name = text(input.name);
	if (name.trim().length === 0) return null;
	return Object.freeze({
		schema: intern(text(input.schema)),
		name: intern(name),
		remarks: intern(text(input.remarks)),
	});
}

/**
 * Build a frozen column descriptor, or null when the row has no name.
 */
export function toColumnDescriptor(
	input: ColumnInput,
	intern: InternFn,
): ColumnDescriptor | null {
	const name = text(input.name);
	if (name.trim().length === 0) return null;

	const descriptor: {
		schema: string;
		table: string;
		name: string;
		typeName: string;
		length?: number;
		scale?: number;
		nullable: Nullable;
		remarks: string;
	} = {
		schema: intern(text(input.schema)),
		table: intern(text(input.table)),
		name: intern(name),
		typeName: intern(text(input.typeName)),
		nullable: toNullable(input.nullable),
		remarks: intern(text(input.remarks)),
	};
	const length = integer(input.length);
	if (length !== undefined) descriptor.length = length;
	const scale = integer(input.scale);
	if (scale !== undefined) descriptor.scale = scale;

	return Object.freeze(descriptor);
}

/** Identity of a table: schema.name */
export function tableIdentity(table: TableDescriptor): string {
	return `${table.schema}.${table.name}`;
}

/** Identity of a column: schema.table.name */
export function columnIdentity(column: ColumnDescriptor): string {
	return `${column.schema}.${column.table}.${column.name}`;
}
