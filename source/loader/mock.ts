/**
 * Mock catalog generator.
 *
 * Stands in for a live database: a small fixed sample catalog, a large
 * synthetic one for load testing, and typed placeholder table rows.
 * Everything here is deterministic.
 */

import type {ColumnDescriptor, TableDescriptor} from '../engine/types.js';
import type {QueryRow, SchemaInfo} from './queries.js';

const SAMPLE_TABLES: readonly TableDescriptor[] = [
	{schema: 'TEST', name: 'USERS', remarks: 'User information table'},
	{schema: 'TEST', name: 'ORDERS', remarks: 'Order records table'},
	{schema: 'TEST', name: 'PRODUCTS', remarks: 'Product catalog table'},
	{schema: 'DACDATA', name: 'CUSTOMERS', remarks: 'Customer data'},
	{schema: 'DACDATA', name: 'INVOICES', remarks: 'Invoice records'},
	{schema: 'DACDATA', name: 'OHHST', remarks: 'OH HST master history table'},
];

function column(
	schema: string,
	table: string,
	name: string,
	typeName: string,
	length: number,
	remarks: string,
	options: {scale?: number; nullable?: 'Y' | 'N'} = {},
): ColumnDescriptor {
	return {
		schema,
		table,
		name,
		typeName,
		length,
		scale: options.scale ?? 0,
		nullable: options.nullable ?? 'N',
		remarks,
	};
}

const SAMPLE_COLUMNS: readonly ColumnDescriptor[] = [
	column('TEST', 'USERS', 'ID', 'INTEGER', 10, 'User identifier'),
	column('TEST', 'USERS', 'NAME', 'VARCHAR', 100, 'User name'),
	column('TEST', 'USERS', 'EMAIL', 'VARCHAR', 255, 'User email address', {
		nullable: 'Y',
	}),
	column('TEST', 'ORDERS', 'ID', 'INTEGER', 10, 'Order identifier'),
	column('TEST', 'ORDERS', 'USER_ID', 'INTEGER', 10, 'Foreign key to USERS'),
	column('TEST', 'ORDERS', 'PRODUCT_ID', 'INTEGER', 10, 'Foreign key to PRODUCTS'),
	column('TEST', 'ORDERS', 'ORDER_DATE', 'DATE', 10, 'Date of order'),
	column('TEST', 'PRODUCTS', 'ID', 'INTEGER', 10, 'Product identifier'),
	column('TEST', 'PRODUCTS', 'NAME', 'VARCHAR', 200, 'Product name'),
	column('TEST', 'PRODUCTS', 'PRICE', 'DECIMAL', 10, 'Product price', {
		scale: 2,
	}),
	column('DACDATA', 'CUSTOMERS', 'CUST_ID', 'INTEGER', 10, 'Customer identifier'),
	column('DACDATA', 'CUSTOMERS', 'CUST_NAME', 'VARCHAR', 150, 'Customer name'),
	column('DACDATA', 'INVOICES', 'INV_ID', 'INTEGER', 10, 'Invoice identifier'),
	column('DACDATA', 'INVOICES', 'CUST_ID', 'INTEGER', 10, 'Foreign key to CUSTOMERS'),
	column('DACDATA', 'INVOICES', 'INV_DATE', 'DATE', 10, 'Invoice date'),
];

const MOCK_SCHEMAS: readonly SchemaInfo[] = [
	{name: 'DACDATA', tableCount: 15},
	{name: 'TEST', tableCount: 8},
	{name: 'QGPL', tableCount: 23},
	{name: 'PRODUCTION', tableCount: 42},
];

export function sampleTables(): TableDescriptor[] {
	return SAMPLE_TABLES.map(table => ({...table}));
}

export function sampleColumns(): ColumnDescriptor[] {
	return SAMPLE_COLUMNS.map(col => ({...col}));
}

export function mockSchemas(): SchemaInfo[] {
	return MOCK_SCHEMAS.map(schema => ({...schema}));
}

export interface MockCatalogRequest {
	schemaFilter?: string | null;
	limit?: number | null;
	offset?: number | null;
}

export interface MockCatalog {
	tables: TableDescriptor[];
	columns: ColumnDescriptor[];
}

const HEAVY_SCHEMAS = ['DACDATA', 'TEST', 'QGPL', 'PRODUCTION'] as const;

const HEAVY_TYPES = [
	{typeName: 'INTEGER', length: 10, scale: 0},
	{typeName: 'VARCHAR', length: 100, scale: 0},
	{typeName: 'DECIMAL', length: 12, scale: 2},
	{typeName: 'DATE', length: 10, scale: 0},
] as const;

function syntheticTable(index: number, schema: string): TableDescriptor {
	return {
		schema,
		name: `TBL_${String(index).padStart(5, '0')}`,
		remarks: `Synthetic table ${index}`,
	};
}

function syntheticColumns(
	table: TableDescriptor,
	count: number,
): ColumnDescriptor[] {
	const columns: ColumnDescriptor[] = [];
	for (let j = 0; j < count; j++) {
		const type = HEAVY_TYPES[j % HEAVY_TYPES.length];
		columns.push({
			schema: table.schema,
			table: table.name,
			name: `COL_${String(j).padStart(3, '0')}`,
			typeName: type.typeName,
			length: type.length,
			scale: type.scale,
			nullable: j === 0 ? 'N' : 'Y',
			remarks: `Column ${j} of ${table.name}`,
		});
	}
	return columns;
}

/** Columns per synthetic table used to top up a mock page */
const FILLER_COLUMNS = HEAVY_TYPES.length;

/**
 * Sample catalog narrowed to a schema and a page of tables. Columns
 * follow the tables on the page.
 *
 * A page always holds `limit` tables: positions past the end of the
 * sample are filled with synthetic tables (TBL_nnnnn, numbered from 0
 * after the sample) in the filtered schema, or cycling through the heavy
 * schemas when there is no filter.
 */
export function generateMockCatalog(request: MockCatalogRequest = {}): MockCatalog {
	const filter = request.schemaFilter?.toUpperCase();
	const sample = sampleTables().filter(
		table => !filter || table.schema.toUpperCase() === filter,
	);

	if (request.limit === undefined || request.limit === null) {
		return {tables: sample, columns: columnsOf(sample, [])};
	}

	const offset = Math.max(0, request.offset ?? 0);
	const end = offset + Math.max(0, request.limit);
	const tables = sample.slice(offset, end);
	const filler: ColumnDescriptor[] = [];

	for (let index = Math.max(offset, sample.length); index < end; index++) {
		const position = index - sample.length;
		const schema = filter || HEAVY_SCHEMAS[position % HEAVY_SCHEMAS.length];
		const table = syntheticTable(position, schema);
		tables.push(table);
		filler.push(...syntheticColumns(table, FILLER_COLUMNS));
	}

	return {tables, columns: columnsOf(tables, filler)};
}

function columnsOf(
	tables: readonly TableDescriptor[],
	filler: readonly ColumnDescriptor[],
): ColumnDescriptor[] {
	const onPage = new Set(tables.map(table => `${table.schema}.${table.name}`));
	const columns = sampleColumns().filter(col =>
		onPage.has(`${col.schema}.${col.table}`),
	);
	return [...columns, ...filler];
}

/**
 * Large synthetic catalog for exercising the index at scale.
 *
 * Table i is HEAVY_SCHEMAS[i % 4].TBL_{i padded to 5}; column j is
 * COL_{j padded to 3} with types cycling INTEGER, VARCHAR, DECIMAL, DATE.
 */
export function generateHeavyCatalog(
	tableCount: number,
	columnsPerTable: number,
): MockCatalog {
	const tables: TableDescriptor[] = [];
	const columns: ColumnDescriptor[] = [];

	for (let i = 0; i < tableCount; i++) {
		const table = syntheticTable(i, HEAVY_SCHEMAS[i % HEAVY_SCHEMAS.length]);
		tables.push(table);
		columns.push(...syntheticColumns(table, columnsPerTable));
	}

	return {tables, columns};
}

export interface ColumnShape {
	name: string;
	typeName: string;
}

function pad2(value: number): string {
	return String(value).padStart(2, '0');
}

/**
 * Placeholder value for one cell, chosen by declared type:
 * - integer types: rowId * 100 + columnIndex
 * - decimal, numeric, float, double, real: rowId * 10.5 + columnIndex
 * - date types: 2024-MM-DD, day and month rotating with rowId
 * - anything else: '{table}.{column}.row{rowId}'
 */
export function synthesizeValue(
	table: string,
	col: ColumnShape,
	columnIndex: number,
	rowId: number,
): string | number {
	const type = col.typeName.toUpperCase();
	if (type.includes('INT')) return rowId * 100 + columnIndex;
	if (
		type.includes('DECIMAL') ||
		type.includes('NUMERIC') ||
		type.includes('FLOAT') ||
		type.includes('DOUBLE') ||
		type.includes('REAL')
	) {
		return rowId * 10.5 + columnIndex;
	}
	if (type.includes('DATE')) {
		const day = (rowId % 28) + 1;
		const month = (Math.floor(rowId / 28) % 12) + 1;
		return `2024-${pad2(month)}-${pad2(day)}`;
	}
	return `${table}.${col.name}.row${rowId}`;
}

/**
 * Exactly `limit` rows for row ids offset .. offset + limit - 1.
 */
export function synthesizeRows(
	table: string,
	columns: readonly ColumnShape[],
	limit: number,
	offset = 0,
): QueryRow[] {
	const rows: QueryRow[] = [];
	for (let rowId = offset; rowId < offset + limit; rowId++) {
		const row: QueryRow = {};
		columns.forEach((col, index) => {
			row[col.name] = synthesizeValue(table, col, index, rowId);
		});
		rows.push(row);
	}
	return rows;
}
