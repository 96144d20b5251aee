/**
 * Catalog SQL (DB2 for i system catalog) and row parsing.
 *
 * The loader never runs SQL itself: these strings are handed to the
 * row-fetch collaborator, and its rows come back through the parsers
 * below.
 */

import {z} from 'zod';
import type {ColumnInput, TableInput} from '../engine/types.js';

/**
 * One row from the row-fetch collaborator: column name -> value.
 */
export type QueryRow = Record<string, unknown>;

export interface SchemaInfo {
	name: string;
	tableCount: number;
}

export interface Page {
	limit: number;
	offset: number;
}

// ============================================================================
// SQL helpers
// ============================================================================

/**
 * Escape a value for use inside a single-quoted SQL literal.
 */
export function sqlLiteral(value: string): string {
	return `'${value.replaceAll("'", "''")}'`;
}

const SIMPLE_IDENTIFIER = /^[A-Za-z_#@$][\w#@$]*$/;

/**
 * Identifier as written in SQL: simple names stay bare, anything else is
 * double-quoted.
 */
export function sqlIdentifier(name: string): string {
	return SIMPLE_IDENTIFIER.test(name) ? name : `"${name.replaceAll('"', '""')}"`;
}

/**
 * OFFSET/FETCH clause. OFFSET is only emitted for a positive offset.
 */
export function pageClause(page: Page): string {
	const offset = page.offset > 0 ? `OFFSET ${page.offset} ROWS ` : '';
	return `${offset}FETCH FIRST ${page.limit} ROWS ONLY`;
}

const USER_TABLES = "TABLE_TYPE IN ('T', 'P') AND SYSTEM_TABLE = 'N'";

function schemaClause(schemaFilter?: string | null): string {
	return schemaFilter
		? ` AND TABLE_SCHEMA = ${sqlLiteral(schemaFilter.toUpperCase())}`
		: '';
}

// ============================================================================
// Catalog queries
// ============================================================================

export function tablesQuery(
	schemaFilter?: string | null,
	page?: Page | null,
): string {
	const sql =
		'SELECT TABLE_SCHEMA, TABLE_NAME, TABLE_TEXT FROM QSYS2.SYSTABLES' +
		` WHERE ${USER_TABLES}${schemaClause(schemaFilter)}` +
		' ORDER BY TABLE_SCHEMA, TABLE_NAME';
	return page ? `${sql} ${pageClause(page)}` : sql;
}

const COLUMN_FIELDS =
	'TABLE_SCHEMA, TABLE_NAME, COLUMN_NAME, DATA_TYPE, LENGTH, NUMERIC_SCALE, IS_NULLABLE, COLUMN_TEXT';

/**
 * Columns of every user table, optionally within one schema.
 */
export function columnsQuery(schemaFilter?: string | null): string {
	return (
		`SELECT ${COLUMN_FIELDS} FROM QSYS2.SYSCOLUMNS` +
		' WHERE TABLE_SCHEMA IN (SELECT TABLE_SCHEMA FROM QSYS2.SYSTABLES' +
		` WHERE ${USER_TABLES}${schemaClause(schemaFilter)})` +
		' ORDER BY TABLE_SCHEMA, TABLE_NAME, ORDINAL_POSITION'
	);
}

/**
 * Columns of an explicit list of tables (one page of a paginated load).
 */
export function columnsForTablesQuery(
	tables: ReadonlyArray<{schema: string; name: string}>,
): string {
	const matches = tables
		.map(
			table =>
				`(TABLE_SCHEMA = ${sqlLiteral(table.schema)} AND TABLE_NAME = ${sqlLiteral(table.name)})`,
		)
		.join(' OR ');
	return (
		`SELECT ${COLUMN_FIELDS} FROM QSYS2.SYSCOLUMNS` +
		` WHERE ${matches}` +
		' ORDER BY TABLE_SCHEMA, TABLE_NAME, ORDINAL_POSITION'
	);
}

export function schemasQuery(): string {
	return (
		'SELECT TABLE_SCHEMA, COUNT(*) AS TABLE_COUNT FROM QSYS2.SYSTABLES' +
		` WHERE ${USER_TABLES}` +
		' GROUP BY TABLE_SCHEMA ORDER BY TABLE_COUNT DESC, TABLE_SCHEMA'
	);
}

export function schemaExistsQuery(schema: string): string {
	return (
		'SELECT 1 FROM QSYS2.SYSTABLES' +
		` WHERE TABLE_SCHEMA = ${sqlLiteral(schema.toUpperCase())} AND ${USER_TABLES}` +
		' FETCH FIRST 1 ROWS ONLY'
	);
}

/**
 * Page of raw table contents, ordered by the first column.
 */
export function tableRowsQuery(table: string, page: Page): string {
	const qualified = table
		.split('.')
		.map(part => sqlIdentifier(part))
		.join('.');
	return `SELECT * FROM ${qualified} ORDER BY 1 ${pageClause(page)}`;
}

// ============================================================================
// Row parsing
// ============================================================================

const text = z
	.string()
	.nullish()
	.transform(value => value ?? '');

/**
 * Integers arrive as numbers, bigints or digit strings depending on driver.
 */
const optionalInteger = z
	.union([z.number(), z.bigint(), z.string()])
	.nullish()
	.transform(value => {
		if (typeof value === 'number') {
			return Number.isInteger(value) ? value : undefined;
		}
		if (typeof value === 'bigint') return Number(value);
		if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
			return Number.parseInt(value.trim(), 10);
		}
		return undefined;
	});

const tableRowSchema = z.object({
	TABLE_SCHEMA: text,
	TABLE_NAME: z.string(),
	TABLE_TEXT: text,
});

const columnRowSchema = z.object({
	TABLE_SCHEMA: text,
	TABLE_NAME: text,
	COLUMN_NAME: z.string(),
	DATA_TYPE: text,
	LENGTH: optionalInteger,
	NUMERIC_SCALE: optionalInteger,
	IS_NULLABLE: z.union([z.string(), z.boolean()]).nullish(),
	COLUMN_TEXT: text,
});

const schemaRowSchema = z.object({
	TABLE_SCHEMA: z.string(),
	TABLE_COUNT: optionalInteger,
});

export interface Parsed<T> {
	items: T[];
	skipped: number;
}

function parseRows<R, T>(
	rows: readonly QueryRow[],
	schema: z.ZodType<R, z.ZodTypeDef, unknown>,
	map: (row: R) => T,
): Parsed<T> {
	const items: T[] = [];
	let skipped = 0;
	for (const row of rows) {
		const result = schema.safeParse(row);
		if (result.success) items.push(map(result.data));
		else skipped++;
	}
	return {items, skipped};
}

export function parseTableRows(rows: readonly QueryRow[]): Parsed<TableInput> {
	return parseRows(rows, tableRowSchema, row => ({
		schema: row.TABLE_SCHEMA,
		name: row.TABLE_NAME,
		remarks: row.TABLE_TEXT,
	}));
}

export function parseColumnRows(
	rows: readonly QueryRow[],
): Parsed<ColumnInput> {
	return parseRows(rows, columnRowSchema, row => ({
		schema: row.TABLE_SCHEMA,
		table: row.TABLE_NAME,
		name: row.COLUMN_NAME,
		typeName: row.DATA_TYPE,
		length: row.LENGTH,
		scale: row.NUMERIC_SCALE,
		nullable: row.IS_NULLABLE,
		remarks: row.COLUMN_TEXT,
	}));
}

export function parseSchemaRows(rows: readonly QueryRow[]): Parsed<SchemaInfo> {
	return parseRows(rows, schemaRowSchema, row => ({
		name: row.TABLE_SCHEMA,
		tableCount: row.TABLE_COUNT ?? 0,
	}));
}
