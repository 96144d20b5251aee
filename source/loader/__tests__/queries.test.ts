import {describe, it, expect} from 'vitest';
import {
	columnsForTablesQuery,
	parseColumnRows,
	parseSchemaRows,
	parseTableRows,
	schemaExistsQuery,
	sqlIdentifier,
	sqlLiteral,
	tableRowsQuery,
	tablesQuery,
} from '../queries.js';

describe('catalog SQL', () => {
	it('builds the table query with schema filter and paging', () => {
		expect(tablesQuery('test', {limit: 10, offset: 20})).toBe(
			"SELECT TABLE_SCHEMA, TABLE_NAME, TABLE_TEXT FROM QSYS2.SYSTABLES WHERE TABLE_TYPE IN ('T', 'P') AND SYSTEM_TABLE = 'N' AND TABLE_SCHEMA = 'TEST' ORDER BY TABLE_SCHEMA, TABLE_NAME OFFSET 20 ROWS FETCH FIRST 10 ROWS ONLY",
		);
	});

	it('omits OFFSET for the first page', () => {
		expect(tablesQuery(null, {limit: 5, offset: 0})).toBe(
			"SELECT TABLE_SCHEMA, TABLE_NAME, TABLE_TEXT FROM QSYS2.SYSTABLES WHERE TABLE_TYPE IN ('T', 'P') AND SYSTEM_TABLE = 'N' ORDER BY TABLE_SCHEMA, TABLE_NAME FETCH FIRST 5 ROWS ONLY",
		);
	});

	it('escapes quotes in literals', () => {
		expect(sqlLiteral("O'HARA")).toBe("'O''HARA'");
		expect(schemaExistsQuery("o'x")).toBe(
			"SELECT 1 FROM QSYS2.SYSTABLES WHERE TABLE_SCHEMA = 'O''X' AND TABLE_TYPE IN ('T', 'P') AND SYSTEM_TABLE = 'N' FETCH FIRST 1 ROWS ONLY",
		);
	});

	it('lists the tables of a page in the column query', () => {
		expect(
			columnsForTablesQuery([
				{schema: 'S', name: 'A'},
				{schema: 'S', name: 'B'},
			]),
		).toBe(
			"SELECT TABLE_SCHEMA, TABLE_NAME, COLUMN_NAME, DATA_TYPE, LENGTH, NUMERIC_SCALE, IS_NULLABLE, COLUMN_TEXT FROM QSYS2.SYSCOLUMNS WHERE (TABLE_SCHEMA = 'S' AND TABLE_NAME = 'A') OR (TABLE_SCHEMA = 'S' AND TABLE_NAME = 'B') ORDER BY TABLE_SCHEMA, TABLE_NAME, ORDINAL_POSITION",
		);
	});

	it('quotes identifiers that are not simple names', () => {
		expect(sqlIdentifier('ORDERS')).toBe('ORDERS');
		expect(sqlIdentifier('ORDER LINES')).toBe('"ORDER LINES"');
		expect(tableRowsQuery('TEST.ORDERS', {limit: 5, offset: 10})).toBe(
			'SELECT * FROM TEST.ORDERS ORDER BY 1 OFFSET 10 ROWS FETCH FIRST 5 ROWS ONLY',
		);
	});
});

describe('row parsing', () => {
	it('parses table rows and skips rows without a name', () => {
		const parsed = parseTableRows([
			{TABLE_SCHEMA: 'S', TABLE_NAME: 'T1', TABLE_TEXT: null},
			{TABLE_SCHEMA: 'S', TABLE_TEXT: 'no name'},
			{TABLE_SCHEMA: 'S', TABLE_NAME: 42},
		]);

		expect(parsed.items).toEqual([{schema: 'S', name: 'T1', remarks: ''}]);
		expect(parsed.skipped).toBe(2);
	});

	it('coerces numeric strings and maps nullability', () => {
		const parsed = parseColumnRows([
			{
				TABLE_SCHEMA: 'S',
				TABLE_NAME: 'T',
				COLUMN_NAME: 'AMOUNT',
				DATA_TYPE: 'DECIMAL',
				LENGTH: '12',
				NUMERIC_SCALE: '2',
				IS_NULLABLE: 'YES',
				COLUMN_TEXT: 'Amount',
			},
			{
				TABLE_SCHEMA: 'S',
				TABLE_NAME: 'T',
				COLUMN_NAME: 'NOTE',
				DATA_TYPE: 'VARCHAR',
				LENGTH: 'n/a',
				NUMERIC_SCALE: null,
			},
		]);

		expect(parsed.items).toEqual([
			{
				schema: 'S',
				table: 'T',
				name: 'AMOUNT',
				typeName: 'DECIMAL',
				length: 12,
				scale: 2,
				nullable: 'YES',
				remarks: 'Amount',
			},
			{
				schema: 'S',
				table: 'T',
				name: 'NOTE',
				typeName: 'VARCHAR',
				length: undefined,
				scale: undefined,
				nullable: undefined,
				remarks: '',
			},
		]);
	});

	it('parses schema counts', () => {
		expect(
			parseSchemaRows([
				{TABLE_SCHEMA: 'A', TABLE_COUNT: '12'},
				{TABLE_SCHEMA: 'B', TABLE_COUNT: 3},
				{TABLE_COUNT: 1},
			]),
		).toEqual({
			items: [
				{name: 'A', tableCount: 12},
				{name: 'B', tableCount: 3},
			],
			skipped: 1,
		});
	});
});
