import {describe, it, expect} from 'vitest';
import {
	generateHeavyCatalog,
	generateMockCatalog,
	mockSchemas,
	sampleColumns,
	sampleTables,
	synthesizeRows,
} from '../mock.js';

describe('mock catalog', () => {
	it('has six sample tables and fifteen columns', () => {
		expect(sampleTables()).toHaveLength(6);
		expect(sampleColumns()).toHaveLength(15);
	});

	it('lists the mock schemas with table counts', () => {
		expect(mockSchemas()).toEqual([
			{name: 'DACDATA', tableCount: 15},
			{name: 'TEST', tableCount: 8},
			{name: 'QGPL', tableCount: 23},
			{name: 'PRODUCTION', tableCount: 42},
		]);
	});

	it('filters by schema case-insensitively', () => {
		const catalog = generateMockCatalog({schemaFilter: 'dacdata'});

		expect(catalog.tables.map(t => t.name)).toEqual([
			'CUSTOMERS',
			'INVOICES',
			'OHHST',
		]);
		expect(catalog.columns).toHaveLength(5);
	});

	it('pages tables and keeps only their columns', () => {
		const catalog = generateMockCatalog({
			schemaFilter: 'DACDATA',
			limit: 2,
			offset: 1,
		});

		expect(catalog.tables.map(t => t.name)).toEqual(['INVOICES', 'OHHST']);
		expect(catalog.columns.map(c => c.name)).toEqual([
			'INV_ID',
			'CUST_ID',
			'INV_DATE',
		]);
	});

	it('fills pages beyond the sample with synthetic tables', () => {
		const catalog = generateMockCatalog({schemaFilter: 'QGPL', limit: 2});

		expect(catalog.tables).toEqual([
			{schema: 'QGPL', name: 'TBL_00000', remarks: 'Synthetic table 0'},
			{schema: 'QGPL', name: 'TBL_00001', remarks: 'Synthetic table 1'},
		]);
		expect(catalog.columns.map(c => `${c.table}.${c.name}`)).toEqual([
			'TBL_00000.COL_000',
			'TBL_00000.COL_001',
			'TBL_00000.COL_002',
			'TBL_00000.COL_003',
			'TBL_00001.COL_000',
			'TBL_00001.COL_001',
			'TBL_00001.COL_002',
			'TBL_00001.COL_003',
		]);
	});

	it('returns only the sample when no limit is given', () => {
		expect(generateMockCatalog({schemaFilter: 'QGPL'}).tables).toEqual([]);
		expect(generateMockCatalog().tables).toHaveLength(6);
	});

	it('generates a heavy catalog', () => {
		const catalog = generateHeavyCatalog(5, 4);

		expect(catalog.tables).toHaveLength(5);
		expect(catalog.columns).toHaveLength(20);
		expect(catalog.tables[4]).toEqual({
			schema: 'DACDATA',
			name: 'TBL_00004',
			remarks: 'Synthetic table 4',
		});
		expect(catalog.columns[2]).toEqual({
			schema: 'DACDATA',
			table: 'TBL_00000',
			name: 'COL_002',
			typeName: 'DECIMAL',
			length: 12,
			scale: 2,
			nullable: 'Y',
			remarks: 'Column 2 of TBL_00000',
		});
	});
});

describe('synthesizeRows', () => {
	const columns = [
		{name: 'ID', typeName: 'INTEGER'},
		{name: 'PRICE', typeName: 'DECIMAL'},
		{name: 'SHIPPED', typeName: 'DATE'},
		{name: 'LABEL', typeName: 'VARCHAR'},
	];

	it('returns exactly limit rows starting at the offset', () => {
		const rows = synthesizeRows('ORDERS', columns, 5, 10);

		expect(rows).toHaveLength(5);
		expect(rows.map(row => row['ID'])).toEqual([1000, 1100, 1200, 1300, 1400]);
	});

	it('types values by column type', () => {
		const [row] = synthesizeRows('ORDERS', columns, 1, 30);

		expect(row).toEqual({
			ID: 3000,
			PRICE: 316,
			SHIPPED: '2024-02-03',
			LABEL: 'ORDERS.LABEL.row30',
		});
	});

	it('rotates dates through the year', () => {
		const rows = synthesizeRows('T', [{name: 'D', typeName: 'DATE'}], 2, 27);

		expect(rows.map(row => row['D'])).toEqual(['2024-01-28', '2024-02-01']);
	});
});
