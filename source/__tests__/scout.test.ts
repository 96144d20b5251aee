import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {createDefaultConfig, type ScoutConfig} from '../lib/config.js';
import {sampleColumns, sampleTables} from '../loader/mock.js';
import {createFakeCatalog} from '../loader/__tests__/fake-catalog.js';
import {createSchemaScout} from '../scout.js';

describe('createSchemaScout', () => {
	let home: string;
	let config: ScoutConfig;

	beforeEach(() => {
		home = fs.mkdtempSync(path.join(os.tmpdir(), 'schema-scout-root-'));
		vi.stubEnv('SCHEMA_SCOUT_HOME', home);
		config = {...createDefaultConfig(), cacheDir: path.join(home, 'cache')};
	});

	afterEach(() => {
		vi.unstubAllEnvs();
		fs.rmSync(home, {recursive: true, force: true});
	});

	it('loads the catalog and publishes it for search', async () => {
		const catalog = createFakeCatalog(sampleTables(), sampleColumns());
		const scout = await createSchemaScout({
			config,
			fetchRows: catalog.fetchRows,
			silent: true,
		});

		const summary = await scout.loadAndIndex({schemaFilter: 'TEST'});

		expect(summary).toEqual({source: 'database', tables: 3, columns: 10});
		expect(scout.search.tableCount).toBe(3);
		expect(scout.search.search('orders').map(hit => hit.type)).toEqual([
			'table',
		]);
		expect(scout.status).toEqual({
			implementation: 'reference',
			accelerated: false,
		});
	});

	it('reuses the cache file across instances', async () => {
		const catalog = createFakeCatalog(sampleTables(), sampleColumns());
		const first = await createSchemaScout({
			config,
			fetchRows: catalog.fetchRows,
			silent: true,
		});
		await first.loadAndIndex({schemaFilter: 'DACDATA'});

		const second = await createSchemaScout({
			config,
			fetchRows: catalog.fetchRows,
			silent: true,
		});
		const summary = await second.loadAndIndex({schemaFilter: 'DACDATA'});

		expect(summary.source).toBe('cache');
		expect(catalog.queries).toHaveLength(2);
		expect(fs.existsSync(second.cache.filePath)).toBe(true);
		expect(second.cache.filePath).toBe(
			path.join(home, 'cache', 'schema_cache.json.gz'),
		);
	});

	it('reads config.json from the home directory when none is given', async () => {
		fs.writeFileSync(
			path.join(home, 'config.json'),
			JSON.stringify({maxResults: 1, cacheDir: path.join(home, 'custom')}),
		);

		const scout = await createSchemaScout({silent: true});

		expect(scout.config.maxResults).toBe(1);
		expect(scout.cache.filePath).toBe(
			path.join(home, 'custom', 'schema_cache.json.gz'),
		);
	});

	it('falls back to the reference engine when the provider cannot load', async () => {
		const scout = await createSchemaScout({
			config: {...config, accelerationModule: 'schema-scout-fast-index'},
			importer: async () => {
				throw new Error('Cannot find module');
			},
			silent: true,
		});

		expect(scout.status).toEqual({
			implementation: 'reference',
			accelerated: false,
			moduleId: 'schema-scout-fast-index',
			reason: 'import failed: Cannot find module',
		});
		expect(scout.text.normalize('ORDER_LINES')).toBe('order lines');
	});

	it('serves mock data when the database is unreachable', async () => {
		const scout = await createSchemaScout({
			config,
			fetchRows: () => {
				throw new Error('host unreachable');
			},
			silent: true,
		});

		const summary = await scout.loadAndIndex({useMock: true});

		expect(summary).toEqual({source: 'mock', tables: 6, columns: 15});
		expect(scout.cache.keys()).toEqual([]);
	});

	it('routes log entries to the given loggers', async () => {
		const info = vi.fn();
		const logger = {debug: vi.fn(), info, warn: vi.fn(), error: vi.fn()};
		const catalog = createFakeCatalog(sampleTables(), sampleColumns());
		const scout = await createSchemaScout({
			config,
			fetchRows: catalog.fetchRows,
			loggers: {loader: logger, engine: logger, cache: logger},
		});

		await scout.loadAndIndex();

		expect(info).toHaveBeenCalledWith(
			'MetadataLoader',
			'Catalog loaded',
			expect.objectContaining({tables: 6, columns: 15}),
		);
		expect(info).toHaveBeenCalledWith('SearchManager', 'Index published', {
			tables: 6,
			columns: 15,
		});
	});
});
