import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
	createDefaultConfig,
	loadConfig,
	loadConfigSync,
	saveConfig,
} from '../config.js';
import {ConfigError} from '../errors.js';

describe('config', () => {
	let home: string;

	beforeEach(() => {
		home = fs.mkdtempSync(path.join(os.tmpdir(), 'schema-scout-config-'));
		vi.stubEnv('SCHEMA_SCOUT_HOME', home);
	});

	afterEach(() => {
		vi.unstubAllEnvs();
		fs.rmSync(home, {recursive: true, force: true});
	});

	function writeConfig(content: string): void {
		fs.writeFileSync(path.join(home, 'config.json'), content);
	}

	it('uses defaults when no config file exists', async () => {
		const config = await loadConfig();

		expect(config).toEqual({
			version: 1,
			cacheDir: home,
			cacheTtlMs: 3_600_000,
			compressionLevel: 5,
			initialPageSize: 200,
			pageSize: 500,
			prefetchConcurrency: 4,
			searchResultTtlMs: 3_600_000,
			maxResults: 1000,
		});
		expect(loadConfigSync()).toEqual(config);
	});

	it('merges stored values over the defaults', async () => {
		writeConfig(
			JSON.stringify({
				cacheTtlMs: 60_000,
				pageSize: 250,
				accelerationModule: 'fast-index',
			}),
		);

		const config = await loadConfig();

		expect(config.cacheTtlMs).toBe(60_000);
		expect(config.pageSize).toBe(250);
		expect(config.accelerationModule).toBe('fast-index');
		expect(config.initialPageSize).toBe(200);
	});

	it('rejects a file that is not JSON', async () => {
		writeConfig('{"pageSize": ');

		await expect(loadConfig()).rejects.toBeInstanceOf(ConfigError);
		expect(() => loadConfigSync()).toThrow(ConfigError);
	});

	it('names the offending field', () => {
		writeConfig(JSON.stringify({compressionLevel: 12}));

		expect(() => loadConfigSync()).toThrow(
			`Invalid config.json at ${path.join(home, 'config.json')}: compressionLevel:`,
		);
	});

	it('rejects a config that is not an object', async () => {
		writeConfig('[]');

		await expect(loadConfig()).rejects.toThrow('(root):');
	});

	it('round-trips through saveConfig', async () => {
		const config = {...createDefaultConfig(), maxResults: 25};
		await saveConfig(config);

		const content = fs.readFileSync(path.join(home, 'config.json'), 'utf-8');
		expect(content.endsWith('\n')).toBe(true);
		expect(content).toContain('\t"maxResults": 25');
		expect(await loadConfig()).toEqual(config);
	});

	it('creates the home directory on save', async () => {
		const nested = path.join(home, 'nested', 'home');
		vi.stubEnv('SCHEMA_SCOUT_HOME', nested);

		await saveConfig(createDefaultConfig());

		expect(fs.existsSync(path.join(nested, 'config.json'))).toBe(true);
	});
});
