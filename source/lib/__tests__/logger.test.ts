import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {getServiceLogPath} from '../constants.js';
import {createServiceLogger, formatEntry} from '../logger.js';

describe('formatEntry', () => {
	it('formats level, component and data', () => {
		const entry = formatEntry('info', 'MetadataLoader', 'Catalog loaded', {
			tables: 3,
		});

		expect(entry).toMatch(
			/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[INFO \] MetadataLoader: Catalog loaded\n {2}\{"tables":3\}$/,
		);
	});

	it('includes error message and stack', () => {
		const error = new Error('disk full');
		const entry = formatEntry('error', 'MetadataCache', 'Write failed', error);

		expect(entry).toContain('\n  Error: disk full\n  Stack: Error: disk full');
	});
});

describe('createServiceLogger', () => {
	let home: string;

	beforeEach(() => {
		home = fs.mkdtempSync(path.join(os.tmpdir(), 'schema-scout-logs-'));
		vi.stubEnv('SCHEMA_SCOUT_HOME', home);
	});

	afterEach(() => {
		vi.unstubAllEnvs();
		fs.rmSync(home, {recursive: true, force: true});
	});

	it('appends entries to the hourly file of its service', () => {
		const logger = createServiceLogger('cache');
		logger.warn('MetadataCache', 'first');
		logger.debug('MetadataCache', 'second', {key: 'TEST'});

		const lines = fs
			.readFileSync(getServiceLogPath('cache'), 'utf-8')
			.trimEnd()
			.split('\n');
		expect(lines).toHaveLength(3);
		expect(lines[0]).toMatch(/\[WARN \] MetadataCache: first$/);
		expect(lines[1]).toMatch(/\[DEBUG\] MetadataCache: second$/);
		expect(lines[2]).toBe('  {"key":"TEST"}');
	});

	it('never throws when the log directory cannot be created', () => {
		const blocker = path.join(home, 'blocker');
		fs.writeFileSync(blocker, '');
		vi.stubEnv('SCHEMA_SCOUT_HOME', blocker);

		const logger = createServiceLogger('loader');

		expect(() => logger.info('MetadataLoader', 'lost')).not.toThrow();
	});
});
