import os from 'node:os';
import path from 'node:path';

// Ensure tests never write to real user data directories.
process.env['SCHEMA_SCOUT_HOME'] =
	process.env['SCHEMA_SCOUT_HOME'] ??
	path.join(os.tmpdir(), `schema-scout-test-home-${process.pid}`);
