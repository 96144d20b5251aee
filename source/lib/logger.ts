/**
 * Logger - File-based logging with hourly rotation.
 *
 * - createServiceLogger: Per-service hourly rotation
 * - createNullLogger: No-op for testing
 */

import fs from 'node:fs';
import {
	getServiceLogPath,
	getServiceLogsDir,
	type ServiceName,
} from './constants.js';

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
	debug(component: string, message: string, data?: object): void;
	info(component: string, message: string, data?: object): void;
	warn(component: string, message: string, data?: object): void;
	error(component: string, message: string, error?: Error): void;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Format a log entry.
 */
export function formatEntry(
	level: LogLevel,
	component: string,
	message: string,
	extra?: object | Error,
): string {
	const timestamp = new Date().toISOString();
	const levelStr = level.toUpperCase().padEnd(5);
	let entry = `[${timestamp}] [${levelStr}] ${component}: ${message}`;

	if (extra) {
		if (extra instanceof Error) {
			entry += `\n  Error: ${extra.message}`;
			if (extra.stack) {
				entry += `\n  Stack: ${extra.stack}`;
			}
		} else {
			entry += `\n  ${JSON.stringify(extra)}`;
		}
	}

	return entry;
}

// ============================================================================
// Logger Implementations
// ============================================================================

/**
 * Create a service-specific logger with hourly rotation.
 *
 * Logs are written to: {home}/logs/{service}/YYYY-MM-DD-HH.log
 *
 * @example
 * const logger = createServiceLogger('loader');
 * logger.error('MetadataLoader', 'Catalog fetch failed', error);
 * // Writes to: ~/.cache/schema-scout/logs/loader/2024-01-11-15.log
 */
export function createServiceLogger(service: ServiceName): Logger {
	function write(entry: string) {
		try {
			// The home dir may be removed while the process runs
			fs.mkdirSync(getServiceLogsDir(service), {recursive: true});
			// Recalculated on each write for rotation
			fs.appendFileSync(getServiceLogPath(service), entry + '\n');
		} catch {
			// Logging failures never reach the caller
		}
	}

	return {
		debug(component: string, message: string, data?: object) {
			write(formatEntry('debug', component, message, data));
		},

		info(component: string, message: string, data?: object) {
			write(formatEntry('info', component, message, data));
		},

		warn(component: string, message: string, data?: object) {
			write(formatEntry('warn', component, message, data));
		},

		error(component: string, message: string, error?: Error) {
			write(formatEntry('error', component, message, error));
		},
	};
}

/**
 * Create a no-op logger for testing or when logging is disabled.
 */
export function createNullLogger(): Logger {
	return {
		debug() {},
		info() {},
		warn() {},
		error() {},
	};
}

export type {ServiceName};
