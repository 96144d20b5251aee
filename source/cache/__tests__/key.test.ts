import {describe, it, expect} from 'vitest';
import {cacheKey} from '../key.js';

describe('cacheKey', () => {
	it('uses ALL_SCHEMAS without a filter', () => {
		expect(cacheKey()).toBe('ALL_SCHEMAS');
		expect(cacheKey(null)).toBe('ALL_SCHEMAS');
		expect(cacheKey('')).toBe('ALL_SCHEMAS');
	});

	it('upper-cases the filter', () => {
		expect(cacheKey('dacdata')).toBe('DACDATA');
	});

	it('adds pagination only when a limit is given', () => {
		expect(cacheKey('TEST', 10)).toBe('TEST_LIMIT10_OFFSET0');
		expect(cacheKey('test', 10, 20)).toBe('TEST_LIMIT10_OFFSET20');
		expect(cacheKey(undefined, 5, 5)).toBe('ALL_SCHEMAS_LIMIT5_OFFSET5');
		expect(cacheKey('X', undefined, 5)).toBe('X');
	});

	it('treats a zero limit as pagination', () => {
		expect(cacheKey('X', 0, 5)).toBe('X_LIMIT0_OFFSET5');
	});
});
