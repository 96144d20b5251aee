import {describe, it, expect} from 'vitest';
import {StringInterner} from '../interner.js';

describe('StringInterner', () => {
	it('pools equal strings', () => {
		const interner = new StringInterner();
		const first = interner.intern('DACDATA');
		const second = interner.intern(['DAC', 'DATA'].join(''));

		expect(second).toBe(first);
		expect(interner.size).toBe(1);
		expect(interner.stats()).toEqual({size: 1, lookups: 2, reused: 1});
	});

	it('maps missing values to the empty string', () => {
		const interner = new StringInterner();

		expect(interner.internOptional(null)).toBe('');
		expect(interner.internOptional(undefined)).toBe('');
		expect(interner.size).toBe(1);
	});

	it('clear resets pool and counters', () => {
		const interner = new StringInterner();
		interner.intern('A');
		interner.clear();

		expect(interner.stats()).toEqual({size: 0, lookups: 0, reused: 0});
	});
});
