import {describe, it, expect} from 'vitest';
import {editDistance, editDistanceBounded} from '../distance.js';

describe('editDistance', () => {
	it('computes classic Levenshtein distances', () => {
		expect(editDistance('kitten', 'sitting')).toBe(3);
		expect(editDistance('flaw', 'lawn')).toBe(2);
		expect(editDistance('ORDERS', 'ORDER')).toBe(1);
	});

	it('is symmetric and zero only for equal strings', () => {
		const pairs: Array<[string, string]> = [
			['customer', 'costumer'],
			['a', 'abc'],
			['INVOICES', 'INV_DATE'],
		];
		for (const [a, b] of pairs) {
			expect(editDistance(a, b)).toBe(editDistance(b, a));
			expect(editDistance(a, b)).toBeGreaterThan(0);
			expect(editDistance(a, a)).toBe(0);
		}
	});

	it('equals the other length against the empty string', () => {
		expect(editDistance('', 'schema')).toBe(6);
		expect(editDistance('schema', '')).toBe(6);
		expect(editDistance('', '')).toBe(0);
	});

	it('compares case-sensitively', () => {
		expect(editDistance('Id', 'id')).toBe(1);
	});
});

describe('editDistanceBounded', () => {
	it('agrees with editDistance within the bound', () => {
		expect(editDistanceBounded('kitten', 'sitting', 3)).toBe(3);
		expect(editDistanceBounded('kitten', 'sitting', 5)).toBe(3);
		expect(editDistanceBounded('orders', 'ordets', 1)).toBe(1);
		expect(editDistanceBounded('same', 'same', 0)).toBe(0);
	});

	it('returns more than the bound when the distance exceeds it', () => {
		expect(editDistanceBounded('kitten', 'sitting', 1)).toBe(2);
		expect(editDistanceBounded('abcdef', 'uvwxyz', 2)).toBe(3);
	});

	it('short-circuits on length difference', () => {
		expect(editDistanceBounded('a', 'abcd', 2)).toBe(3);
		expect(editDistanceBounded('', 'xy', 1)).toBe(2);
	});

	it('handles an empty side within the bound', () => {
		expect(editDistanceBounded('', 'x', 1)).toBe(1);
	});
});

describe('editDistance and editDistanceBounded on generated pairs', () => {
	// Small alphabet so pairs land on both sides of each bound
	function generateWords(count: number): string[] {
		const alphabet = 'abc_';
		const words: string[] = [];
		let seed = 12345;
		const next = () => {
			seed = (seed * 48271) % 2147483647;
			return seed;
		};
		for (let i = 0; i < count; i++) {
			const length = next() % 7;
			let word = '';
			for (let j = 0; j < length; j++) {
				word += alphabet[next() % alphabet.length];
			}
			words.push(word);
		}
		return words;
	}

	const words = generateWords(40);

	it('is symmetric', () => {
		for (const a of words) {
			for (const b of words) {
				expect(editDistance(a, b)).toBe(editDistance(b, a));
			}
		}
	});

	it('agrees with the exact distance within each bound', () => {
		for (const k of [0, 1, 2, 3, 5]) {
			for (const a of words) {
				for (const b of words) {
					const exact = editDistance(a, b);
					const bounded = editDistanceBounded(a, b, k);
					if (exact <= k) {
						expect(bounded).toBe(exact);
					} else {
						expect(bounded).toBeGreaterThan(k);
					}
				}
			}
		}
	});
});
