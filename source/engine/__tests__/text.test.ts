import {describe, it, expect} from 'vitest';
import {
	humanizeSchemaName,
	identifierWords,
	normalize,
	splitWords,
	tokenize,
} from '../text.js';

describe('text helpers', () => {
	it('normalize lower-cases and replaces underscores', () => {
		expect(normalize('USER_ACCOUNTS')).toBe('user accounts');
	});

	it('splitWords drops surrounding and repeated whitespace', () => {
		expect(splitWords('  Hello   world  ')).toEqual(['Hello', 'world']);
		expect(splitWords('   ')).toEqual([]);
	});

	it('identifierWords splits on underscores and spaces', () => {
		expect(identifierWords('OH_HST  Master__x')).toEqual([
			'oh',
			'hst',
			'master',
			'x',
		]);
	});

	it('tokenize splits on punctuation', () => {
		expect(tokenize('a.b-c d_e')).toEqual(['a', 'b', 'c', 'd', 'e']);
	});

	it('humanizeSchemaName collapses double underscores', () => {
		expect(humanizeSchemaName('OH__HST_MASTER')).toBe('OH HST MASTER');
		expect(humanizeSchemaName('DACDATA')).toBe('DACDATA');
	});
});
