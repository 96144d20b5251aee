/**
 * Boolean fuzzy predicate used for quick filtering of names and remarks.
 */

import {editDistanceBounded} from './distance.js';
import {tokenize} from './text.js';

/**
 * True when every character of query appears in text, in order.
 */
export function isSubsequence(text: string, query: string): boolean {
	if (query.length > text.length) return false;
	let position = 0;
	for (const ch of query) {
		const found = text.indexOf(ch, position);
		if (found === -1) return false;
		position = found + ch.length;
	}
	return true;
}

/**
 * Case-insensitive fuzzy match. Checks, in order:
 * substring, token prefix or one-edit typo, then subsequence.
 *
 * An empty query matches everything, including empty text.
 */
export function fuzzyMatch(text: string, query: string): boolean {
	if (query.length === 0) return true;
	if (text.length === 0) return false;

	const haystack = text.toLowerCase();
	const needle = query.toLowerCase();

	if (haystack.includes(needle)) return true;

	for (const token of tokenize(haystack)) {
		if (token.startsWith(needle)) return true;
		if (editDistanceBounded(token, needle, 1) <= 1) return true;
	}

	return isSubsequence(haystack, needle);
}
