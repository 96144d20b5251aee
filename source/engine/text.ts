/**
 * Text helpers shared by the fuzzy matcher and the search index.
 */

const WHITESPACE = /\s+/;
const WORD_SEPARATORS = /[\s_]+/;
const NON_ALPHANUMERIC = /[^\p{L}\p{N}]+/u;

/**
 * Lower-case and turn underscores into spaces.
 *
 * @example normalize('USER_ACCOUNTS') // 'user accounts'
 */
export function normalize(text: string): string {
	return text.toLowerCase().replaceAll('_', ' ');
}

/**
 * Split on runs of whitespace, dropping empty pieces.
 *
 * @example splitWords('  Hello   world  ') // ['Hello', 'world']
 */
export function splitWords(text: string): string[] {
	return text.split(WHITESPACE).filter(word => word.length > 0);
}

/**
 * Lower-cased words of an identifier, split on whitespace and underscores.
 * Used for the word tries.
 */
export function identifierWords(name: string): string[] {
	return name
		.toLowerCase()
		.split(WORD_SEPARATORS)
		.filter(word => word.length > 0);
}

/**
 * Split on anything that is not a Unicode letter or digit.
 */
export function tokenize(text: string): string[] {
	return text.split(NON_ALPHANUMERIC).filter(token => token.length > 0);
}

/**
 * Display form of a schema or library name.
 *
 * @example humanizeSchemaName('OH__HST_MASTER') // 'OH HST MASTER'
 */
export function humanizeSchemaName(name: string): string {
	return name
		.replaceAll('__', '_')
		.split('_')
		.filter(part => part.length > 0)
		.join(' ');
}
