/**
 * Levenshtein edit distance, single-row dynamic programming.
 *
 * Inputs are compared by UTF-16 code unit. The shorter string always
 * spans the row so memory is O(min(len(a), len(b))).
 */

function orderByLength(a: string, b: string): [long: string, short: string] {
	return a.length >= b.length ? [a, b] : [b, a];
}

/**
 * Full edit distance between two strings.
 */
export function editDistance(a: string, b: string): number {
	if (a === b) return 0;
	const [long, short] = orderByLength(a, b);
	if (short.length === 0) return long.length;

	let previous = new Int32Array(short.length + 1);
	let current = new Int32Array(short.length + 1);
	for (let j = 0; j <= short.length; j++) previous[j] = j;

	for (let i = 1; i <= long.length; i++) {
		current[0] = i;
		const ch = long.charCodeAt(i - 1);
		for (let j = 1; j <= short.length; j++) {
			const cost = ch === short.charCodeAt(j - 1) ? 0 : 1;
			current[j] = Math.min(
				previous[j] + 1,
				current[j - 1] + 1,
				previous[j - 1] + cost,
			);
		}
		[previous, current] = [current, previous];
	}

	return previous[short.length];
}

/**
 * Edit distance with an upper bound.
 *
 * Exact whenever the true distance is <= maxDist. Otherwise returns
 * maxDist + 1 as soon as that is certain, without finishing the table.
 */
export function editDistanceBounded(
	a: string,
	b: string,
	maxDist: number,
): number {
	const over = maxDist + 1;
	if (Math.abs(a.length - b.length) > maxDist) return over;
	if (a === b) return 0;

	const [long, short] = orderByLength(a, b);
	if (short.length === 0) return long.length;

	let previous = new Int32Array(short.length + 1);
	let current = new Int32Array(short.length + 1);
	for (let j = 0; j <= short.length; j++) previous[j] = j;

	for (let i = 1; i <= long.length; i++) {
		current[0] = i;
		let rowMin = i;
		const ch = long.charCodeAt(i - 1);
		for (let j = 1; j <= short.length; j++) {
			const cost = ch === short.charCodeAt(j - 1) ? 0 : 1;
			const value = Math.min(
				previous[j] + 1,
				current[j - 1] + 1,
				previous[j - 1] + cost,
			);
			current[j] = value;
			if (value < rowMin) rowMin = value;
		}
		// Row minimums never decrease, so the final distance is at least rowMin
		if (rowMin > maxDist) return over;
		[previous, current] = [current, previous];
	}

	const distance = previous[short.length];
	return distance > maxDist ? over : distance;
}
