/**
 * Prefix trie with per-node key aggregation.
 *
 * Every node keeps the keys of all words inserted through it, so a prefix
 * lookup is one descent of len(prefix) steps with no subtree walk. Nodes
 * live in flat arrays indexed by node id (root is 0); children refer to
 * each other by index only.
 */

const EMPTY: ReadonlySet<never> = new Set<never>();

export class PrefixTrie<K> {
	private children: Array<Map<string, number>> = [];
	private keys: Array<Set<K>> = [];
	private terminal: boolean[] = [];
	private wordCount = 0;

	constructor() {
		this.allocate();
	}

	/** Number of distinct words inserted. */
	get size(): number {
		return this.wordCount;
	}

	/** Number of nodes including the root. */
	get nodeCount(): number {
		return this.children.length;
	}

	/**
	 * Insert a word (lower-cased) and tag every node on its path with key.
	 */
	insert(word: string, key: K): void {
		let node = 0;
		this.keys[node].add(key);

		for (const ch of word.toLowerCase()) {
			const edges = this.children[node];
			let next = edges.get(ch);
			if (next === undefined) {
				next = this.allocate();
				edges.set(ch, next);
			}
			node = next;
			this.keys[node].add(key);
		}

		if (!this.terminal[node]) {
			this.terminal[node] = true;
			this.wordCount++;
		}
	}

	/**
	 * All keys of words starting with prefix. The empty prefix yields every
	 * key. The returned set is owned by the trie and must not be mutated.
	 */
	searchPrefix(prefix: string): ReadonlySet<K> {
		let node = 0;
		for (const ch of prefix.toLowerCase()) {
			const next = this.children[node].get(ch);
			if (next === undefined) return EMPTY;
			node = next;
		}
		return this.keys[node];
	}

	clear(): void {
		this.children = [];
		this.keys = [];
		this.terminal = [];
		this.wordCount = 0;
		this.allocate();
	}

	private allocate(): number {
		const id = this.children.length;
		this.children.push(new Map());
		this.keys.push(new Set());
		this.terminal.push(false);
		return id;
	}
}
