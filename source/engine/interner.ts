/**
 * String pool for schema, table and column names.
 *
 * Catalog rows repeat the same schema and table names thousands of times;
 * interning keeps one copy of each. One instance is created by the
 * composition root and shared by the loader and the search index.
 */
export class StringInterner {
	private readonly pool = new Map<string, string>();
	private lookups = 0;
	private reused = 0;

	intern(value: string): string {
		this.lookups++;
		const existing = this.pool.get(value);
		if (existing !== undefined) {
			this.reused++;
			return existing;
		}
		this.pool.set(value, value);
		return value;
	}

	/** Same as intern, with null and undefined mapped to ''. */
	internOptional(value: string | null | undefined): string {
		return this.intern(value ?? '');
	}

	get size(): number {
		return this.pool.size;
	}

	stats(): {size: number; lookups: number; reused: number} {
		return {size: this.pool.size, lookups: this.lookups, reused: this.reused};
	}

	clear(): void {
		this.pool.clear();
		this.lookups = 0;
		this.reused = 0;
	}
}
