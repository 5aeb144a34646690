/**
 * KeyedStore - Registry-style key/value storage.
 *
 * A plain associative store with an object interface. Hosts compose one as a
 * field (a factory cache, a registry's item table) rather than extending it.
 *
 * @example
 * ```typescript
 * const store = new MapKeyedStore<number>();
 * store.set("a", 1).set("b", 2).remove("a");
 * store.get("a", 0); // 0
 * ```
 */

export interface KeyedStore<T> {
	/**
	 * Get the value stored under `key`, or `fallback` when the key is missing.
	 */
	get(key: string): T | undefined;
	get<D>(key: string, fallback: D): T | D;

	/** Store a value, overwriting any previous one. Returns the store for chaining. */
	set(key: string, value: T): this;

	has(key: string): boolean;

	/** Delete `key` if present. Missing keys are ignored. */
	remove(key: string): this;

	clear(): this;

	/**
	 * Frozen copy of every entry. Mutating the result never reaches the store.
	 */
	all(): Readonly<Record<string, T>>;

	isEmpty(): boolean;

	readonly size: number;

	/** All keys, sorted alphabetically. */
	keys(): string[];
}

/**
 * Default KeyedStore backed by a Map.
 */
export class MapKeyedStore<T> implements KeyedStore<T> {
	protected entries = new Map<string, T>();

	get(key: string): T | undefined;
	get<D>(key: string, fallback: D): T | D;
	get<D>(key: string, fallback?: D): T | D | undefined {
		// has() first so that a stored undefined is returned as-is
		if (this.entries.has(key)) {
			return this.entries.get(key);
		}
		return fallback;
	}

	set(key: string, value: T): this {
		this.entries.set(key, value);
		return this;
	}

	has(key: string): boolean {
		return this.entries.has(key);
	}

	remove(key: string): this {
		this.entries.delete(key);
		return this;
	}

	clear(): this {
		this.entries.clear();
		return this;
	}

	all(): Readonly<Record<string, T>> {
		// fromEntries defines own properties, so a "__proto__" key stays data
		return Object.freeze(Object.fromEntries(this.entries));
	}

	isEmpty(): boolean {
		return this.entries.size === 0;
	}

	get size(): number {
		return this.entries.size;
	}

	keys(): string[] {
		return Array.from(this.entries.keys()).sort();
	}
}
