/**
 * FactoryBase - cache handling shared by the sync and async factories.
 *
 * Holds the composed KeyedStore plus the options that decide how a key is
 * derived. Subclasses add `acquire()`; everything that only reads or drops
 * cache entries lives here so both factories derive keys the same way.
 */

import { SilentLogger, type Logger } from "../logger.ts";
import { MapKeyedStore, type KeyedStore } from "../registry/index.ts";
import { deriveKey, type Context, type KeyEncoding } from "./derive-key.ts";

/**
 * Options shared by the sync and async factories.
 */
export interface FactoryOptions<T> {
	/** Cache to compose; a fresh MapKeyedStore when omitted */
	cache?: KeyedStore<T>;
	/** Label for log lines (default: "flyweight") */
	name?: string;
	keyEncoding?: KeyEncoding;
	logger?: Logger;
	/**
	 * Map an identifier to its canonical spelling before the key is derived
	 * and before construct sees it (e.g. alias → primary name).
	 */
	resolveIdentifier?: (identifier: string) => string;
}

/** Marks a cache miss; never stored. */
export const MISS: unique symbol = Symbol("flyweight.miss");

export interface DerivedEntry {
	/** Identifier after `resolveIdentifier` */
	identifier: string;
	key: string;
}

export abstract class FactoryBase<T> {
	protected readonly store: KeyedStore<T>;
	protected readonly name: string;
	protected readonly keyEncoding: KeyEncoding;
	protected readonly logger: Logger;
	private readonly resolveIdentifier: (identifier: string) => string;

	constructor(options: FactoryOptions<T>) {
		this.store = options.cache ?? new MapKeyedStore<T>();
		this.name = options.name ?? "flyweight";
		this.keyEncoding = options.keyEncoding ?? "canonical";
		this.logger = options.logger ?? new SilentLogger();
		this.resolveIdentifier = options.resolveIdentifier ?? ((identifier) => identifier);
	}

	/**
	 * Cached value for (identifier, context) without constructing.
	 */
	cached(identifier: string, context: Context = {}): T | undefined {
		return this.store.get(this.derive(identifier, context).key);
	}

	/**
	 * Drop the cached value for (identifier, context), if any.
	 * The next `acquire()` constructs a fresh one.
	 */
	forget(identifier: string, context: Context = {}): this {
		this.store.remove(this.derive(identifier, context).key);
		return this;
	}

	clear(): this {
		this.store.clear();
		return this;
	}

	get size(): number {
		return this.store.size;
	}

	/** The composed cache. */
	get cache(): KeyedStore<T> {
		return this.store;
	}

	protected derive(identifier: string, context: Context): DerivedEntry {
		const resolved = this.resolveIdentifier(identifier);
		return { identifier: resolved, key: deriveKey(resolved, context, this.keyEncoding) };
	}

	/**
	 * Look up a derived key, logging the hit or miss by identifier only
	 * (keys can be as long as the context).
	 */
	protected lookup(entry: DerivedEntry): T | typeof MISS {
		const hit = this.store.get(entry.key, MISS);
		this.logger.debug(`[${this.name}] ${hit === MISS ? "miss" : "hit"} "${entry.identifier}"`);
		return hit;
	}

	protected logFailure(entry: DerivedEntry, error: unknown): void {
		this.logger.warn(`[${this.name}] construct failed for "${entry.identifier}"`, {
			key: entry.key,
			error: String(error),
		});
	}
}
