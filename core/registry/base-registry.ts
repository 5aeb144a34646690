/**
 * BaseRegistry - named lookup table with aliases.
 *
 * Items live in a composed KeyedStore; aliases live in a second one that
 * points each alias at its primary key. Subclasses decide what an item is
 * and expose a typed `register()` on top of `registerItem()`.
 *
 * Used by: ProducerRegistry
 */

import { MapKeyedStore, type KeyedStore } from "./keyed-store.ts";

/**
 * Error thrown when a requested item is not found in the registry.
 */
export class RegistryNotFoundError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		public readonly availableKeys: string[],
	) {
		const available = availableKeys.length > 0
			? `Available: ${availableKeys.join(", ")}`
			: "Registry is empty";
		super(`${registryName}: "${key}" not found. ${available}`);
		this.name = "RegistryNotFoundError";
	}
}

/**
 * Error thrown when registration conflicts with an existing key or alias.
 */
export class RegistryConflictError extends Error {
	constructor(
		public readonly key: string,
		public readonly registryName: string,
		public readonly conflictType: "key" | "alias",
	) {
		const type = conflictType === "key" ? "Key" : "Alias";
		super(`${registryName}: ${type} "${key}" is already registered`);
		this.name = "RegistryConflictError";
	}
}

export interface RegistryOptions {
	/** Name of the registry (used in error messages) */
	name: string;
	/** Whether to throw on duplicate registration (default: true) */
	throwOnConflict?: boolean;
}

/**
 * @typeParam T - Type of items stored in the registry
 */
export class BaseRegistry<T> {
	protected readonly items: KeyedStore<T> = new MapKeyedStore<T>();
	protected readonly aliasMap: KeyedStore<string> = new MapKeyedStore<string>();
	protected readonly registryName: string;
	protected readonly throwOnConflict: boolean;

	constructor(options: RegistryOptions) {
		this.registryName = options.name;
		this.throwOnConflict = options.throwOnConflict ?? true;
	}

	/**
	 * Register an item under a key and optional aliases.
	 *
	 * Returns false when a conflict was skipped (throwOnConflict=false).
	 *
	 * @throws RegistryConflictError if the key or an alias is taken
	 */
	protected registerItem(key: string, item: T, aliases?: readonly string[]): boolean {
		const names = [key, ...(aliases ?? [])];
		const seen = new Set<string>();

		for (const [index, name] of names.entries()) {
			if (this.isTaken(name) || seen.has(name)) {
				if (this.throwOnConflict) {
					throw new RegistryConflictError(
						name,
						this.registryName,
						index === 0 ? "key" : "alias",
					);
				}
				return false;
			}
			seen.add(name);
		}

		this.items.set(key, item);
		for (const alias of aliases ?? []) {
			this.aliasMap.set(alias, key);
		}
		return true;
	}

	/**
	 * Get an item by key or alias. Returns undefined if not found.
	 */
	get(keyOrAlias: string): T | undefined {
		return this.items.get(this.resolveAlias(keyOrAlias));
	}

	/**
	 * Get an item by key or alias.
	 * Throws RegistryNotFoundError if not found.
	 */
	getOrThrow(keyOrAlias: string): T {
		const item = this.get(keyOrAlias);
		if (item === undefined) {
			throw new RegistryNotFoundError(keyOrAlias, this.registryName, this.keys());
		}
		return item;
	}

	has(keyOrAlias: string): boolean {
		return this.isTaken(keyOrAlias);
	}

	list(): T[] {
		return Object.values(this.items.all());
	}

	/** Primary keys, sorted alphabetically. */
	keys(): string[] {
		return this.items.keys();
	}

	/** Aliases, sorted alphabetically. */
	aliases(): string[] {
		return this.aliasMap.keys();
	}

	/** Number of registered items (aliases not counted). */
	get size(): number {
		return this.items.size;
	}

	/**
	 * Remove an item by primary key, along with its aliases.
	 */
	delete(key: string): boolean {
		if (!this.items.has(key)) {
			return false;
		}

		for (const [alias, primaryKey] of Object.entries(this.aliasMap.all())) {
			if (primaryKey === key) {
				this.aliasMap.remove(alias);
			}
		}

		this.items.remove(key);
		return true;
	}

	clear(): void {
		this.items.clear();
		this.aliasMap.clear();
	}

	/**
	 * Resolve an alias to its primary key.
	 * Returns the input if it's already a primary key or not found.
	 */
	resolveAlias(keyOrAlias: string): string {
		return this.aliasMap.get(keyOrAlias, keyOrAlias);
	}

	private isTaken(name: string): boolean {
		return this.items.has(name) || this.aliasMap.has(name);
	}
}
