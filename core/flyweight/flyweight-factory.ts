/**
 * FlyweightFactory - shares one instance per (identifier, context).
 *
 * The factory composes a KeyedStore as its cache and a consumer-supplied
 * construct function as its extension point. `acquire()` derives a key from
 * the identifier and context, returns the cached value when there is one,
 * and otherwise constructs, caches and returns a new value.
 *
 * Errors thrown by `construct` reach the caller unchanged and nothing is
 * cached for them, so the next `acquire()` with the same inputs tries again.
 *
 * @example
 * ```typescript
 * const colors = new FlyweightFactory({
 *   construct: (name, ctx) => new Color(name, ctx),
 * });
 * colors.acquire("red", { alpha: 1 }) === colors.acquire("red", { alpha: 1 }); // true
 * ```
 */

import type { FlyweightConfig } from "../config.ts";
import { createLogger } from "../logger.ts";
import type { Context } from "./derive-key.ts";
import { FactoryBase, MISS, type FactoryOptions } from "./factory-base.ts";

/**
 * Extension point: build a new value for an identifier and context.
 * Signal unknown identifiers or bad contexts by throwing (ConstructionError).
 */
export type Construct<T> = (identifier: string, context: Context) => T;

export interface FlyweightFactoryOptions<T> extends FactoryOptions<T> {
	construct: Construct<T>;
}

export class FlyweightFactory<T> extends FactoryBase<T> {
	protected readonly construct: Construct<T>;

	constructor(options: FlyweightFactoryOptions<T>) {
		super(options);
		this.construct = options.construct;
	}

	/**
	 * Build a factory from a validated config.
	 * The logger is derived from `config.logLevel` unless one is passed.
	 */
	static fromConfig<T>(
		config: FlyweightConfig,
		options: FlyweightFactoryOptions<T>,
	): FlyweightFactory<T> {
		return new FlyweightFactory({
			name: config.name,
			keyEncoding: config.keyEncoding,
			logger: createLogger(config.logLevel, config.name),
			...options,
		});
	}

	/**
	 * Return the shared value for (identifier, context), constructing it on
	 * first use.
	 *
	 * @throws whatever `construct` throws; KeyDerivationError for contexts
	 *   with no canonical form
	 */
	acquire(identifier: string, context: Context = {}): T {
		const entry = this.derive(identifier, context);

		const hit = this.lookup(entry);
		if (hit !== MISS) {
			return hit;
		}

		let value: T;
		try {
			value = this.construct(entry.identifier, context);
		} catch (error) {
			this.logFailure(entry, error);
			throw error;
		}

		this.store.set(entry.key, value);
		return value;
	}
}
