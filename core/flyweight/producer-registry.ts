/**
 * Producer Registry
 *
 * Explicit identifier → producer table used as a factory's construct step.
 * Registering a producer replaces looking a type up by name at runtime, and
 * an unregistered identifier becomes a typed UnknownIdentifierError.
 *
 * @example
 * ```typescript
 * const shapes = new ProducerRegistry<Shape>("shapes")
 *   .register({ name: "circle", aliases: ["round"], produce: (ctx) => new Circle(ctx) })
 *   .register({ name: "square", produce: (ctx) => new Square(ctx) });
 *
 * const factory = createRegistryFactory(shapes);
 * factory.acquire("round", { r: 2 }) === factory.acquire("circle", { r: 2 }); // true
 * ```
 */

import { BaseRegistry } from "../registry/index.ts";
import type { Context } from "./derive-key.ts";
import { UnknownIdentifierError } from "./errors.ts";
import type { FactoryOptions } from "./factory-base.ts";
import { FlyweightFactory, type Construct } from "./flyweight-factory.ts";

/**
 * Builds a value from a context. Receives the primary identifier so one
 * function can serve several entries.
 */
export type Producer<T> = (context: Context, identifier: string) => T;

export interface ProducerDefinition<T> {
	/** Primary identifier */
	name: string;
	aliases?: readonly string[];
	produce: Producer<T>;
	description?: string;
}

export class ProducerRegistry<T> extends BaseRegistry<ProducerDefinition<T>> {
	constructor(name = "ProducerRegistry") {
		super({ name, throwOnConflict: true });
	}

	/**
	 * Register a producer. Returns the registry for chaining.
	 *
	 * @throws RegistryConflictError if the name or an alias is taken
	 */
	register(def: ProducerDefinition<T>): this {
		if (typeof def.produce !== "function") {
			throw new TypeError(
				`Invalid ProducerDefinition: "${def.name}" must have a produce function`,
			);
		}
		this.registerItem(def.name, def, def.aliases);
		return this;
	}

	/**
	 * Run the producer registered under an identifier or alias.
	 *
	 * @throws UnknownIdentifierError when nothing is registered under it
	 */
	produce(identifier: string, context: Context = {}): T {
		const def = this.get(identifier);
		if (!def) {
			throw new UnknownIdentifierError(identifier, this.keys());
		}
		return def.produce(context, def.name);
	}

	/**
	 * This registry as a factory construct function.
	 */
	asConstruct(): Construct<T> {
		return (identifier, context) => this.produce(identifier, context);
	}
}

/**
 * FlyweightFactory whose construct step is a ProducerRegistry.
 * Aliases resolve to the primary name first, so an alias and its primary
 * name share cache entries. A caller-supplied `resolveIdentifier` runs
 * before alias resolution.
 */
export function createRegistryFactory<T>(
	registry: ProducerRegistry<T>,
	options: FactoryOptions<T> = {},
): FlyweightFactory<T> {
	return new FlyweightFactory<T>({
		...options,
		construct: registry.asConstruct(),
		resolveIdentifier: (identifier) =>
			registry.resolveAlias(options.resolveIdentifier?.(identifier) ?? identifier),
	});
}
