/**
 * Flyweight module - shared instances keyed by identifier and context.
 */

export {
	FactoryBase,
	MISS,
	type DerivedEntry,
	type FactoryOptions,
} from "./factory-base.ts";

export {
	FlyweightFactory,
	type Construct,
	type FlyweightFactoryOptions,
} from "./flyweight-factory.ts";

export {
	AsyncFlyweightFactory,
	type AsyncConstruct,
	type AsyncFlyweightFactoryOptions,
	type AcquireOptions,
} from "./async-flyweight-factory.ts";

export {
	ProducerRegistry,
	createRegistryFactory,
	type Producer,
	type ProducerDefinition,
} from "./producer-registry.ts";

export { canonicalize, deriveKey, type Context, type KeyEncoding } from "./derive-key.ts";

export { ConstructionError, UnknownIdentifierError, KeyDerivationError } from "./errors.ts";
