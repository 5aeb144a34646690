/**
 * Registry module - key/value storage and named lookup tables.
 */

export { MapKeyedStore, type KeyedStore } from "./keyed-store.ts";

export {
	BaseRegistry,
	RegistryNotFoundError,
	RegistryConflictError,
	type RegistryOptions,
} from "./base-registry.ts";
