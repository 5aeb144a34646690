/**
 * Tests for FlyweightFactory.
 *
 * The fixture maps an identifier like "Foo" to a FooError instance and
 * rejects identifiers it has no type for.
 */

import { describe, expect, it, vi } from "vitest";
import { parseFlyweightConfig } from "../config.ts";
import type { Logger } from "../logger.ts";
import { MapKeyedStore } from "../registry/index.ts";
import type { Context } from "./derive-key.ts";
import { ConstructionError, KeyDerivationError } from "./errors.ts";
import { FlyweightFactory } from "./flyweight-factory.ts";

class FooError extends Error {}
class BarError extends Error {}

const ERROR_TYPES = new Map<string, new () => Error>([
	["Foo", FooError],
	["Bar", BarError],
]);

function createErrorFactory(options: { cache?: MapKeyedStore<Error>; logger?: Logger } = {}) {
	const construct = vi.fn((identifier: string, _context: Context): Error => {
		const ErrorType = ERROR_TYPES.get(identifier);
		if (!ErrorType) {
			throw new ConstructionError(identifier, `No error type for "${identifier}"`);
		}
		return new ErrorType();
	});
	const factory = new FlyweightFactory<Error>({ construct, name: "errors", ...options });
	return { factory, construct };
}

function catchError(fn: () => unknown): unknown {
	try {
		fn();
	} catch (e) {
		return e;
	}
	return undefined;
}

function createMockLogger() {
	return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("FlyweightFactory", () => {
	describe("acquire", () => {
		it("returns the same instance for the same identifier", () => {
			const { factory, construct } = createErrorFactory();

			const first = factory.acquire("Foo");
			const second = factory.acquire("Foo", {});

			expect(first).toBeInstanceOf(FooError);
			expect(second).toBe(first);
			expect(construct).toHaveBeenCalledTimes(1);
			expect(construct).toHaveBeenCalledWith("Foo", {});
		});

		it("returns distinct instances for different identifiers", () => {
			const { factory } = createErrorFactory();

			const foo = factory.acquire("Foo");
			const bar = factory.acquire("Bar");

			expect(bar).toBeInstanceOf(BarError);
			expect(bar).not.toBe(foo);
			expect(factory.size).toBe(2);
		});

		it("returns distinct instances for different contexts", () => {
			const { factory, construct } = createErrorFactory();

			const a = factory.acquire("Foo", { code: 1 });
			const b = factory.acquire("Foo", { code: 2 });

			expect(a).not.toBe(b);
			expect(construct).toHaveBeenCalledTimes(2);
		});

		it("ignores the order of context entries", () => {
			const { factory, construct } = createErrorFactory();

			const a = factory.acquire("Foo", { a: 1, b: 2 });
			const b = factory.acquire("Foo", { b: 2, a: 1 });

			expect(b).toBe(a);
			expect(construct).toHaveBeenCalledTimes(1);
		});

		it("treats value-equal nested contexts as the same key", () => {
			const { factory } = createErrorFactory();

			const a = factory.acquire("Foo", { opts: { depth: 2, tags: ["x"] } });
			const b = factory.acquire("Foo", { opts: { tags: ["x"], depth: 2 } });

			expect(b).toBe(a);
		});

		it("keeps a sparse array apart from an empty one", () => {
			const { factory, construct } = createErrorFactory();

			const holey = factory.acquire("Foo", { xs: [,] });
			const empty = factory.acquire("Foo", { xs: [] });

			expect(empty).not.toBe(holey);
			expect(construct).toHaveBeenCalledTimes(2);
		});

		it("passes the context to construct", () => {
			const { factory, construct } = createErrorFactory();
			const context = { retry: true };

			factory.acquire("Bar", context);

			expect(construct).toHaveBeenCalledWith("Bar", context);
		});
	});

	describe("construction failures", () => {
		it("propagates the construct error unchanged", () => {
			const { factory } = createErrorFactory();

			const caught = catchError(() => factory.acquire("Unknown"));

			if (!(caught instanceof ConstructionError)) {
				throw new Error(`expected ConstructionError, got ${String(caught)}`);
			}
			expect(caught.identifier).toBe("Unknown");
			expect(caught.message).toBe('No error type for "Unknown"');
		});

		it("rethrows the very error object construct threw", () => {
			const boom = new RangeError("boom");
			const factory = new FlyweightFactory<number>({
				construct: () => {
					throw boom;
				},
			});

			expect(catchError(() => factory.acquire("any"))).toBe(boom);
		});

		it("does not cache failures", () => {
			const { factory, construct } = createErrorFactory();

			expect(() => factory.acquire("Unknown")).toThrow(ConstructionError);
			expect(() => factory.acquire("Unknown")).toThrow(ConstructionError);

			expect(construct).toHaveBeenCalledTimes(2);
			expect(factory.size).toBe(0);
		});

		it("rejects contexts without a canonical form before constructing", () => {
			const { factory, construct } = createErrorFactory();

			expect(() => factory.acquire("Foo", { callback: () => undefined })).toThrow(
				KeyDerivationError,
			);
			expect(construct).not.toHaveBeenCalled();
		});

		it("rejects non-plain objects in the context before constructing", () => {
			const { factory, construct } = createErrorFactory();

			const caught = catchError(() => factory.acquire("Foo", { pattern: /a/ }));

			if (!(caught instanceof KeyDerivationError)) {
				throw new Error(`expected KeyDerivationError, got ${String(caught)}`);
			}
			expect(caught.path).toBe("$.pattern");
			expect(construct).not.toHaveBeenCalled();
			expect(factory.size).toBe(0);
		});

		it("logs the failure at warn level", () => {
			const logger = createMockLogger();
			const { factory } = createErrorFactory({ logger });

			expect(() => factory.acquire("Unknown")).toThrow();

			expect(logger.warn).toHaveBeenCalledWith('[errors] construct failed for "Unknown"', {
				key: "Unknown#{}",
				error: 'ConstructionError: No error type for "Unknown"',
			});
		});
	});

	describe("logging", () => {
		it("logs hits and misses by identifier without the context", () => {
			const logger = createMockLogger();
			const { factory } = createErrorFactory({ logger });
			const context = { payload: "x".repeat(500) };

			factory.acquire("Foo", context);
			factory.acquire("Foo", context);

			expect(logger.debug.mock.calls).toEqual([['[errors] miss "Foo"'], ['[errors] hit "Foo"']]);
		});
	});

	describe("cache management", () => {
		it("peeks at cached values without constructing", () => {
			const { factory, construct } = createErrorFactory();

			expect(factory.cached("Foo")).toBeUndefined();
			const foo = factory.acquire("Foo");

			expect(factory.cached("Foo")).toBe(foo);
			expect(construct).toHaveBeenCalledTimes(1);
		});

		it("forgets one entry", () => {
			const { factory } = createErrorFactory();
			const foo = factory.acquire("Foo");
			const bar = factory.acquire("Bar");

			factory.forget("Foo");

			expect(factory.acquire("Foo")).not.toBe(foo);
			expect(factory.acquire("Bar")).toBe(bar);
		});

		it("clears every entry", () => {
			const { factory } = createErrorFactory();
			const foo = factory.acquire("Foo");

			factory.clear();

			expect(factory.size).toBe(0);
			expect(factory.acquire("Foo")).not.toBe(foo);
		});

		it("stores values in an injected cache", () => {
			const cache = new MapKeyedStore<Error>();
			const { factory } = createErrorFactory({ cache });

			const foo = factory.acquire("Foo", { level: 1 });

			expect(factory.cache).toBe(cache);
			expect(cache.get('Foo#{"level":1}')).toBe(foo);
		});

		it("reuses values already present in an injected cache", () => {
			const cache = new MapKeyedStore<Error>();
			const seeded = new Error("seeded");
			cache.set("Foo#{}", seeded);
			const { factory, construct } = createErrorFactory({ cache });

			expect(factory.acquire("Foo")).toBe(seeded);
			expect(construct).not.toHaveBeenCalled();
		});
	});

	describe("fromConfig", () => {
		it("applies name and key encoding from config", () => {
			const config = parseFlyweightConfig({
				name: "hashed",
				keyEncoding: "sha256",
				logLevel: "silent",
			});
			const factory = FlyweightFactory.fromConfig(config, {
				construct: (identifier: string) => ({ identifier }),
			});

			const value = factory.acquire("Foo", { a: 1 });

			expect(value).toEqual({ identifier: "Foo" });
			expect(factory.cache.keys()).toHaveLength(1);
			expect(factory.cache.keys()[0]).toMatch(/^Foo#[0-9a-f]{64}$/);
		});

		it("prefers an explicit logger over the configured level", () => {
			const logger = createMockLogger();
			const factory = FlyweightFactory.fromConfig(parseFlyweightConfig({}), {
				construct: () => 1,
				logger,
			});

			factory.acquire("one");
			factory.acquire("one");

			expect(logger.debug).toHaveBeenNthCalledWith(1, '[flyweight] miss "one"');
			expect(logger.debug).toHaveBeenNthCalledWith(2, '[flyweight] hit "one"');
		});
	});
});
