/**
 * Derived keys for the flyweight cache.
 *
 * A derived key is `<identifier>#<canonical context>`. The canonical form is
 * JSON-like text with object keys sorted, so `{ a: 1, b: 2 }` and
 * `{ b: 2, a: 1 }` map to the same key:
 *
 *   deriveKey("Foo", { b: 2, a: 1 })  // 'Foo#{"a":1,"b":2}'
 *
 * Values JSON cannot express get explicit tokens instead of being lost:
 * `undefined` and holes inside arrays, NaN and the infinities, bigints, Dates,
 * Maps and Sets. Only plain objects (prototype Object.prototype or null) are
 * encoded field by field; class instances, RegExps, URLs and the like carry
 * state their own keys do not show, so they raise KeyDerivationError along
 * with functions, symbols and cycles.
 */

import { createHash } from "node:crypto";
import { KeyDerivationError } from "./errors.ts";

export type KeyEncoding = "canonical" | "sha256";

/** Free-form construction parameters. */
export type Context = Readonly<Record<string, unknown>>;

/**
 * Canonical text for a value. Equal-by-value inputs give equal text.
 */
export function canonicalize(value: unknown): string {
	return encode(value, "$", new Set<object>());
}

/**
 * Compute the cache key for an identifier and context.
 *
 * `#` and `\` in the identifier are backslash-escaped so the first bare `#`
 * always ends the identifier.
 */
export function deriveKey(
	identifier: string,
	context: Context = {},
	encoding: KeyEncoding = "canonical",
): string {
	const canonical = canonicalize(context);
	const suffix = encoding === "sha256"
		? createHash("sha256").update(canonical, "utf8").digest("hex")
		: canonical;
	return `${escapeIdentifier(identifier)}#${suffix}`;
}

function escapeIdentifier(identifier: string): string {
	return identifier.replace(/[\\#]/g, (ch) => `\\${ch}`);
}

function encode(value: unknown, path: string, ancestors: Set<object>): string {
	switch (typeof value) {
		case "string":
			return JSON.stringify(value);
		case "boolean":
			return value ? "true" : "false";
		case "number":
			return encodeNumber(value);
		case "bigint":
			return `${value}n`;
		case "undefined":
			return "undefined";
		case "function":
			throw new KeyDerivationError(path, "functions have no canonical form");
		case "symbol":
			throw new KeyDerivationError(path, "symbols have no canonical form");
	}

	if (typeof value !== "object" || value === null) {
		return "null";
	}

	if (ancestors.has(value)) {
		throw new KeyDerivationError(path, "cyclic reference");
	}
	ancestors.add(value);
	try {
		return encodeObject(value, path, ancestors);
	} finally {
		ancestors.delete(value);
	}
}

function encodeNumber(value: number): string {
	if (Number.isNaN(value)) return "NaN";
	if (value === Infinity) return "Infinity";
	if (value === -Infinity) return "-Infinity";
	// JSON.stringify(-0) is "0", which is what we want for equality
	return JSON.stringify(value);
}

function encodeObject(value: object, path: string, ancestors: Set<object>): string {
	if (Array.isArray(value)) {
		const items: string[] = [];
		for (let i = 0; i < value.length; i++) {
			items.push(i in value ? encode(value[i], `${path}[${i}]`, ancestors) : "<hole>");
		}
		return `[${items.join(",")}]`;
	}

	if (value instanceof Date) {
		const time = value.getTime();
		return Number.isNaN(time) ? "Date(Invalid)" : `Date(${value.toISOString()})`;
	}

	if (value instanceof Map) {
		const pairs: string[] = [];
		for (const [k, v] of value) {
			const key = encode(k, `${path}.<key>`, ancestors);
			pairs.push(`${key}:${encode(v, `${path}.get(${key})`, ancestors)}`);
		}
		return `Map{${pairs.sort().join(",")}}`;
	}

	if (value instanceof Set) {
		const members = Array.from(value, (member) => encode(member, `${path}.<member>`, ancestors));
		return `Set[${members.sort().join(",")}]`;
	}

	const proto: unknown = Object.getPrototypeOf(value);
	if (proto !== Object.prototype && proto !== null) {
		const kind = value.constructor?.name || "non-plain";
		throw new KeyDerivationError(path, `${kind} objects have no canonical form`);
	}

	const fields: string[] = [];
	for (const key of Object.keys(value).sort()) {
		const field: unknown = Reflect.get(value, key);
		// undefined properties are dropped, as JSON does
		if (field === undefined) continue;
		fields.push(`${JSON.stringify(key)}:${encode(field, `${path}.${key}`, ancestors)}`);
	}
	return `{${fields.join(",")}}`;
}
