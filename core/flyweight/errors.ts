/**
 * Error types for flyweight construction and key derivation.
 */

/**
 * Raised by a construct function when it cannot produce a value.
 * Factories pass it through to the caller untouched.
 */
export class ConstructionError extends Error {
	constructor(
		public readonly identifier: string,
		message: string,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "ConstructionError";
	}
}

/**
 * Raised when no producer is registered for an identifier.
 */
export class UnknownIdentifierError extends ConstructionError {
	constructor(
		identifier: string,
		public readonly available: string[],
	) {
		const hint = available.length > 0
			? `Available: ${available.join(", ")}`
			: "No producers registered";
		super(identifier, `Unknown identifier "${identifier}". ${hint}`);
		this.name = "UnknownIdentifierError";
	}
}

/**
 * Raised when a context value has no canonical form.
 */
export class KeyDerivationError extends Error {
	constructor(
		public readonly path: string,
		reason: string,
	) {
		super(`Cannot derive key: ${reason} at ${path}`);
		this.name = "KeyDerivationError";
	}
}
