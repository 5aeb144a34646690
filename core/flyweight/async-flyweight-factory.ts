/**
 * AsyncFlyweightFactory - FlyweightFactory for producers that return promises.
 *
 * Concurrent `acquire()` calls for the same derived key share a single
 * pending construction; different keys proceed independently. A failed or
 * aborted construction leaves nothing cached and is retried by the next call.
 *
 * Each caller may pass an AbortSignal. Aborting rejects that caller only;
 * the shared construction is aborted once every caller waiting on it has
 * aborted.
 *
 * `clear()` and `forget()` only drop cached values: a construction already
 * running still caches its result when it finishes.
 */

import type { Context } from "./derive-key.ts";
import { FactoryBase, MISS, type DerivedEntry, type FactoryOptions } from "./factory-base.ts";

export type AsyncConstruct<T> = (
	identifier: string,
	context: Context,
	signal: AbortSignal,
) => T | Promise<T>;

export interface AsyncFlyweightFactoryOptions<T> extends FactoryOptions<T> {
	construct: AsyncConstruct<T>;
}

export interface AcquireOptions {
	signal?: AbortSignal;
}

interface Pending<T> {
	promise: Promise<T>;
	controller: AbortController;
	/** Callers still waiting; Infinity once a caller without a signal joins */
	waiters: number;
}

export class AsyncFlyweightFactory<T> extends FactoryBase<T> {
	private readonly construct: AsyncConstruct<T>;
	private readonly inflight = new Map<string, Pending<T>>();

	constructor(options: AsyncFlyweightFactoryOptions<T>) {
		super(options);
		this.construct = options.construct;
	}

	async acquire(
		identifier: string,
		context: Context = {},
		options: AcquireOptions = {},
	): Promise<T> {
		const { signal } = options;
		signal?.throwIfAborted();

		const entry = this.derive(identifier, context);

		const hit = this.lookup(entry);
		if (hit !== MISS) {
			return hit;
		}

		const pending = this.inflight.get(entry.key) ?? this.start(entry, context);
		return this.wait(entry.key, pending, signal);
	}

	/** Number of constructions currently running. */
	get pendingCount(): number {
		return this.inflight.size;
	}

	private start(entry: DerivedEntry, context: Context): Pending<T> {
		const { identifier, key } = entry;
		const controller = new AbortController();
		const pending: Pending<T> = {
			controller,
			waiters: 0,
			// construct runs in a microtask, after the entry is registered below
			promise: Promise.resolve()
				.then(() => this.construct(identifier, context, controller.signal))
				.then((value) => {
					controller.signal.throwIfAborted();
					this.store.set(key, value);
					return value;
				})
				.catch((error: unknown) => {
					this.logFailure(entry, error);
					throw error;
				})
				.finally(() => this.release(key, pending)),
		};
		this.inflight.set(key, pending);
		return pending;
	}

	private release(key: string, pending: Pending<T>): void {
		if (this.inflight.get(key) === pending) {
			this.inflight.delete(key);
		}
	}

	private wait(key: string, pending: Pending<T>, signal?: AbortSignal): Promise<T> {
		if (!signal) {
			pending.waiters = Infinity;
			return pending.promise;
		}

		pending.waiters += 1;
		return new Promise<T>((resolve, reject) => {
			const onAbort = (): void => {
				pending.waiters -= 1;
				if (pending.waiters === 0) {
					// nobody is left to receive the value; later callers start over
					this.release(key, pending);
					pending.controller.abort(signal.reason);
				}
				reject(signal.reason);
			};
			signal.addEventListener("abort", onAbort, { once: true });
			pending.promise.then(
				(value) => {
					signal.removeEventListener("abort", onAbort);
					resolve(value);
				},
				(error: unknown) => {
					signal.removeEventListener("abort", onAbort);
					reject(error);
				},
			);
		});
	}
}
