/**
 * @module
 * Building factories from resources that know how to close themselves.
 * Every constructor here takes a zero-argument thunk that is evaluated anew on
 * each acquisition, never memoized: acquiring the same factory twice opens the
 * resource twice.
 */

import type { Kind, TypeLambda } from "./kind";
import { type Async, type Monad, suspend } from "./effect";
import { type Factory, type Handle, factory } from "./types";

// =================================================================
// Section 1: Closeable and Disposable Resources
// =================================================================

/** A resource with a synchronous close operation. */
export interface Closeable {
  close(): void;
}

/** A resource whose close operation completes asynchronously. */
export interface AsyncCloseable {
  close(): PromiseLike<void> | void;
}

export const DisposeSymbol: unique symbol = Symbol.for("Symbol.dispose");
export const AsyncDisposeSymbol: unique symbol = Symbol.for("Symbol.asyncDispose");

export interface Disposable {
  [DisposeSymbol](): void;
}
export interface AsyncDisposable {
  [AsyncDisposeSymbol](): PromiseLike<void>;
}

export function isDisposable(value: unknown): value is Disposable {
  return (
    typeof value === "object" &&
    value !== null &&
    DisposeSymbol in value &&
    typeof value[DisposeSymbol] === "function"
  );
}

export function isAsyncDisposable(value: unknown): value is AsyncDisposable {
  return (
    typeof value === "object" &&
    value !== null &&
    AsyncDisposeSymbol in value &&
    typeof value[AsyncDisposeSymbol] === "function"
  );
}

// =================================================================
// Section 2: Factory Constructors
// =================================================================

/**
 * The general bracket: `acquire` is called on every acquisition and `release`
 * receives the acquired value when the handle is released.
 *
 * @example
 * ```typescript
 * const pool = make(
 *   task,
 *   () => () => createPool(config),
 *   (p) => () => p.end(),
 * );
 * ```
 */
export function make<F extends TypeLambda, R>(
  effect: Monad<F>,
  acquire: () => Kind<F, R>,
  release: (resource: R) => Kind<F, void>,
): Factory<F, R> {
  return factory(() =>
    effect.map(
      acquire(),
      (resource): Handle<F, R> => ({
        value: resource,
        release: () => release(resource),
      }),
    ),
  );
}

/**
 * A factory for a `Closeable` resource. `construct` runs inside the host on
 * every acquisition, and `close()` becomes the release action.
 *
 * @example
 * ```typescript
 * const log = managed(io, () => new FileLog("/var/log/app.log"));
 * unsafeRunIO(usingOrRelease(io, log, (l) => () => l.write("started")));
 * ```
 */
export function managed<F extends TypeLambda, R extends Closeable>(
  effect: Monad<F>,
  construct: () => R,
): Factory<F, R> {
  return make(
    effect,
    () => suspend(effect, construct),
    (resource) => suspend(effect, () => resource.close()),
  );
}

/**
 * A factory for a `Disposable` resource; `[DisposeSymbol]()` becomes the
 * release action.
 */
export function disposable<F extends TypeLambda, R extends Disposable>(
  effect: Monad<F>,
  construct: () => R,
): Factory<F, R> {
  return make(
    effect,
    () => suspend(effect, construct),
    (resource) => suspend(effect, () => resource[DisposeSymbol]()),
  );
}

/**
 * A factory for resources that open or close asynchronously. `construct` may
 * return the resource or a promise of it. An `AsyncDisposable` is released
 * through `[AsyncDisposeSymbol]()`, anything else through `close()`.
 */
export function managedAsync<
  F extends TypeLambda,
  R extends AsyncDisposable | AsyncCloseable,
>(
  effect: Monad<F> & Async<F>,
  construct: () => R | PromiseLike<R>,
): Factory<F, R> {
  return make(
    effect,
    () => effect.fromPromise(() => new Promise<R>((resolve) => resolve(construct()))),
    (resource) => effect.fromPromise(() => closeAsync(resource)),
  );
}

async function closeAsync(
  resource: AsyncDisposable | AsyncCloseable,
): Promise<void> {
  if (isAsyncDisposable(resource)) {
    await resource[AsyncDisposeSymbol]();
    return;
  }
  await resource.close();
}

/**
 * Adapts an object with a differently named async cleanup method (such as
 * `.end()` or `.disconnect()`) to `AsyncDisposable`, for use with
 * `managedAsync`.
 */
export function asAsyncDisposable<T extends object, K extends keyof T>(
  resource: T,
  cleanupMethodName: K,
): T & AsyncDisposable {
  const cleanupMethod = resource[cleanupMethodName];
  if (typeof cleanupMethod !== "function") {
    throw new TypeError(
      `Method '${String(cleanupMethodName)}' not found or not a function on the provided resource.`,
    );
  }

  return Object.assign(resource, {
    [AsyncDisposeSymbol]: () => Promise.resolve(cleanupMethod.call(resource)),
  });
}
