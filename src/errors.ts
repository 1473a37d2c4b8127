/**
 * @module
 * Error-aware construction and composition. These operators need a host with
 * an error channel (`MonadError`) and guarantee that every resource acquired
 * along a composed path is released before the final value or error escapes.
 *
 * Error priority: when a release fails while an earlier failure is already
 * pending, the release failure is what propagates. For sequential
 * composition the outer (first-acquired) resource's release failure wins over
 * the inner one's; both releases are always attempted. The error that loses is
 * reported to the configured logger at `warn`.
 *
 * The core invents no error type of its own; every error is the host's `E`.
 */

import type { Result } from "neverthrow";
import type { Kind, TypeLambda } from "./kind";
import { type MonadError, attempt, suspend } from "./effect";
import { type Factory, type Handle, factory } from "./types";
import { type FactoryOptions, type Logger, resolveOptions } from "./run";
import { pure } from "./composition";

// =================================================================
// Section 1: Raising and Handling
// =================================================================

/**
 * A factory whose acquisition fails immediately with `error`. It never
 * produces a handle, so nothing is owed a release.
 */
export function raiseError<F extends TypeLambda, E, A>(
  effect: MonadError<F, E>,
  error: E,
): Factory<F, A> {
  return factory(() => effect.raiseError<Handle<F, A>>(error));
}

/**
 * Acquires `fa`; if that acquisition fails, acquires `handler(error)` instead.
 * Only acquisition failures are intercepted: a failing release of the handle
 * produced by `fa` still propagates.
 *
 * @example
 * ```typescript
 * const primaryOrReplica = handleError(task, connect(primary), (error) => {
 *   logger.warn("primary unavailable", error);
 *   return connect(replica);
 * });
 * ```
 */
export function handleError<F extends TypeLambda, E, A>(
  effect: MonadError<F, E>,
  fa: Factory<F, A>,
  handler: (error: E) => Factory<F, A>,
): Factory<F, A> {
  return factory(() =>
    effect.handleError(fa.acquire(), (error) => handler(error).acquire()),
  );
}

/** `handleError` for callers that do not need the error. */
export function orElse<F extends TypeLambda, E, A>(
  effect: MonadError<F, E>,
  fa: Factory<F, A>,
  fallback: () => Factory<F, A>,
): Factory<F, A> {
  return handleError(effect, fa, () => fallback());
}

// =================================================================
// Section 2: Release Helpers
// =================================================================

/**
 * Releases `handle`, then fails with `pending`, unless the release itself
 * fails, in which case the release failure propagates instead.
 */
function releaseThenRaise<F extends TypeLambda, E, A>(
  effect: MonadError<F, E>,
  handle: Handle<F, unknown>,
  pending: E,
  logger: Logger,
  name: string,
): Kind<F, A> {
  return effect.flatMap(attempt(effect, handle.release()), (released) => {
    if (released.isErr()) {
      logger.warn(`[${name}] release failed, shadowing a pending error`, pending);
      return effect.raiseError<A>(released.error);
    }
    return effect.raiseError<A>(pending);
  });
}

/**
 * Releases `inner`, then `outer` regardless of how the first release went.
 * An `outer` failure wins; otherwise an `inner` failure surfaces.
 */
function releaseInReverse<F extends TypeLambda, E>(
  effect: MonadError<F, E>,
  inner: Handle<F, unknown>,
  outer: Handle<F, unknown>,
  logger: Logger,
  name: string,
): Kind<F, void> {
  return effect.flatMap(attempt(effect, inner.release()), (released) =>
    released.isErr()
      ? releaseThenRaise<F, E, void>(effect, outer, released.error, logger, name)
      : outer.release(),
  );
}

/**
 * Releases both handles through the host's `map2`. If both fail, the error of
 * `first` wins.
 */
function releaseIndependently<F extends TypeLambda, E>(
  effect: MonadError<F, E>,
  first: Handle<F, unknown>,
  second: Handle<F, unknown>,
  logger: Logger,
  name: string,
): Kind<F, void> {
  return effect.flatMap(
    effect.map2(
      attempt(effect, first.release()),
      attempt(effect, second.release()),
      (a, b) => [a, b] as const,
    ),
    ([a, b]): Kind<F, void> => {
      if (a.isErr()) {
        if (b.isErr()) {
          logger.warn(`[${name}] both releases failed, shadowing the second`, b.error);
        }
        return effect.raiseError<void>(a.error);
      }
      if (b.isErr()) {
        return effect.raiseError<void>(b.error);
      }
      return effect.of<void>(undefined);
    },
  );
}

// =================================================================
// Section 3: Error-Aware Sequential Composition
// =================================================================

/**
 * Sequential composition that cleans up after partial success.
 *
 * 1. If acquiring `fa` fails, that error propagates; nothing is held.
 * 2. If `f` throws, or acquiring the factory it returns fails, the first
 *    handle is released before the error propagates. A failing release
 *    overrides the original error.
 * 3. Otherwise the composite release runs the inner release, then the outer
 *    one unconditionally. An outer failure wins over an inner failure.
 */
export function bindOrRelease<F extends TypeLambda, E, A, B>(
  effect: MonadError<F, E>,
  fa: Factory<F, A>,
  f: (a: A) => Factory<F, B>,
  options: FactoryOptions = {},
): Factory<F, B> {
  const { logger, name } = resolveOptions(options);
  return factory(() =>
    effect.flatMap(fa.acquire(), (outer) =>
      effect.flatMap(
        attempt(
          effect,
          effect.flatMap(effect.of(outer.value), (a) => f(a).acquire()),
        ),
        (acquired): Kind<F, Handle<F, B>> => {
          if (acquired.isErr()) {
            return releaseThenRaise<F, E, Handle<F, B>>(
              effect,
              outer,
              acquired.error,
              logger,
              name,
            );
          }
          const inner = acquired.value;
          return effect.of<Handle<F, B>>({
            value: inner.value,
            release: () => releaseInReverse(effect, inner, outer, logger, name),
          });
        },
      ),
    ),
  );
}

export function mapOrRelease<F extends TypeLambda, E, A, B>(
  effect: MonadError<F, E>,
  fa: Factory<F, A>,
  f: (a: A) => B,
  options: FactoryOptions = {},
): Factory<F, B> {
  return bindOrRelease(effect, fa, (a) => pure(effect, f(a)), options);
}

// =================================================================
// Section 4: Error-Aware Independent Composition
// =================================================================

/**
 * Independent composition that cleans up after partial success. Both
 * acquisitions are attempted through the host's `map2`.
 *
 * - If exactly one acquisition fails, the other handle is released before the
 *   failure propagates (a failing release overrides it).
 * - If both fail, the error of `fa` wins.
 * - If `f` throws, both handles are released before the error propagates.
 * - The composite release attempts both releases via `map2`; if both fail,
 *   the error of `fa`'s release wins.
 */
export function map2OrRelease<F extends TypeLambda, E, A, B, C>(
  effect: MonadError<F, E>,
  fa: Factory<F, A>,
  fb: Factory<F, B>,
  f: (a: A, b: B) => C,
  options: FactoryOptions = {},
): Factory<F, C> {
  const { logger, name } = resolveOptions(options);
  const combine = (
    first: Handle<F, A>,
    second: Handle<F, B>,
  ): Kind<F, Handle<F, C>> => {
    const release = () =>
      releaseIndependently(effect, first, second, logger, name);
    return effect.flatMap(
      attempt(effect, suspend(effect, () => f(first.value, second.value))),
      (combined: Result<C, E>): Kind<F, Handle<F, C>> => {
        if (combined.isErr()) {
          const error = combined.error;
          return effect.flatMap(release(), () =>
            effect.raiseError<Handle<F, C>>(error),
          );
        }
        return effect.of<Handle<F, C>>({ value: combined.value, release });
      },
    );
  };

  return factory(() =>
    effect.flatMap(
      effect.map2(
        attempt(effect, fa.acquire()),
        attempt(effect, fb.acquire()),
        (a, b) => [a, b] as const,
      ),
      ([a, b]): Kind<F, Handle<F, C>> => {
        if (a.isErr()) {
          if (b.isErr()) {
            logger.warn(`[${name}] both acquisitions failed, shadowing the second`, b.error);
            return effect.raiseError<Handle<F, C>>(a.error);
          }
          return releaseThenRaise<F, E, Handle<F, C>>(effect, b.value, a.error, logger, name);
        }
        if (b.isErr()) {
          return releaseThenRaise<F, E, Handle<F, C>>(effect, a.value, b.error, logger, name);
        }
        return combine(a.value, b.value);
      },
    ),
  );
}

// =================================================================
// Section 5: Flattening
// =================================================================

/**
 * Acquires `fa`, applies `f` to its value, and releases the resource once the
 * returned computation completes, whether it succeeded or failed. A failing
 * release overrides a failure of `f`.
 *
 * @example
 * ```typescript
 * const rows = await usingOrRelease(task, connection, (conn) => () => conn.query(sql))();
 * ```
 */
export function usingOrRelease<F extends TypeLambda, E, A, B>(
  effect: MonadError<F, E>,
  fa: Factory<F, A>,
  f: (a: A) => Kind<F, B>,
  options: FactoryOptions = {},
): Kind<F, B> {
  const { logger, name } = resolveOptions(options);
  return effect.flatMap(fa.acquire(), (handle) => {
    logger.debug(`[using] ${name} acquired`);
    return effect.flatMap(
      attempt(effect, effect.flatMap(effect.of(handle.value), f)),
      (outcome): Kind<F, B> => {
        if (outcome.isErr()) {
          return releaseThenRaise<F, E, B>(effect, handle, outcome.error, logger, name);
        }
        const value = outcome.value;
        return effect.map(handle.release(), () => {
          logger.debug(`[using] ${name} released`);
          return value;
        });
      },
    );
  });
}
