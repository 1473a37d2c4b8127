/**
 * @module
 * Construction and composition of factories over a host that provides no
 * error handling of its own. Sequential composition (`bind`) releases in
 * reverse order of acquisition; independent composition (`map2`, `ap`,
 * `tuple`) delegates to the host's `map2` for both acquisition and release and
 * makes no promise about the order of the two releases.
 *
 * For hosts with an error channel, see the `OrRelease` variants in `errors`.
 */

import type { Kind, TypeLambda } from "./kind";
import type { Applicative, Monad } from "./effect";
import { type Factory, type Handle, factory, unmanaged } from "./types";

// =================================================================
// Section 1: Lifting and Pure Construction
// =================================================================

/**
 * A factory that succeeds immediately with `value` and releases nothing.
 */
export function pure<F extends TypeLambda, A>(
  effect: Applicative<F>,
  value: A,
): Factory<F, A> {
  return factory(() => effect.of(unmanaged(effect, value)));
}

/**
 * Wraps a bare host computation into a factory whose release does nothing.
 * Each acquisition runs `fa` through the host again; for hosts whose values
 * are already running (such as `ResultAsync`) that replays the same outcome.
 */
export function liftEffect<F extends TypeLambda, A>(
  effect: Applicative<F>,
  fa: Kind<F, A>,
): Factory<F, A> {
  return factory(() => effect.map(fa, (value) => unmanaged(effect, value)));
}

// =================================================================
// Section 2: Sequential Composition
// =================================================================

/**
 * Acquires `fa`, derives the next factory from its value, and acquires that.
 * The composite handle releases the second resource first, then the first,
 * mirroring nested scopes.
 *
 * @example
 * ```typescript
 * const pair = bind(io, openFile("a.txt"), (a) =>
 *   map(io, openFile("b.txt"), (b) => [a, b] as const),
 * );
 * // run(io, pair): acquire a, acquire b, release b, release a
 * ```
 */
export function bind<F extends TypeLambda, A, B>(
  effect: Monad<F>,
  fa: Factory<F, A>,
  f: (a: A) => Factory<F, B>,
): Factory<F, B> {
  return factory(() =>
    effect.flatMap(fa.acquire(), (outer) =>
      effect.map(
        f(outer.value).acquire(),
        (inner): Handle<F, B> => ({
          value: inner.value,
          release: () => effect.flatMap(inner.release(), () => outer.release()),
        }),
      ),
    ),
  );
}

/** Alias of `bind`. */
export const flatMap = bind;

export function map<F extends TypeLambda, A, B>(
  effect: Monad<F>,
  fa: Factory<F, A>,
  f: (a: A) => B,
): Factory<F, B> {
  return bind(effect, fa, (a) => pure(effect, f(a)));
}

export function flatten<F extends TypeLambda, A>(
  effect: Monad<F>,
  ffa: Factory<F, Factory<F, A>>,
): Factory<F, A> {
  return bind(effect, ffa, (fa) => fa);
}

// =================================================================
// Section 3: Independent Composition
// =================================================================

/**
 * Acquires two unrelated factories through the host's own `map2` and combines
 * their values. The two releases are combined the same way, so they may run
 * concurrently and in either order.
 */
export function map2<F extends TypeLambda, A, B, C>(
  effect: Applicative<F>,
  fa: Factory<F, A>,
  fb: Factory<F, B>,
  f: (a: A, b: B) => C,
): Factory<F, C> {
  return factory(() =>
    effect.map2(
      fa.acquire(),
      fb.acquire(),
      (first, second): Handle<F, C> => ({
        value: f(first.value, second.value),
        release: () =>
          effect.map2<void, void, void>(
            first.release(),
            second.release(),
            () => undefined,
          ),
      }),
    ),
  );
}

export function ap<F extends TypeLambda, A, B>(
  effect: Applicative<F>,
  fa: Factory<F, A>,
  ff: Factory<F, (a: A) => B>,
): Factory<F, B> {
  return map2(effect, fa, ff, (a, f) => f(a));
}

export function tuple<F extends TypeLambda, A, B>(
  effect: Applicative<F>,
  fa: Factory<F, A>,
  fb: Factory<F, B>,
): Factory<F, readonly [A, B]> {
  return map2(effect, fa, fb, (a, b) => [a, b] as const);
}
