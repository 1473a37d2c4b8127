/**
 * @module
 * Tool sets that bind every factory operation to one host effect, so call
 * sites stop repeating the capability argument. This is where the host is
 * chosen for a whole module or application.
 *
 * @example
 * ```typescript
 * const { managed, flatMap, map, run } = createErrorTools(io, { logger: console });
 *
 * const pair = flatMap(managed(() => openLedger()), (ledger) =>
 *   map(managed(() => openJournal()), (journal) => reconcile(ledger, journal)),
 * );
 * unsafeRunIO(run(pair));
 * ```
 */

import type { Kind, TypeLambda } from "./kind";
import type { Async, Monad, MonadError, Nondeterminism } from "./effect";
import type { Factory, Residual } from "./types";
import { type FactoryOptions, run, using } from "./run";
import {
  ap,
  bind,
  flatten,
  liftEffect,
  map,
  map2,
  pure,
  tuple,
} from "./composition";
import {
  bindOrRelease,
  handleError,
  map2OrRelease,
  mapOrRelease,
  orElse,
  raiseError,
  usingOrRelease,
} from "./errors";
import { chooseAny } from "./concurrency";
import {
  type AsyncCloseable,
  type AsyncDisposable,
  type Closeable,
  type Disposable,
  disposable,
  make,
  managed,
  managedAsync,
} from "./bracket";

// =================================================================
// Section 1: Tool Set Types
// =================================================================

/**
 * The operations available on any host that can sequence computations.
 *
 * @template F The host effect every operation is bound to.
 */
export interface FactoryTools<F extends TypeLambda> {
  pure<A>(value: A): Factory<F, A>;
  liftEffect<A>(fa: Kind<F, A>): Factory<F, A>;
  make<R>(
    acquire: () => Kind<F, R>,
    release: (resource: R) => Kind<F, void>,
  ): Factory<F, R>;
  managed<R extends Closeable>(construct: () => R): Factory<F, R>;
  disposable<R extends Disposable>(construct: () => R): Factory<F, R>;
  map<A, B>(fa: Factory<F, A>, f: (a: A) => B): Factory<F, B>;
  flatMap<A, B>(fa: Factory<F, A>, f: (a: A) => Factory<F, B>): Factory<F, B>;
  flatten<A>(ffa: Factory<F, Factory<F, A>>): Factory<F, A>;
  map2<A, B, C>(
    fa: Factory<F, A>,
    fb: Factory<F, B>,
    f: (a: A, b: B) => C,
  ): Factory<F, C>;
  ap<A, B>(fa: Factory<F, A>, ff: Factory<F, (a: A) => B>): Factory<F, B>;
  tuple<A, B>(fa: Factory<F, A>, fb: Factory<F, B>): Factory<F, readonly [A, B]>;
  run<A>(fa: Factory<F, A>): Kind<F, A>;
  using<A, B>(fa: Factory<F, A>, f: (a: A) => Kind<F, B>): Kind<F, B>;
}

/**
 * Tools for a host with an error channel. `map`, `flatMap`, `map2`, `ap`,
 * `tuple` and `using` are the error-aware variants that release whatever was
 * acquired before a failure escapes.
 */
export interface ErrorTools<F extends TypeLambda, E> extends FactoryTools<F> {
  raiseError<A>(error: E): Factory<F, A>;
  handleError<A>(
    fa: Factory<F, A>,
    handler: (error: E) => Factory<F, A>,
  ): Factory<F, A>;
  orElse<A>(fa: Factory<F, A>, fallback: () => Factory<F, A>): Factory<F, A>;
}

/** Error-aware tools plus racing and async construction. */
export interface RaceTools<F extends TypeLambda, E> extends ErrorTools<F, E> {
  chooseAny<A>(
    head: Factory<F, A>,
    ...tail: Array<Factory<F, A>>
  ): Factory<F, readonly [A, Array<Residual<F, A>>]>;
  managedAsync<R extends AsyncDisposable | AsyncCloseable>(
    construct: () => R | PromiseLike<R>,
  ): Factory<F, R>;
}

// =================================================================
// Section 2: Tool Set Builders
// =================================================================

/**
 * Binds the sequencing-level operations to `effect`. Sequential composition
 * here does not clean up after a failing continuation; use `createErrorTools`
 * when the host has an error channel.
 */
export function createFactoryTools<F extends TypeLambda>(
  effect: Monad<F>,
  options: FactoryOptions = {},
): FactoryTools<F> {
  return {
    pure: (value) => pure(effect, value),
    liftEffect: (fa) => liftEffect(effect, fa),
    make: (acquire, release) => make(effect, acquire, release),
    managed: (construct) => managed(effect, construct),
    disposable: (construct) => disposable(effect, construct),
    map: (fa, f) => map(effect, fa, f),
    flatMap: (fa, f) => bind(effect, fa, f),
    flatten: (ffa) => flatten(effect, ffa),
    map2: (fa, fb, f) => map2(effect, fa, fb, f),
    ap: (fa, ff) => ap(effect, fa, ff),
    tuple: (fa, fb) => tuple(effect, fa, fb),
    run: (fa) => run(effect, fa, options),
    using: (fa, f) => using(effect, fa, f, options),
  };
}

export function createErrorTools<F extends TypeLambda, E>(
  effect: MonadError<F, E>,
  options: FactoryOptions = {},
): ErrorTools<F, E> {
  const map2Safe: FactoryTools<F>["map2"] = (fa, fb, f) =>
    map2OrRelease(effect, fa, fb, f, options);

  return {
    ...createFactoryTools(effect, options),
    map: (fa, f) => mapOrRelease(effect, fa, f, options),
    flatMap: (fa, f) => bindOrRelease(effect, fa, f, options),
    flatten: (ffa) => bindOrRelease(effect, ffa, (fa) => fa, options),
    map2: map2Safe,
    ap: (fa, ff) => map2Safe(fa, ff, (a, f) => f(a)),
    tuple: (fa, fb) => map2Safe(fa, fb, (a, b) => [a, b] as const),
    using: (fa, f) => usingOrRelease(effect, fa, f, options),
    raiseError: (error) => raiseError(effect, error),
    handleError: (fa, handler) => handleError(effect, fa, handler),
    orElse: (fa, fallback) => orElse(effect, fa, fallback),
  };
}

export function createRaceTools<F extends TypeLambda, E>(
  effect: MonadError<F, E> & Nondeterminism<F> & Async<F>,
  options: FactoryOptions = {},
): RaceTools<F, E> {
  return {
    ...createErrorTools(effect, options),
    chooseAny: (head, ...tail) => chooseAny(effect, head, tail),
    managedAsync: (construct) => managedAsync(effect, construct),
  };
}
