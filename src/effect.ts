/**
 * @module
 * The capability interfaces a host effect provides to the factory core.
 * Every composition operator takes one of these as its first argument, so the
 * host is chosen explicitly at the point a composition is built or executed.
 *
 * The hierarchy mirrors what each operator actually needs:
 * - `Applicative`: succeed immediately, combine two independent computations.
 * - `Monad`: sequence dependent steps.
 * - `MonadError`: raise and handle failures in the host's error channel.
 * - `Nondeterminism`: race a non-empty set of computations.
 * - `Async`: lift a promise-returning thunk.
 */

import { type Result, ok, err } from "neverthrow";
import type { Kind, TypeClass, TypeLambda } from "./kind";

// =================================================================
// Section 1: Capability Interfaces
// =================================================================

export interface Covariant<F extends TypeLambda> extends TypeClass<F> {
  map<A, B>(fa: Kind<F, A>, f: (a: A) => B): Kind<F, B>;
}

export interface Applicative<F extends TypeLambda> extends Covariant<F> {
  /** Succeeds immediately with `a`. */
  of<A>(a: A): Kind<F, A>;

  /**
   * Combines two computations with no data dependency. The host decides
   * whether they run concurrently.
   */
  map2<A, B, C>(
    fa: Kind<F, A>,
    fb: Kind<F, B>,
    f: (a: A, b: B) => C,
  ): Kind<F, C>;
}

export interface Monad<F extends TypeLambda> extends Applicative<F> {
  flatMap<A, B>(fa: Kind<F, A>, f: (a: A) => Kind<F, B>): Kind<F, B>;
}

/**
 * A monad with an error channel carrying `E`.
 *
 * Implementations must route a value thrown by a continuation passed to
 * `map` or `flatMap` into the error channel; the error-aware operators rely
 * on this to treat a throwing continuation as an ordinary failure.
 */
export interface MonadError<F extends TypeLambda, E> extends Monad<F> {
  raiseError<A>(error: E): Kind<F, A>;
  handleError<A>(fa: Kind<F, A>, f: (error: E) => Kind<F, A>): Kind<F, A>;
}

/**
 * A monad that can race computations. `chooseAny` completes with the value of
 * whichever computation finishes first, paired with the others, still
 * pending and not restarted.
 */
export interface Nondeterminism<F extends TypeLambda> extends Monad<F> {
  chooseAny<A>(
    head: Kind<F, A>,
    tail: ReadonlyArray<Kind<F, A>>,
  ): Kind<F, readonly [A, Array<Kind<F, A>>]>;
}

export interface Async<F extends TypeLambda> extends TypeClass<F> {
  fromPromise<A>(thunk: () => PromiseLike<A>): Kind<F, A>;
}

// =================================================================
// Section 2: Derived Helpers
// =================================================================

/**
 * Defers `thunk` until the host computation runs. A value thrown by the thunk
 * lands in the error channel of a `MonadError` host.
 */
export function suspend<F extends TypeLambda, A>(
  effect: Applicative<F>,
  thunk: () => A,
): Kind<F, A> {
  return effect.map(effect.of<void>(undefined), () => thunk());
}

/**
 * Converts the outcome of `fa` into a `Result`. The returned computation never
 * fails; a failure of `fa` becomes an `Err`.
 *
 * @example
 * ```typescript
 * const outcome = unsafeRunIO(attempt(io, io.raiseError("boom")));
 * outcome.isErr(); // true
 * ```
 */
export function attempt<F extends TypeLambda, E, A>(
  effect: MonadError<F, E>,
  fa: Kind<F, A>,
): Kind<F, Result<A, E>> {
  return effect.handleError(
    effect.map(fa, (a): Result<A, E> => ok(a)),
    (error) => effect.of<Result<A, E>>(err(error)),
  );
}
