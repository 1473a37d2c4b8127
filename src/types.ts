import type { Kind, TypeLambda } from "./kind";
import type { Applicative } from "./effect";

/**
 * An acquired resource: its value and the host computation that releases it.
 *
 * A composition that builds a `Handle` owns it and runs `release` at most
 * once. After `release`, `value` must not be used as if the resource were
 * still open.
 *
 * @template F The host effect.
 * @template A The type of the acquired value.
 */
export interface Handle<F extends TypeLambda, A> {
  readonly value: A;
  release(): Kind<F, void>;
}

/**
 * A reusable, deferred description of how to acquire a `Handle`.
 *
 * Factories are stateless: every call to `acquire` performs an independent
 * acquisition. Exclusivity, if a resource needs it, is enforced by the
 * resource itself and surfaces as an ordinary acquisition failure.
 *
 * @template F The host effect.
 * @template A The type of the acquired value.
 */
export interface Factory<F extends TypeLambda, A> {
  acquire(): Kind<F, Handle<F, A>>;
}

/**
 * A losing branch of `chooseAny`. It closes over the still-pending host
 * computation of the race rather than starting a fresh acquisition, and it is
 * owned by the caller.
 */
export type Residual<F extends TypeLambda, A> = Factory<F, A>;

/**
 * Builds a `Factory` from a plain acquisition function.
 *
 * @example
 * ```typescript
 * const connection = factory(() =>
 *   io.map(openConnection, (conn) => ({ value: conn, release: () => conn.end })),
 * );
 * ```
 */
export function factory<F extends TypeLambda, A>(
  acquire: () => Kind<F, Handle<F, A>>,
): Factory<F, A> {
  return { acquire };
}

/** Builds a `Handle` whose release does nothing. */
export function unmanaged<F extends TypeLambda, A>(
  effect: Applicative<F>,
  value: A,
): Handle<F, A> {
  return {
    value,
    release: () => effect.of<void>(undefined),
  };
}
