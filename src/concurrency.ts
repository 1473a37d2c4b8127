/**
 * @module
 * Racing composition. `chooseAny` acquires several factories at once through
 * the host's racing primitive and keeps whichever finishes first.
 *
 * Ownership: the composite handle releases only the winner. The losing
 * branches come back as `Residual` factories that close over the same pending
 * host computations; they are not cancelled and not released. The caller owns
 * them and must acquire-and-release them or knowingly discard them.
 */

import type { TypeLambda } from "./kind";
import type { Nondeterminism } from "./effect";
import { type Factory, type Handle, type Residual, factory } from "./types";

/**
 * Races the acquisition of `head` and every factory in `tail`.
 *
 * Racing `n` factories yields one winning value and `n - 1` residuals, in the
 * order they were given (minus the winner). Whether a residual can be
 * acquired more than once depends on the host: the bundled `task` and
 * `result-async` hosts replay the single shared outcome.
 *
 * @example
 * ```typescript
 * const fastest = chooseAny(task, connect("eu-1"), [connect("us-1"), connect("ap-1")]);
 * const [conn, residuals] = ... // inside run / using
 * for (const residual of residuals) {
 *   await run(task, residual)(); // release the slower connections
 * }
 * ```
 */
export function chooseAny<F extends TypeLambda, A>(
  effect: Nondeterminism<F>,
  head: Factory<F, A>,
  tail: ReadonlyArray<Factory<F, A>>,
): Factory<F, readonly [A, Array<Residual<F, A>>]> {
  return factory(() =>
    effect.map(
      effect.chooseAny<Handle<F, A>>(
        head.acquire(),
        tail.map((fa) => fa.acquire()),
      ),
      ([winner, pending]): Handle<F, readonly [A, Array<Residual<F, A>>]> => ({
        value: [
          winner.value,
          pending.map((acquisition) => factory<F, A>(() => acquisition)),
        ] as const,
        release: () => winner.release(),
      }),
    ),
  );
}
