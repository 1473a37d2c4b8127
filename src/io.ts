/**
 * @module
 * A synchronous host effect: `IO<A>` is a thunk that computes `A` when run.
 * Thrown values are the error channel, so `E` is `unknown`. `IO` has no racing
 * primitive.
 */

import type { TypeLambda } from "./kind";
import type { MonadError } from "./effect";

export type IO<A> = () => A;

export interface IOLambda extends TypeLambda {
  readonly type: IO<this["A"]>;
}

export const io: MonadError<IOLambda, unknown> = {
  of<A>(a: A): IO<A> {
    return () => a;
  },
  map<A, B>(fa: IO<A>, f: (a: A) => B): IO<B> {
    return () => f(fa());
  },
  flatMap<A, B>(fa: IO<A>, f: (a: A) => IO<B>): IO<B> {
    return () => f(fa())();
  },
  map2<A, B, C>(fa: IO<A>, fb: IO<B>, f: (a: A, b: B) => C): IO<C> {
    return () => f(fa(), fb());
  },
  raiseError<A>(error: unknown): IO<A> {
    return () => {
      throw error;
    };
  },
  handleError<A>(fa: IO<A>, f: (error: unknown) => IO<A>): IO<A> {
    return () => {
      try {
        return fa();
      } catch (error) {
        return f(error)();
      }
    };
  },
};

/** Runs `fa`, returning its value or throwing its error. */
export function unsafeRunIO<A>(fa: IO<A>): A {
  return fa();
}
