/**
 * @module
 * An asynchronous host effect: `Task<A>` is a lazy promise, started afresh
 * every time it is called. Rejection is the error channel, so `E` is
 * `unknown`.
 *
 * `map2` starts both tasks before awaiting either. `chooseAny` starts every
 * task exactly once and races them; the first to settle decides the outcome,
 * and a rejection of the first settler fails the race. Losing tasks are
 * returned as tasks that replay their single pending promise, so a residual
 * acquired twice yields the same outcome twice.
 */

import type { TypeLambda } from "./kind";
import type { Async, MonadError, Nondeterminism } from "./effect";

export type Task<A> = () => Promise<A>;

export interface TaskLambda extends TypeLambda {
  readonly type: Task<this["A"]>;
}

export type TaskEffect = MonadError<TaskLambda, unknown> &
  Nondeterminism<TaskLambda> &
  Async<TaskLambda>;

/** Starts `fa`, turning a synchronous throw into a rejection. */
function start<A>(fa: Task<A>): Promise<A> {
  return new Promise<A>((resolve) => resolve(fa()));
}

export const task: TaskEffect = {
  of<A>(a: A): Task<A> {
    return () => Promise.resolve(a);
  },
  map<A, B>(fa: Task<A>, f: (a: A) => B): Task<B> {
    return () => start(fa).then(f);
  },
  flatMap<A, B>(fa: Task<A>, f: (a: A) => Task<B>): Task<B> {
    return () => start(fa).then((a) => start(f(a)));
  },
  map2<A, B, C>(fa: Task<A>, fb: Task<B>, f: (a: A, b: B) => C): Task<C> {
    return () => Promise.all([start(fa), start(fb)]).then(([a, b]) => f(a, b));
  },
  raiseError<A>(error: unknown): Task<A> {
    return () => Promise.reject(error);
  },
  handleError<A>(fa: Task<A>, f: (error: unknown) => Task<A>): Task<A> {
    return () => start(fa).catch((error: unknown) => start(f(error)));
  },
  chooseAny<A>(
    head: Task<A>,
    tail: ReadonlyArray<Task<A>>,
  ): Task<readonly [A, Array<Task<A>>]> {
    return () => {
      const pending = [head, ...tail].map((fa) => start(fa));
      return Promise.race(
        pending.map((promise, index) => promise.then((value) => ({ value, index }))),
      ).then(({ value, index }) => {
        const residuals = pending
          .filter((_, i) => i !== index)
          .map((promise): Task<A> => () => promise);
        return [value, residuals] as const;
      });
    };
  },
  fromPromise<A>(thunk: () => PromiseLike<A>): Task<A> {
    return () => new Promise<A>((resolve) => resolve(thunk()));
  },
};
