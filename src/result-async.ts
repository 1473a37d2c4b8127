/**
 * @module
 * A host effect over neverthrow's `ResultAsync<A, E>`, with a typed error
 * channel. Unlike `Task`, a `ResultAsync` is already running once it exists;
 * factories stay lazy because `acquire` is only called when a composition is
 * run.
 *
 * A value thrown by a continuation, or a rejection of the underlying promise,
 * is converted into `E` by the `mapError` function given to
 * `resultAsyncEffect`.
 */

import { type Result, ResultAsync, ok, err } from "neverthrow";
import type { TypeLambda } from "./kind";
import type { Async, MonadError, Nondeterminism } from "./effect";

export interface ResultAsyncLambda<E> extends TypeLambda {
  readonly type: ResultAsync<this["A"], E>;
}

export type ResultAsyncEffect<E> = MonadError<ResultAsyncLambda<E>, E> &
  Nondeterminism<ResultAsyncLambda<E>> &
  Async<ResultAsyncLambda<E>>;

/**
 * Creates the `ResultAsync` host for error type `E`.
 *
 * @param mapError Converts a thrown value or a rejection into `E`.
 *
 * @example
 * ```typescript
 * const effect = resultAsyncEffect((error) =>
 *   error instanceof Error ? error : new Error(String(error)),
 * );
 * const outcome = await run(effect, connection); // Result<Connection, Error>
 * ```
 */
export function resultAsyncEffect<E>(
  mapError: (error: unknown) => E,
): ResultAsyncEffect<E> {
  const guard = <A>(body: () => Promise<Result<A, E>>): ResultAsync<A, E> =>
    new ResultAsync<A, E>(
      body().catch((error: unknown): Result<A, E> => err(mapError(error))),
    );

  return {
    of<A>(a: A): ResultAsync<A, E> {
      return guard<A>(async () => ok(a));
    },
    map<A, B>(fa: ResultAsync<A, E>, f: (a: A) => B): ResultAsync<B, E> {
      return guard<B>(async () => (await fa).map(f));
    },
    flatMap<A, B>(
      fa: ResultAsync<A, E>,
      f: (a: A) => ResultAsync<B, E>,
    ): ResultAsync<B, E> {
      return guard<B>(async () => {
        const result = await fa;
        if (result.isErr()) {
          return err(result.error);
        }
        return await f(result.value);
      });
    },
    map2<A, B, C>(
      fa: ResultAsync<A, E>,
      fb: ResultAsync<B, E>,
      f: (a: A, b: B) => C,
    ): ResultAsync<C, E> {
      return guard<C>(async () => {
        const [a, b] = await Promise.all([fa, fb]);
        if (a.isErr()) {
          return err(a.error);
        }
        if (b.isErr()) {
          return err(b.error);
        }
        return ok(f(a.value, b.value));
      });
    },
    raiseError<A>(error: E): ResultAsync<A, E> {
      return guard<A>(async () => err(error));
    },
    handleError<A>(
      fa: ResultAsync<A, E>,
      f: (error: E) => ResultAsync<A, E>,
    ): ResultAsync<A, E> {
      return guard<A>(async () => {
        const result = await fa;
        if (result.isErr()) {
          return await f(result.error);
        }
        return result;
      });
    },
    chooseAny<A>(
      head: ResultAsync<A, E>,
      tail: ReadonlyArray<ResultAsync<A, E>>,
    ): ResultAsync<readonly [A, Array<ResultAsync<A, E>>], E> {
      const pending = [head, ...tail];
      return guard<readonly [A, Array<ResultAsync<A, E>>]>(async () => {
        const { result, index } = await Promise.race(
          pending.map(async (fa, index) => ({ result: await fa, index })),
        );
        if (result.isErr()) {
          return err(result.error);
        }
        return ok([result.value, pending.filter((_, i) => i !== index)] as const);
      });
    },
    fromPromise<A>(thunk: () => PromiseLike<A>): ResultAsync<A, E> {
      return guard<A>(async () => ok(await thunk()));
    },
  };
}
