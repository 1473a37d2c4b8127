/**
 * @module
 * Bridges from the bundled hosts to neverthrow results, for callers that
 * consume `Result`/`ResultAsync` rather than thrown errors or rejections.
 */

import { type Result, ResultAsync, ok, err } from "neverthrow";
import type { Factory } from "./types";
import { type IOLambda, io, unsafeRunIO } from "./io";
import { type Task, type TaskLambda, task } from "./task";
import { type FactoryOptions, run } from "./run";

/**
 * Starts `fa` and exposes its outcome as a `ResultAsync`. A rejection, or a
 * synchronous throw while starting, becomes an `Err` via `mapError`.
 *
 * @example
 * ```typescript
 * const outcome = await toResultAsync(fetchUser, (e) => new FetchError(e));
 * if (outcome.isErr()) { ... }
 * ```
 */
export function toResultAsync<A>(fa: Task<A>): ResultAsync<A, unknown>;
export function toResultAsync<A, E>(
  fa: Task<A>,
  mapError: (error: unknown) => E,
): ResultAsync<A, E>;
export function toResultAsync<A>(
  fa: Task<A>,
  mapError: (error: unknown) => unknown = (error) => error,
): ResultAsync<A, unknown> {
  return ResultAsync.fromPromise(
    new Promise<A>((resolve) => resolve(fa())),
    mapError,
  );
}

/** Runs a `Task` factory and exposes the outcome as a `ResultAsync`. */
export function runToResultAsync<A>(
  fa: Factory<TaskLambda, A>,
  options: FactoryOptions = {},
): ResultAsync<A, unknown> {
  return toResultAsync(run(task, fa, options));
}

/** Runs an `IO` factory and returns the outcome as a `Result`. */
export function runIOToResult<A>(
  fa: Factory<IOLambda, A>,
  options: FactoryOptions = {},
): Result<A, unknown> {
  try {
    return ok(unsafeRunIO(run(io, fa, options)));
  } catch (error) {
    return err(error);
  }
}
