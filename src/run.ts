/**
 * @module
 * Flattening a `Factory` into a plain host computation. `run` and `using` are
 * the only points where acquisition and release actually execute; everything
 * else builds larger descriptions.
 */

import type { Kind, TypeLambda } from "./kind";
import type { Monad } from "./effect";
import type { Factory } from "./types";

// =================================================================
// Section 1: Logging and Options
// =================================================================

/**
 * Logger interface for acquisition and release tracing.
 * Compatible with common logging libraries like winston, pino, console, etc.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * A no-op logger that discards all log messages.
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Options accepted by `run`, `using`, the error-aware operators and the
 * tool builders.
 */
export interface FactoryOptions {
  /** Receives `debug` lines for acquisitions and releases, `warn` for shadowed errors. */
  logger?: Logger;
  /** Label used in log lines. Defaults to `"factory"`. */
  name?: string;
}

/** @internal */
export function resolveOptions(options: FactoryOptions): {
  logger: Logger;
  name: string;
} {
  return {
    logger: options.logger ?? noopLogger,
    name: options.name ?? "factory",
  };
}

// =================================================================
// Section 2: run / using
// =================================================================

/**
 * Acquires `fa`, releases it immediately, and yields the acquired value.
 *
 * The value is returned after its resource has been released, so a managed
 * resource must not be used as if it were still open.
 *
 * @example
 * ```typescript
 * const total = unsafeRunIO(run(io, map(io, ledger, (l) => l.total())));
 * ```
 */
export function run<F extends TypeLambda, A>(
  effect: Monad<F>,
  fa: Factory<F, A>,
  options: FactoryOptions = {},
): Kind<F, A> {
  const { logger, name } = resolveOptions(options);
  return effect.flatMap(fa.acquire(), (handle) => {
    logger.debug(`[run] ${name} acquired`);
    return effect.map(handle.release(), () => {
      logger.debug(`[run] ${name} released`);
      return handle.value;
    });
  });
}

/**
 * Acquires `fa`, applies `f` to its value, then releases the resource once the
 * computation returned by `f` has completed.
 *
 * This variant only needs a `Monad`: if `f` fails, the release is skipped.
 * Use `usingOrRelease` with a `MonadError` host to release on failure too.
 */
export function using<F extends TypeLambda, A, B>(
  effect: Monad<F>,
  fa: Factory<F, A>,
  f: (a: A) => Kind<F, B>,
  options: FactoryOptions = {},
): Kind<F, B> {
  const { logger, name } = resolveOptions(options);
  return effect.flatMap(fa.acquire(), (handle) => {
    logger.debug(`[using] ${name} acquired`);
    return effect.flatMap(f(handle.value), (b) =>
      effect.map(handle.release(), () => {
        logger.debug(`[using] ${name} released`);
        return b;
      }),
    );
  });
}
