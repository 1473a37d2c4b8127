import { describe, it, expect, vi, beforeEach } from 'vitest';
import { err, ok } from 'neverthrow';
import {
  attempt,
  bindOrRelease,
  createErrorTools,
  io,
  map2OrRelease,
  mapOrRelease,
  pure,
  unsafeRunIO,
} from '../src';
import { FailingResource, FakeResource, failureOf } from './fake-resource';

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('Error-aware composition (errors.ts)', () => {
  let table: Map<string, FakeResource>;
  let events: string[];
  let logger: ReturnType<typeof createLogger>;

  beforeEach(() => {
    table = new Map();
    events = [];
    logger = createLogger();
  });

  describe('raiseError', () => {
    it('should never call the continuation nor release anything', () => {
      const { raiseError, flatMap, run } = createErrorTools(io);
      const boom = new Error('boom');
      const continuation = vi.fn(() => pure(io, 1));

      const error = failureOf(() => unsafeRunIO(run(flatMap(raiseError<number>(boom), continuation))));

      expect(error).toBe(boom);
      expect(continuation).not.toHaveBeenCalled();
      expect(events).toEqual([]);
    });
  });

  describe('handleError and orElse', () => {
    it('should recover from an acquisition failure', () => {
      const { raiseError, handleError, pure: succeed, run } = createErrorTools(io);

      const recovered = handleError(raiseError<string>('down'), (error) =>
        succeed(`recovered from ${String(error)}`),
      );

      expect(unsafeRunIO(run(recovered))).toBe('recovered from down');
    });

    it('should leave a successful acquisition untouched', () => {
      const { managed, handleError, run } = createErrorTools(io);
      const handler = vi.fn(() => managed(() => new FakeResource(table, 'fallback', events)));

      const value = unsafeRunIO(run(handleError(managed(() => new FakeResource(table, 'primary', events)), handler)));

      expect(value.id).toBe('primary');
      expect(handler).not.toHaveBeenCalled();
      expect(events).toEqual(['acquire primary', 'release primary']);
    });

    it('should not intercept a failing release', () => {
      const { managed, handleError, run } = createErrorTools(io);
      const releaseFailure = new Error('release primary failed');
      const handler = vi.fn(() => managed(() => new FailingResource('fallback', events)));

      const program = handleError(
        managed(() => new FailingResource('primary', events, releaseFailure)),
        handler,
      );
      const error = failureOf(() => unsafeRunIO(run(program)));

      expect(error).toBe(releaseFailure);
      expect(handler).not.toHaveBeenCalled();
      expect(events).toEqual(['acquire primary', 'release primary']);
    });

    it('should fall back without looking at the error', () => {
      const { raiseError, orElse, managed, run } = createErrorTools(io);

      const program = orElse(raiseError<FakeResource>(new Error('primary down')), () =>
        managed(() => new FakeResource(table, 'replica', events)),
      );

      expect(unsafeRunIO(run(program)).id).toBe('replica');
      expect(events).toEqual(['acquire replica', 'release replica']);
    });
  });

  describe('bindOrRelease', () => {
    it('should release the first resource when the second acquisition fails', () => {
      const { managed, raiseError, flatMap, run } = createErrorTools(io);
      const boom = new Error('boom');

      const program = flatMap(managed(() => new FakeResource(table, 'a', events)), () =>
        raiseError<string>(boom),
      );
      const error = failureOf(() => unsafeRunIO(run(program)));

      expect(error).toBe(boom);
      expect(events).toEqual(['acquire a', 'release a']);
      expect(table.size).toBe(0);
    });

    it('should release the first resource when the continuation throws', () => {
      const boom = new Error('boom');
      const first = createErrorTools(io).managed(() => new FakeResource(table, 'a', events));

      const program = bindOrRelease(io, first, (): typeof first => {
        throw boom;
      });
      const error = failureOf(() => unsafeRunIO(program.acquire()));

      expect(error).toBe(boom);
      expect(events).toEqual(['acquire a', 'release a']);
    });

    it('should report the pending error a failing release shadows', () => {
      const boom = new Error('boom');
      const releaseFailure = new Error('release a failed');
      const first = createErrorTools(io).managed(() => new FailingResource('a', events, releaseFailure));

      const program = mapOrRelease(
        io,
        first,
        (): number => {
          throw boom;
        },
        { logger, name: 'ledger' },
      );
      const error = failureOf(() => unsafeRunIO(program.acquire()));

      expect(error).toBe(releaseFailure);
      expect(logger.warn).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith('[ledger] release failed, shadowing a pending error', boom);
    });

    it('should release the inner resource before the outer one', () => {
      const { managed, flatMap, run } = createErrorTools(io);

      const program = flatMap(managed(() => new FakeResource(table, 'a', events)), () =>
        managed(() => new FakeResource(table, 'b', events)),
      );
      const value = unsafeRunIO(run(program));

      expect(value.id).toBe('b');
      expect(events).toEqual(['acquire a', 'acquire b', 'release b', 'release a']);
    });

    it('should still release the outer resource when the inner release fails', () => {
      const { managed, flatMap, run } = createErrorTools(io);
      const innerFailure = new Error('release b failed');

      const program = flatMap(managed(() => new FakeResource(table, 'a', events)), () =>
        managed(() => new FailingResource('b', events, innerFailure)),
      );
      const error = failureOf(() => unsafeRunIO(run(program)));

      expect(error).toBe(innerFailure);
      expect(events).toEqual(['acquire a', 'acquire b', 'release b', 'release a']);
      expect(table.size).toBe(0);
    });

    it('should let the outer release failure win when both releases fail', () => {
      const { managed, flatMap, run } = createErrorTools(io, { logger, name: 'pair' });
      const outerFailure = new Error('release a failed');
      const innerFailure = new Error('release b failed');

      const program = flatMap(managed(() => new FailingResource('a', events, outerFailure)), () =>
        managed(() => new FailingResource('b', events, innerFailure)),
      );
      const error = failureOf(() => unsafeRunIO(run(program)));

      expect(error).toBe(outerFailure);
      expect(events).toEqual(['acquire a', 'acquire b', 'release b', 'release a']);
      expect(logger.warn).toHaveBeenCalledWith('[pair] release failed, shadowing a pending error', innerFailure);
    });
  });

  describe('map2OrRelease', () => {
    it('should combine both values and release both resources', () => {
      const { managed, map2, run } = createErrorTools(io);

      const program = map2(
        managed(() => new FakeResource(table, 'a', events)),
        managed(() => new FakeResource(table, 'b', events)),
        (a, b) => `${a.id}+${b.id}`,
      );

      expect(unsafeRunIO(run(program))).toBe('a+b');
      expect(events).toEqual(['acquire a', 'acquire b', 'release a', 'release b']);
    });

    it('should release the surviving side when one acquisition fails', () => {
      const { managed, raiseError, map2, run } = createErrorTools(io);
      const down = new Error('a is down');

      const program = map2(
        raiseError<FakeResource>(down),
        managed(() => new FakeResource(table, 'b', events)),
        (a, b) => [a, b],
      );
      const error = failureOf(() => unsafeRunIO(run(program)));

      expect(error).toBe(down);
      expect(events).toEqual(['acquire b', 'release b']);
      expect(table.size).toBe(0);
    });

    it('should keep the first error when both acquisitions fail', () => {
      const errA = new Error('a is down');
      const errB = new Error('b is down');
      const { raiseError } = createErrorTools(io);

      const program = map2OrRelease(
        io,
        raiseError<string>(errA),
        raiseError<string>(errB),
        (a, b) => a + b,
        { logger, name: 'pair' },
      );
      const error = failureOf(() => unsafeRunIO(program.acquire()));

      expect(error).toBe(errA);
      expect(logger.warn).toHaveBeenCalledWith('[pair] both acquisitions failed, shadowing the second', errB);
    });

    it('should release both resources when the combining function throws', () => {
      const { managed, map2, run } = createErrorTools(io);
      const boom = new Error('boom');

      const program = map2(
        managed(() => new FakeResource(table, 'a', events)),
        managed(() => new FakeResource(table, 'b', events)),
        (): string => {
          throw boom;
        },
      );
      const error = failureOf(() => unsafeRunIO(run(program)));

      expect(error).toBe(boom);
      expect(events).toEqual(['acquire a', 'acquire b', 'release a', 'release b']);
      expect(table.size).toBe(0);
    });

    it('should attempt both releases and keep the first failure', () => {
      const { managed, tuple, run } = createErrorTools(io, { logger, name: 'pair' });
      const errA = new Error('release a failed');
      const errB = new Error('release b failed');

      const program = tuple(
        managed(() => new FailingResource('a', events, errA)),
        managed(() => new FailingResource('b', events, errB)),
      );
      const error = failureOf(() => unsafeRunIO(run(program)));

      expect(error).toBe(errA);
      expect(events).toEqual(['acquire a', 'acquire b', 'release a', 'release b']);
      expect(logger.warn).toHaveBeenCalledWith('[pair] both releases failed, shadowing the second', errB);
    });

    it('should apply a function held by a factory', () => {
      const { pure: succeed, ap, run } = createErrorTools(io);

      expect(unsafeRunIO(run(ap(succeed(4), succeed((n: number) => n + 1))))).toBe(5);
    });
  });

  describe('usingOrRelease', () => {
    it('should release after a successful continuation', () => {
      const { managed, using } = createErrorTools(io, { logger, name: 'session' });

      const result = unsafeRunIO(
        using(managed(() => new FakeResource(table, 'a', events)), (resource) => () => {
          events.push(`use ${resource.id}`);
          return resource.id.toUpperCase();
        }),
      );

      expect(result).toBe('A');
      expect(events).toEqual(['acquire a', 'use a', 'release a']);
      expect(logger.debug.mock.calls).toEqual([
        ['[using] session acquired'],
        ['[using] session released'],
      ]);
    });

    it('should release when the continuation fails', () => {
      const { managed, using } = createErrorTools(io);
      const boom = new Error('boom');

      const error = failureOf(() =>
        unsafeRunIO(using(managed(() => new FakeResource(table, 'a', events)), () => io.raiseError<string>(boom))),
      );

      expect(error).toBe(boom);
      expect(events).toEqual(['acquire a', 'release a']);
      expect(table.size).toBe(0);
    });

    it('should let a failing release override the continuation failure', () => {
      const { managed, using } = createErrorTools(io, { logger, name: 'session' });
      const boom = new Error('boom');
      const releaseFailure = new Error('release a failed');

      const error = failureOf(() =>
        unsafeRunIO(
          using(managed(() => new FailingResource('a', events, releaseFailure)), () => io.raiseError<string>(boom)),
        ),
      );

      expect(error).toBe(releaseFailure);
      expect(logger.warn).toHaveBeenCalledWith('[session] release failed, shadowing a pending error', boom);
    });
  });

  describe('attempt', () => {
    it('should turn a failure into an Err', () => {
      expect(unsafeRunIO(attempt(io, io.raiseError<number>('nope')))).toEqual(err('nope'));
    });

    it('should turn a success into an Ok', () => {
      expect(unsafeRunIO(attempt(io, io.of(3)))).toEqual(ok(3));
    });
  });
});
