import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  createErrorTools,
  createFactoryTools,
  createRaceTools,
  io,
  resultAsyncEffect,
  task,
} from '../src';
import { FakeResource } from './fake-resource';

class ResourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResourceError';
  }
}

const effect = resultAsyncEffect((error) =>
  error instanceof ResourceError ? error : new ResourceError(error instanceof Error ? error.message : String(error)),
);

function createLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const factoryToolNames = [
  'ap',
  'disposable',
  'flatMap',
  'flatten',
  'liftEffect',
  'make',
  'managed',
  'map',
  'map2',
  'pure',
  'run',
  'tuple',
  'using',
];
const errorToolNames = [...factoryToolNames, 'handleError', 'orElse', 'raiseError'];
const raceToolNames = [...errorToolNames, 'chooseAny', 'managedAsync'];

describe('Tool sets (tools.ts)', () => {
  let table: Map<string, FakeResource>;
  let events: string[];
  let logger: ReturnType<typeof createLogger>;

  beforeEach(() => {
    table = new Map();
    events = [];
    logger = createLogger();
  });

  describe('surface', () => {
    it('should expose the sequencing operations', () => {
      expect(Object.keys(createFactoryTools(io)).sort()).toEqual([...factoryToolNames].sort());
    });

    it('should add the error operations', () => {
      expect(Object.keys(createErrorTools(io)).sort()).toEqual([...errorToolNames].sort());
    });

    it('should add racing and async construction', () => {
      expect(Object.keys(createRaceTools(task)).sort()).toEqual([...raceToolNames].sort());
    });
  });

  describe('error tools over the ResultAsync host', () => {
    it('should release the first resource when the second cannot be opened', async () => {
      const tools = createErrorTools(effect, { logger, name: 'checkout' });
      const refused = new ResourceError('session refused');

      const program = tools.flatMap(
        tools.managed(() => new FakeResource(table, 'store', events)),
        () =>
          tools.managed((): FakeResource => {
            throw refused;
          }),
      );
      const outcome = await tools.run(program);

      expect(outcome._unsafeUnwrapErr()).toBe(refused);
      expect(events).toEqual(['acquire store', 'release store']);
      expect(table.size).toBe(0);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should pair two resources and release both', async () => {
      const tools = createErrorTools(effect, { logger, name: 'checkout' });

      const outcome = await tools.run(
        tools.tuple(
          tools.managed(() => new FakeResource(table, 'store', events)),
          tools.managed(() => new FakeResource(table, 'session', events)),
        ),
      );
      const [store, session] = outcome._unsafeUnwrap();

      expect([store.id, session.id]).toEqual(['store', 'session']);
      expect([...events].sort()).toEqual(['acquire session', 'acquire store', 'release session', 'release store']);
      expect(logger.debug.mock.calls).toEqual([['[run] checkout acquired'], ['[run] checkout released']]);
    });

    it('should fall back to a second resource', async () => {
      const tools = createErrorTools(effect);

      const outcome = await tools.run(
        tools.orElse(tools.raiseError<FakeResource>(new ResourceError('primary down')), () =>
          tools.managed(() => new FakeResource(table, 'replica', events)),
        ),
      );

      expect(outcome._unsafeUnwrap().id).toBe('replica');
      expect(events).toEqual(['acquire replica', 'release replica']);
    });

    it('should convert a throwing mapping function into the typed error', async () => {
      const tools = createErrorTools(effect);

      const outcome = await tools.run(
        tools.map(tools.managed(() => new FakeResource(table, 'store', events)), (): number => {
          throw new Error('corrupt index');
        }),
      );

      expect(outcome._unsafeUnwrapErr()).toEqual(new ResourceError('corrupt index'));
      expect(events).toEqual(['acquire store', 'release store']);
    });
  });

  describe('plain tools', () => {
    it('should lift a host computation and compose it', () => {
      const tools = createFactoryTools(io);

      const greeting = tools.map(tools.liftEffect(io.of('world')), (name) => `hello ${name}`);

      expect(tools.run(greeting)()).toBe('hello world');
    });
  });
});
