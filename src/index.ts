/**
 * @module
 * The main entry point for the library. Factories describe "acquire a
 * resource, use it, release it"; the composition operators combine those
 * descriptions while guaranteeing that every acquired resource is released
 * exactly once, in a well-defined order, over whichever host effect the caller
 * injects.
 */

// Higher-kinded encoding and host capabilities
export * from './kind';
export * from './effect';

// Core types (Handle, Factory, Residual)
export * from './types';

// Flattening (run, using), logging and options
export * from './run';

// Construction and composition (pure, liftEffect, bind, map2, ap)
export * from './composition';

// Error-aware composition (raiseError, handleError, bindOrRelease)
export * from './errors';

// Racing composition (chooseAny)
export * from './concurrency';

// Managed construction (managed, make, disposable, managedAsync)
export * from './bracket';

// Tool sets bound to one host
export * from './tools';

// Bundled hosts and the neverthrow bridge
export * from './io';
export * from './task';
export * from './result-async';
export * from './bridge';
