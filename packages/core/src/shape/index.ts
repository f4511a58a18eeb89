/**
 * Shape module
 *
 * - handles.ts: identity handles into stores
 * - store.ts: append-only typed store
 * - stores.ts: one store per entity kind
 * - types.ts: geometry and topology values
 * - validate.ts: per-kind validation
 * - Shape.ts: validate-then-insert facade
 */

export * from './handles.js';
export * from './store.js';
export * from './stores.js';
export * from './types.js';
export * from './result.js';
export * from './validate.js';
export * from './Shape.js';
