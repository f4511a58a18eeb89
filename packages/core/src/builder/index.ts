/**
 * Builders that assemble several shape objects through the Shape API
 */

export * from './edge.js';
export * from './cycle.js';
export * from './face.js';
export * from './sketch.js';
