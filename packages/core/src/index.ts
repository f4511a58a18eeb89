/**
 * @brepkit/core - boundary representation object store
 *
 * ## Primary API
 * - Shape: validate-then-insert facade over the entity stores
 * - Handle: opaque, identity-based reference to a stored entity
 * - validate: structural and uniqueness checks per entity kind
 *
 * ## Supporting modules
 * - num: vectors, tolerances, orientation predicates
 * - geom: curves and surfaces
 * - builder: multi-object builders (edges, polygon cycles, faces, sketches)
 * - mesh: read-only display buffers
 */

// =============================================================================
// Shape API
// =============================================================================
export * from './shape/index.js';

// =============================================================================
// Geometry
// =============================================================================
export * from './num/vec2.js';
export * from './num/vec3.js';
export * from './num/tolerance.js';
export * from './num/predicates.js';
export * from './geom/curve3d.js';
export * from './geom/surface.js';

// =============================================================================
// Builders and display
// =============================================================================
export * from './builder/index.js';
export * from './mesh/index.js';
