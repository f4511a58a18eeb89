/**
 * Cycle builders
 */

import type { Vec3 } from '../num/vec3.js';
import type { Handle } from '../shape/handles.js';
import type { Shape } from '../shape/Shape.js';
import { unwrap } from '../shape/result.js';
import { type Cycle, type Edge, createCycle } from '../shape/types.js';
import { buildVertex, buildLineSegmentFromVertices } from './edge.js';

/**
 * Add a closed polygon as a cycle of line edges
 *
 * One vertex is added per point and one edge per consecutive pair, the last
 * edge closing back to the first point. Consecutive edges share vertices.
 *
 * @throws Error for fewer than three points
 * @throws ValidationFailedError if any object fails validation, e.g. a
 *   point that coincides with an existing vertex
 */
export function buildPolygonCycle(shape: Shape, points: readonly Vec3[]): Handle<Cycle> {
  if (points.length < 3) {
    throw new Error(`A polygon needs at least 3 points, got ${points.length}`);
  }

  const vertices = points.map((p) => buildVertex(shape, p));

  const edges: Handle<Edge>[] = [];
  for (let i = 0; i < vertices.length; i++) {
    const next = vertices[(i + 1) % vertices.length];
    edges.push(buildLineSegmentFromVertices(shape, [vertices[i], next]));
  }

  return unwrap(shape.addCycle(createCycle(edges)));
}
