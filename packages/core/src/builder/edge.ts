/**
 * Edge and vertex builders
 *
 * These add several related objects in sequence. A validation failure part
 * way through throws `ValidationFailedError`; objects added before the
 * failure stay in the shape.
 */

import type { Vec3 } from '../num/vec3.js';
import { Z_AXIS, ZERO3 } from '../num/vec3.js';
import { createLineFromPoints, createCircle3D } from '../geom/curve3d.js';
import type { Handle } from '../shape/handles.js';
import type { Shape } from '../shape/Shape.js';
import { unwrap } from '../shape/result.js';
import { type Vertex, type Edge, type EdgeVertices, createVertex, createEdge } from '../shape/types.js';

/**
 * Add a point and a vertex at that point
 */
export function buildVertex(shape: Shape, position: Vec3): Handle<Vertex> {
  const point = unwrap(shape.addPoint(position));
  return unwrap(shape.addVertex(createVertex(point)));
}

/**
 * Add a straight edge between two stored vertices
 *
 * The line curve runs from the first vertex to the second.
 */
export function buildLineSegmentFromVertices(shape: Shape, vertices: EdgeVertices): Handle<Edge> {
  const [a, b] = vertices;
  const curve = unwrap(shape.addCurve(createLineFromPoints(shape.vertexPosition(a), shape.vertexPosition(b))));
  return unwrap(shape.addEdge(createEdge(curve, vertices)));
}

/**
 * Add a straight edge between two new vertices
 */
export function buildLineSegment(shape: Shape, points: readonly [Vec3, Vec3]): Handle<Edge> {
  const a = buildVertex(shape, points[0]);
  const b = buildVertex(shape, points[1]);
  return buildLineSegmentFromVertices(shape, [a, b]);
}

/**
 * Add a full circle around the origin in the XY plane, as an edge without
 * vertices
 */
export function buildCircle(shape: Shape, radius: number): Handle<Edge> {
  const curve = unwrap(shape.addCurve(createCircle3D(ZERO3, radius, Z_AXIS)));
  return unwrap(shape.addEdge(createEdge(curve)));
}
