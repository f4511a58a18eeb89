/**
 * Entity value types
 *
 * Geometry (points, curves, surfaces) are leaf values. Topology (vertices,
 * edges, cycles, faces) references other entities only through handles:
 *
 *   face → cycle → edge → vertex → point
 *     ↘ surface      ↘ curve
 *
 * There are no back-references.
 */

import type { Vec3 } from '../num/vec3.js';
import type { Curve3D } from '../geom/curve3d.js';
import type { Surface } from '../geom/surface.js';
import type { Handle } from './handles.js';

// ============================================================================
// Geometry
// ============================================================================

/** A position in model space */
export type Point = Vec3;

export type Curve = Curve3D;

export type { Surface };

// ============================================================================
// Topology
// ============================================================================

/**
 * A vertex, located at a point
 */
export interface Vertex {
  point: Handle<Point>;
}

/**
 * The two bounding vertices of an edge, in curve direction
 */
export type EdgeVertices = readonly [Handle<Vertex>, Handle<Vertex>];

/**
 * An edge along a curve
 *
 * `vertices` is null for edges without boundary, such as a full circle.
 */
export interface Edge {
  curve: Handle<Curve>;
  vertices: EdgeVertices | null;
}

/**
 * An ordered sequence of edges meant to form a closed loop
 *
 * Closure is not checked.
 */
export interface Cycle {
  edges: readonly Handle<Edge>[];
}

/** RGBA color, one byte per channel */
export type Color = readonly [number, number, number, number];

export const DEFAULT_FACE_COLOR: Color = [255, 0, 0, 255];

export interface Triangle {
  points: readonly [Vec3, Vec3, Vec3];
  color: Color;
}

/**
 * A face bounded by cycles on a surface
 *
 * Interior cycles are holes.
 */
export interface BRepFace {
  kind: 'face';
  surface: Handle<Surface>;
  exteriors: readonly Handle<Cycle>[];
  interiors: readonly Handle<Cycle>[];
  color: Color;
}

/**
 * A pre-triangulated face with no symbolic boundary
 */
export interface TriangleFace {
  kind: 'triangles';
  triangles: readonly Triangle[];
}

export type Face = BRepFace | TriangleFace;

// ============================================================================
// Tagged object union
// ============================================================================

/**
 * Any value that can be added to a shape, tagged with its kind
 */
export type ShapeObject =
  | { kind: 'point'; value: Point }
  | { kind: 'curve'; value: Curve }
  | { kind: 'surface'; value: Surface }
  | { kind: 'vertex'; value: Vertex }
  | { kind: 'edge'; value: Edge }
  | { kind: 'cycle'; value: Cycle }
  | { kind: 'face'; value: Face };

// ============================================================================
// Constructors
// ============================================================================

export function createVertex(point: Handle<Point>): Vertex {
  return { point };
}

export function createEdge(curve: Handle<Curve>, vertices: EdgeVertices | null = null): Edge {
  return { curve, vertices };
}

export function createCycle(edges: readonly Handle<Edge>[]): Cycle {
  return { edges };
}

export function createFace(
  surface: Handle<Surface>,
  exteriors: readonly Handle<Cycle>[],
  interiors: readonly Handle<Cycle>[] = [],
  color: Color = DEFAULT_FACE_COLOR
): BRepFace {
  return { kind: 'face', surface, exteriors, interiors, color };
}

export function createTriangleFace(triangles: readonly Triangle[]): TriangleFace {
  return { kind: 'triangles', triangles };
}
