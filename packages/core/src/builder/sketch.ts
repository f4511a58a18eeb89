/**
 * Sketch to shape conversion
 */

import type { Vec2 } from '../num/vec2.js';
import { type Vec3, min3, max3 } from '../num/vec3.js';
import { XY_PLANE_SURFACE, surfacePointToModel } from '../geom/surface.js';
import { Shape, type ShapeOptions } from '../shape/Shape.js';
import { unwrap } from '../shape/result.js';
import { faceBuilder } from './face.js';

/**
 * Axis-aligned bounding box in model space
 */
export interface BoundingBox {
  min: Vec3;
  max: Vec3;
}

/**
 * Build a new shape holding one face on the XY plane whose exterior is the
 * given polygon
 *
 * @throws ValidationFailedError if the polygon has coincident points
 */
export function sketchToShape(points: readonly Vec2[], options?: ShapeOptions): Shape {
  const shape = new Shape(options);
  unwrap(faceBuilder(shape, XY_PLANE_SURFACE).withExteriorPolygon(points).build());
  return shape;
}

/**
 * Bounds of the sketch points placed on the XY plane
 *
 * The box is flat: min and max share z = 0.
 *
 * @throws Error if there are no points
 */
export function sketchBoundingBox(points: readonly Vec2[]): BoundingBox {
  if (points.length === 0) {
    throw new Error('Cannot bound an empty sketch');
  }
  const [first, ...rest] = points.map((p) => surfacePointToModel(XY_PLANE_SURFACE, p));
  let min = first;
  let max = first;
  for (const p of rest) {
    min = min3(min, p);
    max = max3(max, p);
  }
  return { min, max };
}
