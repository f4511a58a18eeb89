/**
 * Orientation predicates for polygon construction
 *
 * Uses Shewchuk-style adaptive precision predicates from robust-predicates so
 * that nearly collinear input still gets a consistent sign.
 */

import { orient2d as robustOrient2d } from 'robust-predicates';
import type { Vec2 } from './vec2.js';

/**
 * Sign of the 2D cross product (b - a) × (c - a):
 * - positive: c is left of a→b (counter-clockwise)
 * - negative: c is right of a→b (clockwise)
 * - zero: collinear
 *
 * robust-predicates uses the opposite sign convention, hence the negation.
 */
export function orient2DRobust(a: Vec2, b: Vec2, c: Vec2): number {
  return -robustOrient2d(a[0], a[1], b[0], b[1], c[0], c[1]);
}

export type Winding = 'ccw' | 'cw' | 'degenerate';

/**
 * Winding of a closed 2D polygon.
 *
 * Sums the orientation of the triangle fan anchored at the first vertex,
 * which is twice the signed area.
 */
export function polygonWinding2D(points: readonly Vec2[]): Winding {
  if (points.length < 3) return 'degenerate';

  const anchor = points[0];
  let twiceArea = 0;
  for (let i = 1; i < points.length - 1; i++) {
    twiceArea += orient2DRobust(anchor, points[i], points[i + 1]);
  }

  if (twiceArea > 0) return 'ccw';
  if (twiceArea < 0) return 'cw';
  return 'degenerate';
}
