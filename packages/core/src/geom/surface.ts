/**
 * Surface representations
 *
 * Only planes are supported. A plane maps surface coordinates (u, v) to
 * model space as `origin + u * xDir + v * yDir`.
 */

import type { Vec2 } from '../num/vec2.js';
import type { Vec3 } from '../num/vec3.js';
import { add3, sub3, mul3, dot3, cross3, normalize3, X_AXIS, Y_AXIS, Z_AXIS, ZERO3 } from '../num/vec3.js';

export interface PlaneSurface {
  kind: 'plane';
  origin: Vec3;
  normal: Vec3;
  xDir: Vec3;
  yDir: Vec3;
}

export type Surface = PlaneSurface;

/**
 * Create a plane from origin, normal and an optional x-direction.
 *
 * The x-direction is projected into the plane. Without one, an axis
 * perpendicular to the normal is picked.
 */
export function createPlaneSurface(origin: Vec3, normal: Vec3, xDir?: Vec3): PlaneSurface {
  const n = normalize3(normal);
  let x: Vec3;

  if (xDir) {
    x = normalize3(sub3(xDir, mul3(n, dot3(xDir, n))));
  } else {
    const candidate = Math.abs(n[0]) < 0.9 ? X_AXIS : Y_AXIS;
    x = normalize3(sub3(candidate, mul3(n, dot3(candidate, n))));
  }

  return {
    kind: 'plane',
    origin,
    normal: n,
    xDir: x,
    yDir: normalize3(cross3(n, x)),
  };
}

/** The XY plane through the origin */
export const XY_PLANE_SURFACE: PlaneSurface = createPlaneSurface(ZERO3, Z_AXIS, X_AXIS);

export function evalSurface(surface: Surface, u: number, v: number): Vec3 {
  return add3(surface.origin, add3(mul3(surface.xDir, u), mul3(surface.yDir, v)));
}

/**
 * Convert a point in surface coordinates to model coordinates
 */
export function surfacePointToModel(surface: Surface, point: Vec2): Vec3 {
  return evalSurface(surface, point[0], point[1]);
}
