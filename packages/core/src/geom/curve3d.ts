/**
 * 3D curve representations and evaluators
 *
 * Curves are leaf geometry: they hold no references to other entities.
 * Both kinds use a uniform parameterization with t ∈ [0, 1].
 */

import type { Vec3 } from '../num/vec3.js';
import type { NumericContext } from '../num/tolerance.js';
import { vec3, add3, sub3, mul3, dot3, cross3, length3, normalize3 } from '../num/vec3.js';
import { isZero } from '../num/tolerance.js';

/**
 * Line through p0 (t = 0) and p1 (t = 1)
 *
 * Edges on a line are bounded by their vertices, not by p0/p1.
 */
export interface Line3D {
  kind: 'line';
  p0: Vec3;
  p1: Vec3;
}

/**
 * Circle in the plane perpendicular to `normal`
 *
 * t = 0 lies along uDir; t increases towards vDir.
 */
export interface Circle3D {
  kind: 'circle';
  center: Vec3;
  radius: number;
  normal: Vec3;
  uDir: Vec3;
  vDir: Vec3;
}

export type Curve3D = Line3D | Circle3D;

export function createLineFromPoints(p0: Vec3, p1: Vec3): Line3D {
  return { kind: 'line', p0, p1 };
}

/**
 * Create a circle from center, radius, normal and an optional reference
 * direction. Without one, any direction perpendicular to the normal is used.
 */
export function createCircle3D(center: Vec3, radius: number, normal: Vec3, uDir?: Vec3): Circle3D {
  const n = normalize3(normal);
  let u: Vec3;

  if (uDir) {
    u = normalize3(sub3(uDir, mul3(n, dot3(uDir, n))));
  } else {
    const absX = Math.abs(n[0]);
    const absY = Math.abs(n[1]);
    const absZ = Math.abs(n[2]);
    let candidate: Vec3;
    if (absX <= absY && absX <= absZ) {
      candidate = vec3(1, 0, 0);
    } else if (absY <= absZ) {
      candidate = vec3(0, 1, 0);
    } else {
      candidate = vec3(0, 0, 1);
    }
    u = normalize3(cross3(n, candidate));
  }

  return {
    kind: 'circle',
    center,
    radius,
    normal: n,
    uDir: u,
    vDir: normalize3(cross3(n, u)),
  };
}

/**
 * Evaluate a curve at parameter t
 *
 * - Lines: t maps linearly from p0 to p1 (and extrapolates outside [0, 1])
 * - Circles: t ∈ [0, 1] is one full revolution
 */
export function evalCurve3D(curve: Curve3D, t: number): Vec3 {
  switch (curve.kind) {
    case 'line':
      return add3(curve.p0, mul3(sub3(curve.p1, curve.p0), t));
    case 'circle': {
      const angle = t * 2 * Math.PI;
      const radial = add3(mul3(curve.uDir, Math.cos(angle)), mul3(curve.vDir, Math.sin(angle)));
      return add3(curve.center, mul3(radial, curve.radius));
    }
  }
}

/**
 * Parameter of the point on the curve closest to `point`
 *
 * Line parameters are not clamped. Circle parameters are in [0, 1).
 */
export function curveParamAt(curve: Curve3D, point: Vec3, ctx: NumericContext): number {
  switch (curve.kind) {
    case 'line': {
      const dir = sub3(curve.p1, curve.p0);
      const lenSq = dot3(dir, dir);
      if (isZero(lenSq, ctx)) return 0;
      return dot3(sub3(point, curve.p0), dir) / lenSq;
    }
    case 'circle': {
      const rel = sub3(point, curve.center);
      const inPlane = sub3(rel, mul3(curve.normal, dot3(rel, curve.normal)));
      if (isZero(length3(inPlane), ctx)) return 0;
      const angle = Math.atan2(dot3(inPlane, curve.vDir), dot3(inPlane, curve.uDir));
      const t = angle / (2 * Math.PI);
      return t < 0 ? t + 1 : t;
    }
  }
}

/**
 * Point on the curve closest to `point`
 */
export function curvePointAt(curve: Curve3D, point: Vec3, ctx: NumericContext): Vec3 {
  return evalCurve3D(curve, curveParamAt(curve, point, ctx));
}
