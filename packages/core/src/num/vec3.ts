/**
 * Model-space positions and directions
 *
 * Points stored in a shape, curve and surface frames, and sketch bounds are
 * all `[x, y, z]` tuples. Nothing here mutates its arguments.
 */

export type Vec3 = [number, number, number];

export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

export const ZERO3: Vec3 = [0, 0, 0];
export const X_AXIS: Vec3 = [1, 0, 0];
export const Y_AXIS: Vec3 = [0, 1, 0];
export const Z_AXIS: Vec3 = [0, 0, 1];

function zip3(a: Vec3, b: Vec3, op: (x: number, y: number) => number): Vec3 {
  return [op(a[0], b[0]), op(a[1], b[1]), op(a[2], b[2])];
}

export function add3(a: Vec3, b: Vec3): Vec3 {
  return zip3(a, b, (x, y) => x + y);
}

export function sub3(a: Vec3, b: Vec3): Vec3 {
  return zip3(a, b, (x, y) => x - y);
}

export function mul3(v: Vec3, s: number): Vec3 {
  return [v[0] * s, v[1] * s, v[2] * s];
}

/** Component-wise minimum */
export function min3(a: Vec3, b: Vec3): Vec3 {
  return zip3(a, b, Math.min);
}

/** Component-wise maximum */
export function max3(a: Vec3, b: Vec3): Vec3 {
  return zip3(a, b, Math.max);
}

export function dot3(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function cross3(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

export function length3(v: Vec3): number {
  return Math.hypot(v[0], v[1], v[2]);
}

/**
 * Unit vector in the direction of `v`; the zero vector maps to itself
 */
export function normalize3(v: Vec3): Vec3 {
  const len = length3(v);
  return len === 0 ? [0, 0, 0] : mul3(v, 1 / len);
}

/**
 * Euclidean distance between two points, as used by vertex uniqueness
 */
export function distance(a: Vec3, b: Vec3): number {
  return length3(sub3(a, b));
}
