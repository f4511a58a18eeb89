/**
 * 2D vector type for surface (u, v) coordinates
 */

export type Vec2 = [number, number];

export function vec2(x: number, y: number): Vec2 {
  return [x, y];
}
