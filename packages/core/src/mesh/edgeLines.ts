/**
 * Display buffers for a finished shape
 *
 * Read-only consumers of the stores: nothing here adds to the shape.
 */

import type { Vec3 } from '../num/vec3.js';
import { type NumericContext, createNumericContext } from '../num/tolerance.js';
import { curveParamAt } from '../geom/curve3d.js';
import type { Shape } from '../shape/Shape.js';
import type { Edge } from '../shape/types.js';
import { type SampleCurveOptions, sampleCurve3D } from './sampleCurve.js';

export interface EdgeLineOptions extends SampleCurveOptions {
  /** Tolerances for projecting vertices onto curves */
  ctx?: NumericContext;
}

/**
 * Line segments for every edge of a shape
 *
 * Bounded edges run from their first vertex to their second along the
 * curve; the sampled ends are the exact vertex positions. Edges without
 * vertices are sampled over the whole curve parameter range.
 *
 * @returns Endpoint pairs (xyz xyz per segment), in edge insertion order
 */
export function edgeLines(shape: Shape, options?: EdgeLineOptions): Float32Array {
  const ctx = options?.ctx ?? createNumericContext();
  const positions: number[] = [];

  for (const edge of shape.edges.values()) {
    const samples = sampleEdge(shape, edge, ctx, options);
    for (let i = 0; i < samples.length - 1; i++) {
      positions.push(...samples[i], ...samples[i + 1]);
    }
  }

  return new Float32Array(positions);
}

function sampleEdge(
  shape: Shape,
  edge: Edge,
  ctx: NumericContext,
  options?: SampleCurveOptions
): Vec3[] {
  const curve = shape.curves.get(edge.curve);

  if (edge.vertices === null) {
    return sampleCurve3D(curve, 0, 1, options);
  }

  const start = shape.vertexPosition(edge.vertices[0]);
  const end = shape.vertexPosition(edge.vertices[1]);
  const tStart = curveParamAt(curve, start, ctx);
  let tEnd = curveParamAt(curve, end, ctx);
  // Arcs always run forwards around the circle
  if (curve.kind === 'circle' && tEnd <= tStart) {
    tEnd += 1;
  }

  const samples = sampleCurve3D(curve, tStart, tEnd, options);
  samples[0] = start;
  samples[samples.length - 1] = end;
  return samples;
}

/**
 * Triangle positions of every pre-triangulated face
 *
 * @returns Three xyz positions per triangle
 */
export function faceTriangles(shape: Shape): Float32Array {
  const positions: number[] = [];

  for (const face of shape.faces.values()) {
    if (face.kind !== 'triangles') continue;
    for (const triangle of face.triangles) {
      for (const p of triangle.points) {
        positions.push(...p);
      }
    }
  }

  return new Float32Array(positions);
}
