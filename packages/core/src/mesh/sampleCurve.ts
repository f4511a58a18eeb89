/**
 * Curve sampling for display
 */

import type { Vec3 } from '../num/vec3.js';
import type { Curve3D } from '../geom/curve3d.js';
import { evalCurve3D } from '../geom/curve3d.js';

/**
 * Sampling options
 */
export interface SampleCurveOptions {
  /** Segments for lines */
  minSegments?: number;
  /** Minimum segments for circles and arcs */
  minArcSegments?: number;
  /** Maximum segments */
  maxSegments?: number;
  /** Target angle per segment for circles (radians) */
  arcAngleStep?: number;
}

export const DEFAULT_SAMPLE_OPTIONS: Required<SampleCurveOptions> = {
  minSegments: 1,
  minArcSegments: 12,
  maxSegments: 64,
  arcAngleStep: Math.PI / 18, // ~10 degrees
};

/**
 * Sample a curve between two parameters, both included
 *
 * @returns segments + 1 points, from tStart to tEnd
 */
export function sampleCurve3D(
  curve: Curve3D,
  tStart: number,
  tEnd: number,
  options?: SampleCurveOptions
): Vec3[] {
  const opts = { ...DEFAULT_SAMPLE_OPTIONS, ...options };
  const segments = segmentCount(curve, Math.abs(tEnd - tStart), opts);

  const points: Vec3[] = [];
  for (let i = 0; i <= segments; i++) {
    points.push(evalCurve3D(curve, tStart + ((tEnd - tStart) * i) / segments));
  }
  return points;
}

function segmentCount(curve: Curve3D, span: number, opts: Required<SampleCurveOptions>): number {
  if (curve.kind === `line`) {
    return opts.minSegments;
  }

  const byAngle = Math.ceil((span * 2 * Math.PI) / opts.arcAngleStep);
  return Math.min(opts.maxSegments, Math.max(opts.minArcSegments, byAngle));
}
