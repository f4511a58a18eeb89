/**
 * Tests for display buffers
 */

import { describe, it, expect } from 'vitest';
import { vec3, X_AXIS, Z_AXIS } from '../num/vec3.js';
import { createCircle3D } from '../geom/curve3d.js';
import { XY_PLANE_SURFACE } from '../geom/surface.js';
import { Shape } from '../shape/Shape.js';
import { unwrap } from '../shape/result.js';
import { createEdge, createTriangleFace, DEFAULT_FACE_COLOR } from '../shape/types.js';
import { buildLineSegment, buildCircle, buildVertex, faceBuilder } from '../builder/index.js';
import { edgeLines, faceTriangles } from './edgeLines.js';
import { sampleCurve3D } from './sampleCurve.js';

describe('edgeLines', () => {
  it('should emit one segment for a line edge', () => {
    const shape = new Shape();
    buildLineSegment(shape, [vec3(0, 0, 0), vec3(2, 0, 0)]);

    expect(Array.from(edgeLines(shape))).toEqual([0, 0, 0, 2, 0, 0]);
  });

  it('should sample a closed circle over its full range', () => {
    const shape = new Shape();
    buildCircle(shape, 1);

    const lines = edgeLines(shape, { arcAngleStep: Math.PI / 2, minArcSegments: 4 });

    // 4 segments, two xyz endpoints each
    expect(lines).toHaveLength(24);
    expect(Array.from(lines.slice(0, 3))).toEqual([0, 1, 0]);
  });

  it('should run a bounded arc from its first vertex to its second', () => {
    const shape = new Shape();
    const a = buildVertex(shape, vec3(1, 0, 0));
    const b = buildVertex(shape, vec3(0, 1, 0));
    const curve = unwrap(shape.addCurve(createCircle3D(vec3(0, 0, 0), 1, Z_AXIS, X_AXIS)));
    unwrap(shape.addEdge(createEdge(curve, [a, b])));

    const lines = edgeLines(shape, { minArcSegments: 2, arcAngleStep: Math.PI });

    expect(lines).toHaveLength(12);
    expect(Array.from(lines.slice(0, 3))).toEqual([1, 0, 0]);
    expect(Array.from(lines.slice(9, 12))).toEqual([0, 1, 0]);
    // midpoint of the quarter arc
    expect(lines[3]).toBeCloseTo(Math.SQRT1_2, 6);
    expect(lines[4]).toBeCloseTo(Math.SQRT1_2, 6);
  });

  it('should cover every edge of a face', () => {
    const shape = new Shape();
    unwrap(
      faceBuilder(shape, XY_PLANE_SURFACE)
        .withExteriorPolygon([
          [0, 0],
          [1, 0],
          [1, 1],
          [0, 1],
        ])
        .build()
    );

    expect(edgeLines(shape)).toHaveLength(4 * 6);
  });

  it('should not change the shape', () => {
    const shape = new Shape();
    buildLineSegment(shape, [vec3(0, 0, 0), vec3(2, 0, 0)]);
    const before = shape.stats();

    edgeLines(shape);

    expect(shape.stats()).toEqual(before);
  });
});

describe('faceTriangles', () => {
  it('should collect triangle faces and skip b-rep faces', () => {
    const shape = new Shape();
    unwrap(
      shape.addFace(
        createTriangleFace([
          { points: [vec3(0, 0, 0), vec3(1, 0, 0), vec3(0, 1, 0)], color: DEFAULT_FACE_COLOR },
        ])
      )
    );
    unwrap(
      faceBuilder(shape, XY_PLANE_SURFACE)
        .withExteriorPolygon([
          [5, 5],
          [6, 5],
          [6, 6],
        ])
        .build()
    );

    expect(Array.from(faceTriangles(shape))).toEqual([0, 0, 0, 1, 0, 0, 0, 1, 0]);
  });
});

describe('sampleCurve3D', () => {
  it('should include both parameter ends', () => {
    const circle = createCircle3D(vec3(0, 0, 0), 2, Z_AXIS, X_AXIS);

    const points = sampleCurve3D(circle, 0, 0.5, { minArcSegments: 2, arcAngleStep: Math.PI });

    expect(points).toHaveLength(3);
    expect(points[0]).toEqual([2, 0, 0]);
    expect(points[2][0]).toBeCloseTo(-2, 10);
    expect(points[2][1]).toBeCloseTo(0, 10);
  });
});
