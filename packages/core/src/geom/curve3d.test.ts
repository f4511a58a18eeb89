/**
 * Tests for 3D curves
 */

import { describe, it, expect } from 'vitest';
import { vec3, X_AXIS, Z_AXIS } from '../num/vec3.js';
import { createNumericContext } from '../num/tolerance.js';
import {
  createLineFromPoints,
  createCircle3D,
  evalCurve3D,
  curveParamAt,
  curvePointAt,
} from './curve3d.js';

describe('curve3d', () => {
  const ctx = createNumericContext();

  describe('evalCurve3D', () => {
    it('evaluates a line at its ends and beyond', () => {
      const line = createLineFromPoints(vec3(0, 0, 0), vec3(2, 4, 0));

      expect(evalCurve3D(line, 0)).toEqual([0, 0, 0]);
      expect(evalCurve3D(line, 1)).toEqual([2, 4, 0]);
      expect(evalCurve3D(line, 1.5)).toEqual([3, 6, 0]);
    });

    it('evaluates a circle a quarter turn in', () => {
      const circle = createCircle3D(vec3(1, 1, 0), 2, Z_AXIS, X_AXIS);

      const p = evalCurve3D(circle, 0.25);

      expect(p[0]).toBeCloseTo(1, 10);
      expect(p[1]).toBeCloseTo(3, 10);
      expect(p[2]).toBeCloseTo(0, 10);
    });
  });

  describe('createCircle3D', () => {
    it('projects the reference direction into the circle plane', () => {
      const circle = createCircle3D(vec3(0, 0, 0), 1, Z_AXIS, vec3(1, 0, 1));

      expect(circle.uDir).toEqual([1, 0, 0]);
      expect(circle.vDir).toEqual([0, 1, 0]);
    });

    it('picks a perpendicular reference direction when none is given', () => {
      const circle = createCircle3D(vec3(0, 0, 0), 1, Z_AXIS);

      expect(circle.uDir).toEqual([0, 1, 0]);
    });
  });

  describe('curveParamAt', () => {
    it('projects onto a line', () => {
      const line = createLineFromPoints(vec3(0, 0, 0), vec3(2, 0, 0));

      expect(curveParamAt(line, vec3(1, 5, 0), ctx)).toBe(0.5);
    });

    it('measures circle parameters counter-clockwise from the reference direction', () => {
      const circle = createCircle3D(vec3(0, 0, 0), 1, Z_AXIS, X_AXIS);

      expect(curveParamAt(circle, vec3(0, 1, 0), ctx)).toBeCloseTo(0.25, 12);
      expect(curveParamAt(circle, vec3(0, -1, 0), ctx)).toBeCloseTo(0.75, 12);
    });

    it('returns 0 at the circle center', () => {
      const circle = createCircle3D(vec3(0, 0, 0), 1, Z_AXIS, X_AXIS);

      expect(curveParamAt(circle, vec3(0, 0, 3), ctx)).toBe(0);
    });
  });

  describe('curvePointAt', () => {
    it('drops a point onto a line', () => {
      const line = createLineFromPoints(vec3(0, 0, 0), vec3(4, 0, 0));

      expect(curvePointAt(line, vec3(3, 2, 1), ctx)).toEqual([3, 0, 0]);
    });

    it('pulls a point onto a circle', () => {
      const circle = createCircle3D(vec3(0, 0, 0), 2, Z_AXIS, X_AXIS);

      const p = curvePointAt(circle, vec3(0, 5, 1), ctx);

      expect(p[0]).toBeCloseTo(0, 10);
      expect(p[1]).toBeCloseTo(2, 10);
      expect(p[2]).toBeCloseTo(0, 10);
    });
  });
});
