/**
 * Tests for orientation predicates
 */

import { describe, it, expect } from 'vitest';
import { orient2DRobust, polygonWinding2D } from './predicates.js';

describe('predicates', () => {
  describe('orient2DRobust', () => {
    it('is positive for a left turn', () => {
      expect(orient2DRobust([0, 0], [1, 0], [0, 1])).toBeGreaterThan(0);
    });

    it('is negative for a right turn', () => {
      expect(orient2DRobust([0, 0], [1, 0], [0, -1])).toBeLessThan(0);
    });

    it('is zero for collinear points', () => {
      expect(Math.abs(orient2DRobust([0, 0], [1, 1], [3, 3]))).toBe(0);
    });
  });

  describe('polygonWinding2D', () => {
    it('classifies a counter-clockwise square', () => {
      expect(polygonWinding2D([[0, 0], [1, 0], [1, 1], [0, 1]])).toBe('ccw');
    });

    it('classifies a clockwise square', () => {
      expect(polygonWinding2D([[0, 0], [0, 1], [1, 1], [1, 0]])).toBe('cw');
    });

    it('treats collinear and short polygons as degenerate', () => {
      expect(polygonWinding2D([[0, 0], [1, 0], [2, 0]])).toBe('degenerate');
      expect(polygonWinding2D([[0, 0], [1, 0]])).toBe('degenerate');
    });
  });
});
