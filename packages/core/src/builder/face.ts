/**
 * Face builder
 *
 * Collects polygons in surface coordinates and adds the surface, the
 * boundary cycles and the face in one `build()` call:
 *
 * ```ts
 * const result = faceBuilder(shape, XY_PLANE_SURFACE)
 *   .withExteriorPolygon([[0, 0], [4, 0], [4, 4], [0, 4]])
 *   .withInteriorPolygon([[1, 1], [1, 2], [2, 2], [2, 1]])
 *   .build();
 * ```
 *
 * Exterior polygons are stored counter-clockwise and interior polygons
 * clockwise, as seen from the surface normal; polygons given the other way
 * round are reversed.
 */

import type { Vec2 } from '../num/vec2.js';
import { polygonWinding2D, type Winding } from '../num/predicates.js';
import { surfacePointToModel } from '../geom/surface.js';
import type { Handle } from '../shape/handles.js';
import type { Shape } from '../shape/Shape.js';
import { type ValidationResult, failure, unwrap, ValidationFailedError } from '../shape/result.js';
import {
  type Color,
  type Cycle,
  type Face,
  type Surface,
  DEFAULT_FACE_COLOR,
  createFace,
} from '../shape/types.js';
import { buildPolygonCycle } from './cycle.js';

export class FaceBuilder {
  private readonly _exteriors: Vec2[][] = [];
  private readonly _interiors: Vec2[][] = [];
  private _color: Color = DEFAULT_FACE_COLOR;

  constructor(
    private readonly shape: Shape,
    private readonly surface: Surface
  ) {}

  withExteriorPolygon(points: readonly Vec2[]): this {
    this._exteriors.push(orient(points, 'ccw'));
    return this;
  }

  withInteriorPolygon(points: readonly Vec2[]): this {
    this._interiors.push(orient(points, 'cw'));
    return this;
  }

  withColor(color: Color): this {
    this._color = color;
    return this;
  }

  /**
   * Add the surface, cycles and face to the shape
   *
   * Returns the failure of the first object that does not validate. Objects
   * added before it stay in the shape.
   */
  build(): ValidationResult<Face> {
    try {
      const surface = unwrap(this.shape.addSurface(this.surface));
      const exteriors = this._exteriors.map((polygon) => this.buildCycle(polygon));
      const interiors = this._interiors.map((polygon) => this.buildCycle(polygon));
      return this.shape.addFace(createFace(surface, exteriors, interiors, this._color));
    } catch (err) {
      if (err instanceof ValidationFailedError) {
        return failure(err.error);
      }
      throw err;
    }
  }

  private buildCycle(polygon: readonly Vec2[]): Handle<Cycle> {
    const points = polygon.map((p) => surfacePointToModel(this.surface, p));
    return buildPolygonCycle(this.shape, points);
  }
}

export function faceBuilder(shape: Shape, surface: Surface): FaceBuilder {
  return new FaceBuilder(shape, surface);
}

/**
 * Copy a polygon, reversed if its winding is not the wanted one
 *
 * @throws Error for degenerate polygons
 */
function orient(points: readonly Vec2[], wanted: Exclude<Winding, 'degenerate'>): Vec2[] {
  const winding = polygonWinding2D(points);
  if (winding === 'degenerate') {
    throw new Error(`Polygon with ${points.length} points has no area`);
  }
  const copy = [...points];
  return winding === wanted ? copy : copy.reverse();
}
