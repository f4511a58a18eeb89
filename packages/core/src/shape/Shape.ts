/**
 * Shape - the entry point for building a boundary representation
 *
 * A shape owns one aggregate store and a minimum vertex distance. Every
 * `add*` call validates the object against the stores as they stand before
 * the call; the object is inserted only when validation succeeds. On
 * failure nothing is changed and the structured error is returned.
 *
 * Each call covers exactly one object. Builders that add several related
 * objects handle partial completion themselves.
 *
 * Usage:
 * ```ts
 * const shape = new Shape();
 * const point = unwrap(shape.addPoint(vec3(0, 0, 0)));
 * const vertex = shape.addVertex(createVertex(point));
 * ```
 */

import { DEFAULT_MIN_DISTANCE } from '../num/tolerance.js';
import type { Vec3 } from '../num/vec3.js';
import type { Handle } from './handles.js';
import type { ReadonlyStore, Store } from './store.js';
import { type Stores, type ShapeStats, createStores, getStoreStats } from './stores.js';
import { type ValidationResult, success, failure } from './result.js';
import { type Validation, validate } from './validate.js';
import type {
  Point,
  Curve,
  Surface,
  Vertex,
  Edge,
  EdgeVertices,
  Cycle,
  Face,
  ShapeObject,
} from './types.js';

export interface ShapeOptions {
  /** Minimum distance between two distinct vertices */
  minDistance?: number;
  /** Log every rejected object to the console */
  verbose?: boolean;
}

export const DEFAULT_SHAPE_OPTIONS: Required<ShapeOptions> = {
  minDistance: DEFAULT_MIN_DISTANCE,
  verbose: false,
};

/**
 * @throws Error if the distance is negative or not finite
 */
function checkMinDistance(minDistance: number): number {
  if (!Number.isFinite(minDistance) || minDistance < 0) {
    throw new Error(`Minimum distance must be a finite number >= 0, got ${minDistance}`);
  }
  return minDistance;
}

export class Shape {
  private readonly _stores: Stores = createStores();
  private _minDistance: number;
  private readonly _verbose: boolean;

  constructor(options?: ShapeOptions) {
    const opts = { ...DEFAULT_SHAPE_OPTIONS, ...options };
    this._minDistance = checkMinDistance(opts.minDistance);
    this._verbose = opts.verbose;
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  get minDistance(): number {
    return this._minDistance;
  }

  /**
   * Set the minimum vertex distance used by subsequent inserts
   *
   * Vertices already stored are not re-checked.
   *
   * @throws Error if the distance is negative or not finite
   */
  withMinDistance(minDistance: number): this {
    this._minDistance = checkMinDistance(minDistance);
    return this;
  }

  // ==========================================================================
  // Read access
  // ==========================================================================

  get points(): ReadonlyStore<Point> {
    return this._stores.points;
  }

  get curves(): ReadonlyStore<Curve> {
    return this._stores.curves;
  }

  get surfaces(): ReadonlyStore<Surface> {
    return this._stores.surfaces;
  }

  get vertices(): ReadonlyStore<Vertex> {
    return this._stores.vertices;
  }

  get edges(): ReadonlyStore<Edge> {
    return this._stores.edges;
  }

  get cycles(): ReadonlyStore<Cycle> {
    return this._stores.cycles;
  }

  get faces(): ReadonlyStore<Face> {
    return this._stores.faces;
  }

  /**
   * Position of a stored vertex
   */
  vertexPosition(vertex: Handle<Vertex>): Vec3 {
    return this._stores.points.get(this._stores.vertices.get(vertex).point);
  }

  /**
   * Bounding vertices of a stored edge, or null for an edge without boundary
   */
  edgeVertices(edge: Handle<Edge>): EdgeVertices | null {
    return this._stores.edges.get(edge).vertices;
  }

  stats(): ShapeStats {
    return getStoreStats(this._stores);
  }

  // ==========================================================================
  // Validation and insertion
  // ==========================================================================

  /**
   * Validate an object against the current stores without inserting it
   */
  validate(object: ShapeObject): Validation {
    return validate(object, this._minDistance, this._stores);
  }

  addPoint(point: Point): ValidationResult<Point> {
    return this.add({ kind: 'point', value: point }, this._stores.points);
  }

  addCurve(curve: Curve): ValidationResult<Curve> {
    return this.add({ kind: 'curve', value: curve }, this._stores.curves);
  }

  addSurface(surface: Surface): ValidationResult<Surface> {
    return this.add({ kind: 'surface', value: surface }, this._stores.surfaces);
  }

  addVertex(vertex: Vertex): ValidationResult<Vertex> {
    return this.add({ kind: 'vertex', value: vertex }, this._stores.vertices);
  }

  addEdge(edge: Edge): ValidationResult<Edge> {
    return this.add({ kind: 'edge', value: edge }, this._stores.edges);
  }

  addCycle(cycle: Cycle): ValidationResult<Cycle> {
    return this.add({ kind: 'cycle', value: cycle }, this._stores.cycles);
  }

  addFace(face: Face): ValidationResult<Face> {
    return this.add({ kind: 'face', value: face }, this._stores.faces);
  }

  /**
   * Validate and insert any tagged shape object
   */
  insert(object: ShapeObject): ValidationResult<ShapeObject['value']> {
    switch (object.kind) {
      case 'point':
        return this.addPoint(object.value);
      case 'curve':
        return this.addCurve(object.value);
      case 'surface':
        return this.addSurface(object.value);
      case 'vertex':
        return this.addVertex(object.value);
      case 'edge':
        return this.addEdge(object.value);
      case 'cycle':
        return this.addCycle(object.value);
      case 'face':
        return this.addFace(object.value);
    }
  }

  private add<T>(object: ShapeObject & { value: T }, store: Store<T>): ValidationResult<T> {
    const validation = this.validate(object);
    if (!validation.ok) {
      if (this._verbose) {
        console.log(`[shape] rejected ${object.kind}: ${validation.error.message}`);
      }
      return failure(validation.error);
    }
    return success(store.insert(object.value));
  }
}
