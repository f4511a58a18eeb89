/**
 * Aggregate store: one independent store per entity kind
 */

import { Store } from './store.js';
import type { Point, Curve, Surface, Vertex, Edge, Cycle, Face } from './types.js';

export interface Stores {
  readonly points: Store<Point>;
  readonly curves: Store<Curve>;
  readonly surfaces: Store<Surface>;
  readonly vertices: Store<Vertex>;
  readonly edges: Store<Edge>;
  readonly cycles: Store<Cycle>;
  readonly faces: Store<Face>;
}

export function createStores(): Stores {
  return {
    points: new Store<Point>('point'),
    curves: new Store<Curve>('curve'),
    surfaces: new Store<Surface>('surface'),
    vertices: new Store<Vertex>('vertex'),
    edges: new Store<Edge>('edge'),
    cycles: new Store<Cycle>('cycle'),
    faces: new Store<Face>('face'),
  };
}

/**
 * Number of stored entities per kind
 */
export interface ShapeStats {
  points: number;
  curves: number;
  surfaces: number;
  vertices: number;
  edges: number;
  cycles: number;
  faces: number;
}

export function getStoreStats(stores: Stores): ShapeStats {
  return {
    points: stores.points.size,
    curves: stores.curves.size,
    surfaces: stores.surfaces.size,
    vertices: stores.vertices.size,
    edges: stores.edges.size,
    cycles: stores.cycles.size,
    faces: stores.faces.size,
  };
}
