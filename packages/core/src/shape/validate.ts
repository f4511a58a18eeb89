/**
 * Validation of shape objects against the current stores
 *
 * Runs before every insert. Three categories of problems exist:
 * - structural: a referenced entity is not in its store
 * - uniqueness: a vertex coincides with an existing one
 * - geometric: reserved; nothing produces it yet
 *
 * Structural problems are collected for the whole object, not just the
 * first miss. The vertex point check is the exception: it reports no detail.
 *
 * Checks not performed yet: that a cycle's edges actually form a loop, that
 * a cycle does not overlap itself, and that no duplicate cycle exists.
 */

import { distance } from '../num/vec3.js';
import type { Handle } from './handles.js';
import type { Stores } from './stores.js';
import type { Result } from './result.js';
import { success, failure } from './result.js';
import type {
  Point,
  Curve,
  Surface,
  Vertex,
  Edge,
  Cycle,
  Face,
  ShapeObject,
} from './types.js';

// ============================================================================
// Error types
// ============================================================================

/**
 * Structural issues found during validation
 *
 * Only the fields that belong to the validated kind are ever populated.
 */
export interface StructuralIssues {
  /** Missing curve found in edge validation */
  missingCurve?: Handle<Curve>;
  /** Missing vertices found in edge validation */
  missingVertices: Set<Handle<Vertex>>;
  /** Missing edges found in cycle validation */
  missingEdges: Set<Handle<Edge>>;
  /** Missing surface found in face validation */
  missingSurface?: Handle<Surface>;
  /** Missing cycles found in face validation, exteriors and interiors alike */
  missingCycles: Set<Handle<Cycle>>;
}

export type ValidationError =
  | { kind: 'structural'; message: string; issues: StructuralIssues }
  | { kind: 'uniqueness'; message: string }
  /** Reserved for checks such as self-intersection; not produced yet */
  | { kind: 'geometric'; message: string };

export type Validation = Result<void, ValidationError>;

export function emptyStructuralIssues(): StructuralIssues {
  return {
    missingVertices: new Set(),
    missingEdges: new Set(),
    missingCycles: new Set(),
  };
}

export function structuralError(issues: StructuralIssues): ValidationError {
  return { kind: 'structural', message: 'Structural validation failed', issues };
}

export function uniquenessError(): ValidationError {
  return { kind: 'uniqueness', message: 'Uniqueness validation failed' };
}

const VALID: Validation = success(undefined);

// ============================================================================
// Per-kind validation
// ============================================================================

export function validatePoint(_point: Point, _minDistance: number, _stores: Stores): Validation {
  return VALID;
}

export function validateCurve(_curve: Curve, _minDistance: number, _stores: Stores): Validation {
  return VALID;
}

export function validateSurface(_surface: Surface, _minDistance: number, _stores: Stores): Validation {
  return VALID;
}

/**
 * Validate a vertex
 *
 * A missing point is reported as a structural error with no detail.
 * Uniqueness compares against every stored vertex, so the cost is linear in
 * the vertex count.
 */
export function validateVertex(vertex: Vertex, minDistance: number, stores: Stores): Validation {
  if (!stores.points.contains(vertex.point)) {
    return failure(structuralError(emptyStructuralIssues()));
  }

  const position = stores.points.get(vertex.point);
  for (const existing of stores.vertices.values()) {
    if (distance(stores.points.get(existing.point), position) < minDistance) {
      return failure(uniquenessError());
    }
  }

  return VALID;
}

export function validateEdge(edge: Edge, _minDistance: number, stores: Stores): Validation {
  const issues = emptyStructuralIssues();

  if (!stores.curves.contains(edge.curve)) {
    issues.missingCurve = edge.curve;
  }
  for (const vertex of edge.vertices ?? []) {
    if (!stores.vertices.contains(vertex)) {
      issues.missingVertices.add(vertex);
    }
  }

  if (issues.missingCurve !== undefined || issues.missingVertices.size > 0) {
    return failure(structuralError(issues));
  }
  return VALID;
}

export function validateCycle(cycle: Cycle, _minDistance: number, stores: Stores): Validation {
  const issues = emptyStructuralIssues();

  for (const edge of cycle.edges) {
    if (!stores.edges.contains(edge)) {
      issues.missingEdges.add(edge);
    }
  }

  if (issues.missingEdges.size > 0) {
    return failure(structuralError(issues));
  }
  return VALID;
}

/**
 * Validate a face
 *
 * Triangle faces reference nothing and always pass.
 */
export function validateFace(face: Face, _minDistance: number, stores: Stores): Validation {
  if (face.kind === 'triangles') {
    return VALID;
  }

  const issues = emptyStructuralIssues();

  if (!stores.surfaces.contains(face.surface)) {
    issues.missingSurface = face.surface;
  }
  for (const cycle of [...face.exteriors, ...face.interiors]) {
    if (!stores.cycles.contains(cycle)) {
      issues.missingCycles.add(cycle);
    }
  }

  if (issues.missingSurface !== undefined || issues.missingCycles.size > 0) {
    return failure(structuralError(issues));
  }
  return VALID;
}

/**
 * Validate any shape object
 *
 * @param object The tagged object to validate
 * @param minDistance Minimum distance between distinct vertices
 * @param stores Stores as they stand before the object is inserted
 */
export function validate(object: ShapeObject, minDistance: number, stores: Stores): Validation {
  switch (object.kind) {
    case 'point':
      return validatePoint(object.value, minDistance, stores);
    case 'curve':
      return validateCurve(object.value, minDistance, stores);
    case 'surface':
      return validateSurface(object.value, minDistance, stores);
    case 'vertex':
      return validateVertex(object.value, minDistance, stores);
    case 'edge':
      return validateEdge(object.value, minDistance, stores);
    case 'cycle':
      return validateCycle(object.value, minDistance, stores);
    case 'face':
      return validateFace(object.value, minDistance, stores);
  }
}

// ============================================================================
// Queries
// ============================================================================

function structuralIssuesOf(error: ValidationError): StructuralIssues | null {
  return error.kind === 'structural' ? error.issues : null;
}

/**
 * Whether validation found the given curve missing
 */
export function isMissingCurve(error: ValidationError, curve: Handle<Curve>): boolean {
  return structuralIssuesOf(error)?.missingCurve === curve;
}

export function isMissingVertex(error: ValidationError, vertex: Handle<Vertex>): boolean {
  return structuralIssuesOf(error)?.missingVertices.has(vertex) ?? false;
}

export function isMissingEdge(error: ValidationError, edge: Handle<Edge>): boolean {
  return structuralIssuesOf(error)?.missingEdges.has(edge) ?? false;
}

export function isMissingSurface(error: ValidationError, surface: Handle<Surface>): boolean {
  return structuralIssuesOf(error)?.missingSurface === surface;
}

export function isMissingCycle(error: ValidationError, cycle: Handle<Cycle>): boolean {
  return structuralIssuesOf(error)?.missingCycles.has(cycle) ?? false;
}
