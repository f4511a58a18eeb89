/**
 * Tolerance model and numeric context
 *
 * Geometric comparisons go through these helpers rather than raw `===` on
 * floating point values.
 */

/**
 * Tolerance values for a model
 */
export interface Tolerances {
  /** Model-space length tolerance (absolute distance) */
  length: number;
}

/**
 * Numeric context containing tolerance information
 */
export interface NumericContext {
  tol: Tolerances;
}

/**
 * Default minimum distance between two distinct vertices. A vertex closer
 * than this to a stored vertex is rejected as a duplicate.
 */
export const DEFAULT_MIN_DISTANCE = 5e-7;

export const DEFAULT_TOLERANCES: Tolerances = {
  length: 1e-6,
};

export function createNumericContext(tol?: Partial<Tolerances>): NumericContext {
  return {
    tol: {
      length: tol?.length ?? DEFAULT_TOLERANCES.length,
    },
  };
}

/**
 * Check if a value is effectively zero (within length tolerance)
 */
export function isZero(value: number, ctx: NumericContext): boolean {
  return Math.abs(value) <= ctx.tol.length;
}
