/**
 * Result types for shape operations
 *
 * Usage:
 * ```ts
 * const result = shape.addVertex(createVertex(point));
 * if (result.ok) {
 *   const vertex = result.value;
 * } else if (result.error.kind === 'uniqueness') {
 *   // a vertex already exists at that position
 * }
 * ```
 */

import type { Handle } from './handles.js';
import type { ValidationError } from './validate.js';

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Returned by the `add*` methods of `Shape`
 */
export type ValidationResult<T> = Result<Handle<T>, ValidationError>;

export function success<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function failure<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Thrown by `unwrap` when a validation result is a failure
 */
export class ValidationFailedError extends Error {
  override name = 'ValidationFailedError' as const;

  constructor(readonly error: ValidationError) {
    super(error.message);
    this.name = 'ValidationFailedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Return the value of a successful result
 *
 * @throws ValidationFailedError carrying the structured error otherwise
 */
export function unwrap<T>(result: Result<T, ValidationError>): T {
  if (!result.ok) {
    throw new ValidationFailedError(result.error);
  }
  return result.value;
}
