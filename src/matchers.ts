/**
 * Error Matchers
 * Layer: core
 *
 * Provided ports:
 *   - matchers.instanceOf
 *   - matchers.hasName
 *   - matchers.hasCode
 *   - matchers.matchesAny
 *
 * Builds the allow-list entries a poller consults before suppressing
 * an error thrown by the work function.
 */

import type { ErrorMatcher } from './types';
import { isARealObject } from './utils';

/** Any class whose instances may be thrown. */
export type ErrorClass = abstract new (...args: never[]) => object;

// -----------------------------------------------------------------------------
// Port: matchers.instanceOf
// -----------------------------------------------------------------------------

/**
 * Matches instances of `errorClass`, subclasses included.
 */
export function instanceOf(errorClass: ErrorClass): ErrorMatcher {
  return (error) => error instanceof errorClass;
}

// -----------------------------------------------------------------------------
// Port: matchers.hasName
// -----------------------------------------------------------------------------

export function hasName(name: string): ErrorMatcher {
  return (error) => isARealObject(error) && error['name'] === name;
}

// -----------------------------------------------------------------------------
// Port: matchers.hasCode
// -----------------------------------------------------------------------------

/**
 * Matches errors carrying a `code` property, e.g. Node system errors
 * such as ECONNRESET.
 */
export function hasCode(code: string | number): ErrorMatcher {
  return (error) => isARealObject(error) && error['code'] === code;
}

// -----------------------------------------------------------------------------
// Port: matchers.matchesAny
// -----------------------------------------------------------------------------

export function matchesAny(matchers: readonly ErrorMatcher[], error: unknown): boolean {
  return matchers.some((matcher) => matcher(error));
}

/**
 * Returns the kind of a thrown value for diagnostics.
 * Prefers an explicit `name`, then the constructor name, then `typeof`.
 */
export function describeErrorKind(error: unknown): string {
  if (!isARealObject(error)) {
    return error === null ? 'null' : typeof error;
  }

  const name = error['name'];
  if (typeof name === 'string' && name !== '' && name !== 'Error') {
    return name;
  }

  const ctor = error['constructor'];
  if (typeof ctor === 'function' && ctor.name !== '') {
    return ctor.name;
  }

  return typeof name === 'string' && name !== '' ? name : 'Object';
}
