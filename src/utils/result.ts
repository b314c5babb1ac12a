/**
 * @fileoverview Result type utilities for type-safe error handling.
 * Provides helper functions for creating Result values without using
 * exceptions.
 *
 * @module utils/result
 */

import type { Result } from '../types/base.js';

/**
 * Creates a successful Result containing the given value.
 *
 * @example
 * const result = ok(42);
 * // result: { ok: true, value: 42 }
 */
export function ok<T>(value: T): Result<T, never> {
    return { ok: true, value };
}

/**
 * Creates a failed Result containing the given error.
 *
 * @example
 * const result = err({ type: 'no-match', message: 'Nothing matched' });
 * // result: { ok: false, error: { type: 'no-match', ... } }
 */
export function err<E>(error: E): Result<never, E> {
    return { ok: false, error };
}

/**
 * Transforms the value of a successful Result; errors pass through.
 *
 * @example
 * const named = mapResult(updateProject(root, config, 'name', 'demo'), c => c.project.name);
 */
export function mapResult<T, U, E>(
    result: Result<T, E>,
    fn: (value: T) => U
): Result<U, E> {
    if (result.ok) {
        return ok(fn(result.value));
    }
    return result;
}
