/**
 * @fileoverview Foundational types for changekeep.
 * Zero imports - this is the base layer of the type system.
 *
 * @module types/base
 */

// ============================================================
// Result Types
// ============================================================

/**
 * Result type for operations that can fail.
 * Provides type-safe error handling without exceptions.
 *
 * @typeParam T - The success value type
 * @typeParam E - The error type (defaults to Error)
 *
 * @example
 * function parseVersion(raw: string): Result<string, string> {
 *   if (raw.length === 0) {
 *     return { ok: false, error: 'Empty version' };
 *   }
 *   return { ok: true, value: raw };
 * }
 */
export type Result<T, E = Error> =
    | { readonly ok: true; readonly value: T }
    | { readonly ok: false; readonly error: E };

/**
 * Value read from disk together with whether the file had to be rebuilt.
 * `recovered` is true when the file existed but could not be parsed.
 */
export interface Loaded<T> {
    readonly value: T;
    readonly recovered: boolean;
}

/**
 * Source of the current instant.
 */
export type Clock = () => Date;
