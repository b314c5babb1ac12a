/**
 * @fileoverview Barrel file for utility functions.
 * Layer 1 - pure utility functions that import only from types/.
 *
 * @module utils
 */

// Result type helpers for type-safe error handling
export { ok, err, mapResult } from './result.js';

// strftime-style formatting for configured date and time patterns
export { formatDate, systemClock } from './time.js';
