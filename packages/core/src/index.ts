/**
 * @alphametic/core - Shared primitives for the alphametic solver
 *
 * - Types: puzzle words, letters, digits, outcomes
 * - Errors: the error taxonomy surfaced to callers
 * - Result: value-style error handling
 */

export * from './types.js';
export * from './errors.js';
export * from './result.js';
