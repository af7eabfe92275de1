/**
 * Schema Exports
 *
 * Central export point for wire-format schemas and their inferred types.
 */

export * from './proof.js';
export * from './receipt.js';
export * from './validation-params.js';
export { formatIssues } from './issues.js';
