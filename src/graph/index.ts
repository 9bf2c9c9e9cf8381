/**
 * Graph Module for Policy Compiler
 *
 * Control-link traversal and evidence schema collection.
 */

export * from './types.js';
export * from './traversal.js';
export * from './memory-graph.js';
export * from './source-summary.js';
