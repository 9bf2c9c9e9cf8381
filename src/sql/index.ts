/**
 * SQL Module for Policy Compiler
 *
 * Query planning, selection and compliance-summary synthesis, previews and
 * rule drafts.
 */

export * from './types.js';
export * from './dialect.js';
export * from './predicates.js';
export * from './planner.js';
export * from './synthesizer.js';
export * from './preview.js';
export * from './rule-draft.js';
