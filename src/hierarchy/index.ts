/**
 * Hierarchy Module for Policy Compiler
 *
 * Assessment model, builder, alias maintenance and the persisted document.
 */

export * from './types.js';
export * from './themes.js';
export * from './aliases.js';
export * from './hierarchy-builder.js';
export * from './assessment-document.js';
