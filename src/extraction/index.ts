/**
 * Extraction Module for Policy Compiler
 */

export * from './markers.js';
export * from './requirement-extractor.js';
