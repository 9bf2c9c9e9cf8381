/**
 * Compliance Module for Policy Compiler
 */

export * from './rollup.js';
