/**
 * Policy Compiler
 *
 * Compiles free-text governance policies into Assessments (hierarchies of
 * checkable controls) and synthesizes SQL evidence queries for a control by
 * walking its control-link graph.
 *
 * @packageDocumentation
 */

// Core module exports
export * from './core/index.js';

// Configuration
export * from './config.js';

// Requirement extraction exports
export * from './extraction/index.js';

// Hierarchy & Assessment document exports
export * from './hierarchy/index.js';

// Compliance rollup exports
export * from './compliance/index.js';

// Control graph exports
export * from './graph/index.js';

// SQL synthesis exports
export * from './sql/index.js';

// Version
export const VERSION = '0.1.0';
