/**
 * Core Module for Policy Compiler
 *
 * Errors, logging, and content fingerprints.
 */

export * from './errors.js';
export * from './logging/index.js';
export * from './identity/fingerprint.js';
