/**
 * CLI Tools for Policy Compiler
 *
 * Provides:
 * - Assessment linter for CI/CD integration
 * - compile / lint / traverse / synthesize commands
 */

export * from './lint.js';
export * from './options.js';
export * from './commands.js';
export { createProgram, main, type ProgramIO } from './program.js';
