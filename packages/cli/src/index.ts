/**
 * @adprep/cli - Command-line interface for dataset preparation
 *
 * Public API exports for the CLI package
 */

export * from './core/command-registry.js';
export * from './core/argument-parser.js';
export * from './core/output-formatter.js';
export * from './core/error-handler.js';
export * from './core/command-context.js';
export * from './core/config-loader.js';
export { createProgram } from './program.js';
export * from './types/index.js';
