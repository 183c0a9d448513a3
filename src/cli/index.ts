/**
 * CLI utilities barrel export
 */

export * from './app.js';
export * from './flags.js';
export * from './output.js';
export * from './table.js';
export * from './errors.js';
export * from './colors.js';
export * from './env.js';
export * from './help.js';
