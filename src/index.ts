/**
 * cmdkit - building blocks for command-line applications
 */

export * from './cli/index.js';
export * from './command/arguments.js';
export * from './command/command.js';
export * from './config/loader.js';
export * from './config/validator.js';
export * from './credentials/credential-manager.js';
export * from './credentials/keyring-store.js';
export * from './logging/logger.js';
export * from './model/model.js';
export * from './update/update-checker.js';
export * from './update/version.js';
