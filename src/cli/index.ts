/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerRunCommand, registerOrderCommand, mergeConfig, EXIT_CODES } from './run.js';
