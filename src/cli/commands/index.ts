/**
 * CLI commands index
 * Exports all command creators
 */

export { createRecoverCommand } from './recover.js';
export { createInspectCommand } from './inspect.js';
export { createConfigCommand } from './config.js';
