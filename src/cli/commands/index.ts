/**
 * CLI Commands index
 * Re-exports all command registration functions
 */

export { registerExtractCommand } from './extract.js';
export { registerFlowCommands } from './flows.js';
export { registerDbCommands } from './db.js';
