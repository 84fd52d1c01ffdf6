/**
 * CLI module: thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerRunCommand, registerTemplateCommand, registerPlanCommand } from './run.js';
export { registerQuickCommand, registerVerifyCommand, registerProcessCommands } from './tools.js';
