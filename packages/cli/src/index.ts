/**
 * @propsweep/cli - programmatic entry points of the CLI commands
 */
export { checkCommand, runCheck, applyLevelOverrides, listChecks } from './commands/check.js';
export type { CheckOptions, CheckOutcome } from './commands/check.js';
export { exitWithError, formatError, describeError } from './utils/errorFormatter.js';
