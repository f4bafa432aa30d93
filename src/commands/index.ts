/**
 * Command exports
 */

export { runCommand, type RunCommandOptions } from './run.js';
export { diffCommand, type DiffResult } from './diff.js';
export { createDependencies, resolveDotfilesDir, type CommandDependencies } from './context.js';
