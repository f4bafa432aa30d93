/**
 * Process execution exports
 */

export type { CommandOutput, RunOptions, ProcessExecutor } from './executor.js';
export { SpawnExecutor, formatCommand, outputLines } from './executor.js';
export { requireProgram } from './which.js';
export { runQuery, runWrite } from './checked.js';
