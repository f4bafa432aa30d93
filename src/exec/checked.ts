/**
 * Exit-status checking helpers
 *
 * Reads that exit non-zero raise QueryFailedError, writes raise
 * WriteFailedError. Neither is retried.
 */

import type { ProcessExecutor, CommandOutput, RunOptions } from './executor.js';
import { formatCommand } from './executor.js';
import { QueryFailedError, WriteFailedError } from '../errors.js';

/**
 * Run a read-only query and return its output
 *
 * @throws QueryFailedError on non-zero exit
 */
export function runQuery(
  executor: ProcessExecutor,
  program: string,
  args: readonly string[]
): CommandOutput {
  const output = executor.run(program, args);
  if (output.exitCode !== 0) {
    throw new QueryFailedError(formatCommand(program, args), output.exitCode, output.stderr);
  }
  return output;
}

/**
 * Run a mutating command
 *
 * @throws WriteFailedError on non-zero exit
 */
export function runWrite(
  executor: ProcessExecutor,
  program: string,
  args: readonly string[],
  options?: RunOptions
): CommandOutput {
  const output = executor.run(program, args, options);
  if (output.exitCode !== 0) {
    throw new WriteFailedError(formatCommand(program, args), output.exitCode, output.stderr);
  }
  return output;
}
