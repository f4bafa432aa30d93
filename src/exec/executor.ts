/**
 * Process executor - the boundary to every external tool
 *
 * Reconcilers never call child_process directly; they receive a
 * ProcessExecutor so tests can script tool output.
 */

import { spawnSync } from 'node:child_process';
import { ProcessLaunchError } from '../errors.js';

/**
 * Captured result of one external invocation
 */
export interface CommandOutput {
  /** Captured stdout (empty when output is inherited) */
  stdout: string;
  /** Captured stderr (empty when output is inherited) */
  stderr: string;
  /** Process exit status; signals map to a non-zero status */
  exitCode: number;
}

/**
 * Options for a single invocation
 */
export interface RunOptions {
  /**
   * 'capture' collects stdout/stderr for parsing; 'inherit' streams them to
   * the terminal (used for long-running installs).
   */
  stdio?: 'capture' | 'inherit';
}

/**
 * Runs one external program at a time and waits for it to exit
 */
export interface ProcessExecutor {
  run(program: string, args: readonly string[], options?: RunOptions): CommandOutput;
}

/**
 * Render a program and its arguments for messages
 */
export function formatCommand(program: string, args: readonly string[]): string {
  return [program, ...args]
    .map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part))
    .join(' ');
}

/**
 * Executor backed by spawnSync
 */
export class SpawnExecutor implements ProcessExecutor {
  run(program: string, args: readonly string[], options: RunOptions = {}): CommandOutput {
    const inherit = options.stdio === 'inherit';
    const result = spawnSync(program, [...args], {
      encoding: 'utf-8',
      stdio: inherit ? 'inherit' : ['ignore', 'pipe', 'pipe'],
    });

    if (result.error) {
      throw new ProcessLaunchError(formatCommand(program, args), result.error);
    }

    return {
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      exitCode: result.status ?? 1,
    };
  }
}

/**
 * Split captured output into non-blank, trimmed lines
 */
export function outputLines(stdout: string): string[] {
  return stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
