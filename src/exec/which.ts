/**
 * Program lookup on PATH
 */

import type { ProcessExecutor } from './executor.js';
import { PreconditionNotFoundError } from '../errors.js';

/**
 * Install hints shown when a required program is missing
 */
const INSTALL_HINTS: Record<string, string> = {
  brew: 'Install Homebrew from https://brew.sh',
  mas: 'Install the App Store CLI with `brew install mas`',
  code: 'Open VS Code and run "Shell Command: Install \'code\' command in PATH"',
  defaults: 'The defaults tool ships with macOS; run hostsync on a Mac',
};

/**
 * Locate a program on PATH
 *
 * @returns Absolute path reported by `which`
 * @throws PreconditionNotFoundError if the program is not installed
 */
export function requireProgram(executor: ProcessExecutor, program: string): string {
  const output = executor.run('which', [program]);
  const path = output.stdout.split('\n')[0]?.trim() ?? '';

  if (output.exitCode !== 0 || path.length === 0) {
    throw new PreconditionNotFoundError('program', program, INSTALL_HINTS[program]);
  }

  return path;
}
