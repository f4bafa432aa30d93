/**
 * Error classes for host reconciliation
 *
 * Every reconciler surfaces one of these to its caller. Nothing in the core
 * catches and continues: the first error aborts the run.
 */

import { ConfigValidationError } from './config/errors.js';

/**
 * Machine-readable error codes
 */
export type ReconcileErrorCode =
  | 'PRECONDITION_NOT_FOUND'
  | 'QUERY_FAILED'
  | 'PARSE_FAILED'
  | 'WRITE_FAILED'
  | 'FILESYSTEM_CONFLICT'
  | 'PROCESS_LAUNCH_FAILED';

/**
 * Base error class for reconciliation failures
 */
export class ReconcileError extends Error {
  constructor(
    message: string,
    public readonly code: ReconcileErrorCode,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'ReconcileError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * A required program or source file does not exist
 */
export class PreconditionNotFoundError extends ReconcileError {
  constructor(
    public readonly subject: 'program' | 'source' | 'directory',
    public readonly path: string,
    suggestion?: string
  ) {
    super(
      subject === 'program'
        ? `Program not found in PATH: ${path}`
        : `${subject === 'source' ? 'Dotfile source' : 'Directory'} not found: ${path}`,
      'PRECONDITION_NOT_FOUND',
      suggestion
    );
    this.name = 'PreconditionNotFoundError';
  }
}

/**
 * An external read command exited non-zero
 */
export class QueryFailedError extends ReconcileError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr?: string
  ) {
    const details = stderr && stderr.trim() ? `: ${stderr.trim()}` : '';
    super(`Query failed (exit ${exitCode}): ${command}${details}`, 'QUERY_FAILED');
    this.name = 'QueryFailedError';
  }
}

/**
 * Text returned by an external tool did not have the expected shape or type
 */
export class ParseFailedError extends ReconcileError {
  constructor(
    message: string,
    public readonly input: string
  ) {
    super(`${message}: ${JSON.stringify(input)}`, 'PARSE_FAILED');
    this.name = 'ParseFailedError';
  }
}

/**
 * An external write or install command exited non-zero
 */
export class WriteFailedError extends ReconcileError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    public readonly stderr?: string
  ) {
    const details = stderr && stderr.trim() ? `: ${stderr.trim()}` : '';
    super(`Command failed (exit ${exitCode}): ${command}${details}`, 'WRITE_FAILED');
    this.name = 'WriteFailedError';
  }
}

/**
 * A link target is occupied by a regular file or directory
 */
export class FilesystemConflictError extends ReconcileError {
  constructor(public readonly path: string) {
    super(
      `Link path already exists as a file or directory: ${path}`,
      'FILESYSTEM_CONFLICT',
      'Back up and remove this path manually, then run hostsync again'
    );
    this.name = 'FilesystemConflictError';
  }
}

/**
 * The operating system refused to start a program
 */
export class ProcessLaunchError extends ReconcileError {
  constructor(
    public readonly command: string,
    public readonly launchError?: Error
  ) {
    super(
      `Failed to launch: ${command}${launchError ? ` (${launchError.message})` : ''}`,
      'PROCESS_LAUNCH_FAILED'
    );
    this.name = 'ProcessLaunchError';
  }
}

/**
 * Type guard to check if an error is a ReconcileError
 */
export function isReconcileError(error: unknown): error is ReconcileError {
  return error instanceof ReconcileError;
}

/**
 * Format any error into a user-friendly message
 */
export function formatError(error: unknown): string {
  if (isReconcileError(error)) {
    return error.toUserMessage();
  }
  if (error instanceof ConfigValidationError) {
    return `Error: ${error.message}\n${error.formatErrors()}`;
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }
  return `Error: ${String(error)}`;
}
