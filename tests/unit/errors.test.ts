/**
 * Unit Tests: Error classes and formatting
 */

import { describe, it, expect } from 'vitest';
import {
  ReconcileError,
  PreconditionNotFoundError,
  FilesystemConflictError,
  ProcessLaunchError,
  ParseFailedError,
  isReconcileError,
  formatError,
} from '../../src/errors.js';
import { ConfigValidationError, missingRequiredField } from '../../src/config/errors.js';

describe('ReconcileError subclasses', () => {
  it('are ReconcileErrors with their own codes', () => {
    const errors = [
      new PreconditionNotFoundError('source', '/d/.zshrc'),
      new FilesystemConflictError('/h/.zshrc'),
      new ProcessLaunchError('brew leaves'),
      new ParseFailedError('Unable to parse value as integer', 'x'),
    ];

    expect(errors.every(isReconcileError)).toBe(true);
    expect(errors.map((e) => e.code)).toEqual([
      'PRECONDITION_NOT_FOUND',
      'FILESYSTEM_CONFLICT',
      'PROCESS_LAUNCH_FAILED',
      'PARSE_FAILED',
    ]);
  });

  it('describe each precondition subject', () => {
    expect(new PreconditionNotFoundError('program', 'brew').message).toBe('Program not found in PATH: brew');
    expect(new PreconditionNotFoundError('source', '/d/x').message).toBe('Dotfile source not found: /d/x');
    expect(new PreconditionNotFoundError('directory', '/d').message).toBe('Directory not found: /d');
  });

  it('include the launch failure reason', () => {
    const error = new ProcessLaunchError('brew leaves', new Error('spawn brew ENOENT'));
    expect(error.message).toBe('Failed to launch: brew leaves (spawn brew ENOENT)');
  });
});

describe('formatError', () => {
  it('appends the suggestion for reconcile errors', () => {
    expect(formatError(new ReconcileError('boom', 'WRITE_FAILED', 'try again'))).toBe(
      'Error: boom\n\nSuggestion: try again'
    );
  });

  it('lists config validation issues', () => {
    const error = new ConfigValidationError('system.yaml has 1 problem', [missingRequiredField('vscode', 'extensions')]);
    expect(formatError(error)).toBe(
      [
        'Error: system.yaml has 1 problem',
        '❌ [MISSING_REQUIRED_FIELD] vscode',
        '   Missing required field: "extensions"',
        '   Suggestions:',
        '     • Add the required "extensions" field to the configuration',
      ].join('\n')
    );
  });

  it('handles plain errors and non-errors', () => {
    expect(formatError(new Error('plain'))).toBe('Error: plain');
    expect(formatError('text')).toBe('Error: text');
  });

  it('does not treat plain errors as reconcile errors', () => {
    expect(isReconcileError(new Error('plain'))).toBe(false);
  });
});
