/**
 * Configuration validation error types
 *
 * Validation collects every problem in system.yaml before failing, so a
 * single run reports them all.
 */

// =============================================================================
// Error Codes
// =============================================================================

export type ConfigErrorCode =
  | 'CONFIG_NOT_FOUND'
  | 'INVALID_YAML'
  | 'UNKNOWN_FIELD'
  | 'INVALID_TYPE'
  | 'INVALID_VALUE'
  | 'MISSING_REQUIRED_FIELD';

// =============================================================================
// Validation Issue Types
// =============================================================================

/**
 * A single validation issue
 */
export interface ValidationIssue {
  /** Error code for programmatic handling */
  code: ConfigErrorCode;
  /** Human-readable error message */
  message: string;
  /** Path to the problematic field (e.g., "macos.dock.icon-size") */
  path: string;
  /** Suggestions for fixing the issue */
  suggestions?: string[];
}

// =============================================================================
// Validation Error Class
// =============================================================================

/**
 * Error thrown when system.yaml cannot be loaded or is invalid
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: ValidationIssue[]
  ) {
    super(message);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format the validation errors for display
   */
  formatErrors(): string {
    const lines: string[] = [];

    for (const issue of this.issues) {
      lines.push(`❌ [${issue.code}] ${issue.path}`);
      lines.push(`   ${issue.message}`);
      if (issue.suggestions?.length) {
        lines.push(`   Suggestions:`);
        for (const suggestion of issue.suggestions) {
          lines.push(`     • ${suggestion}`);
        }
      }
    }

    return lines.join('\n');
  }
}

// =============================================================================
// Issue Builders
// =============================================================================

export function unknownField(path: string, allowed: readonly string[]): ValidationIssue {
  return {
    code: 'UNKNOWN_FIELD',
    message: `Unknown field "${path}"`,
    path,
    suggestions: [`Expected one of: ${allowed.join(', ')}`],
  };
}

export function invalidType(path: string, expected: string, actual: unknown): ValidationIssue {
  return {
    code: 'INVALID_TYPE',
    message: `Expected ${expected}, got ${describeValue(actual)}`,
    path,
  };
}

export function invalidValue(path: string, message: string, suggestions?: string[]): ValidationIssue {
  return {
    code: 'INVALID_VALUE',
    message,
    path,
    suggestions,
  };
}

export function missingRequiredField(path: string, field: string): ValidationIssue {
  return {
    code: 'MISSING_REQUIRED_FIELD',
    message: `Missing required field: "${field}"`,
    path,
    suggestions: [`Add the required "${field}" field to the configuration`],
  };
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'string') return `string ${JSON.stringify(value)}`;
  return typeof value;
}
