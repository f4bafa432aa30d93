/**
 * Shared types and interfaces for the hostsync CLI
 */

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Global options available to all commands
 */
export interface GlobalOptions {
  /** Directory containing system.yaml */
  configDir: string;
  /** Directory containing the dotfiles referenced by system.yaml */
  dotfilesDir?: string;
  /** Output JSON for CI/automation */
  json: boolean;
  /** Enable verbose logging */
  verbose: boolean;
}

/**
 * Output format for command results
 */
export type OutputFormat = 'human' | 'json';

/**
 * Context passed to every command
 */
export interface CommandContext {
  /** Parsed global CLI options */
  options: GlobalOptions;
  /** Output format for results */
  outputFormat: OutputFormat;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  errors?: string[];
}

/**
 * A single difference between desired and actual host state
 */
export interface ConfigDiff {
  /** Where the difference lives, e.g. `brew.formulae/ripgrep` */
  path: string;
  type: 'added' | 'modified';
  /** Desired value */
  desired?: unknown;
  /** Actual value on the host */
  actual?: unknown;
}
