/**
 * Run coordinator types
 */

import type { ConfigDiff } from '../types.js';
import type { ProcessExecutor } from '../exec/executor.js';
import type { LinkFilesystem } from '../reconcilers/dotfiles/fs.js';
import type { Logger } from '../utils/logger.js';

/** Resource kinds in the order they are reconciled */
export const KIND_ORDER = ['brew', 'mas', 'dotfiles', 'vscode', 'macos'] as const;

export type KindName = (typeof KIND_ORDER)[number];

/**
 * - skipped: no config section for the kind
 * - planned: dry run, changes computed but not applied
 * - unchanged: applied, host already conformed
 * - changed: applied, at least one mutating action ran
 */
export type KindStatus = 'skipped' | 'planned' | 'unchanged' | 'changed';

export interface KindOutcome {
  kind: KindName;
  status: KindStatus;
  /** Pending changes observed during planning */
  changes: ConfigDiff[];
  /** Actions taken during apply */
  actions: string[];
  warnings: string[];
}

export interface RunReport {
  dryRun: boolean;
  /** OR of every kind's changed flag */
  changed: boolean;
  outcomes: KindOutcome[];
}

export interface RunOptions {
  /** Plan only, never apply */
  dryRun?: boolean;
  /** Dotfiles root; defaults to `<configDir>/dotfiles` at the CLI */
  dotfilesDir: string;
  /** Home directory for dotfile targets */
  home: string;
}

/**
 * Collaborators injected into the coordinator
 */
export interface RunDependencies {
  executor: ProcessExecutor;
  logger: Logger;
  /** Filesystem used by the dotfiles kind */
  fs?: LinkFilesystem;
}
