/**
 * Types for dotfile symlink reconciliation
 */

import type { DotfileEntry } from '../../config/types.js';

/**
 * What currently exists at a link target
 */
export type LinkState =
  | 'absent'
  | 'symlink-correct'
  | 'symlink-wrong'
  | 'symlink-broken'
  | 'occupied';

/**
 * Action the apply phase takes for a link
 */
export type LinkAction = 'create' | 'replace' | 'none';

/**
 * Where a dotfile lives and where it should be linked
 */
export interface ResolvedDotfile {
  entry: DotfileEntry;
  /** Absolute path of the file under the dotfiles root */
  source: string;
  /** Absolute path of the symlink to create */
  target: string;
}

/**
 * One classified link, ready to apply
 */
export interface LinkPlanEntry extends ResolvedDotfile {
  state: LinkState;
  action: LinkAction;
  /** Raw contents of an existing symlink at the target */
  currentLink?: string;
}

/**
 * Directories used to resolve entries
 */
export interface DotfilesContext {
  /** Dotfiles root; must exist */
  dotfilesDir: string;
  /** Home directory used for implicit targets and `~/` expansion */
  home: string;
}

export interface LinkPlan {
  dotfilesDir: string;
  entries: LinkPlanEntry[];
}

/**
 * Outcome for a single link
 */
export interface LinkApplyEntry {
  source: string;
  target: string;
  state: LinkState;
  action: LinkAction;
  /** Parent directory created for this link, if any */
  createdDirectory?: string;
}

export interface LinkApplyResult {
  entries: LinkApplyEntry[];
  /** True if any directory or symlink was created or removed */
  changed: boolean;
}
