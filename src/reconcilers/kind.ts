/**
 * Common shape of a reconcilable resource kind
 *
 * The coordinator only sees this interface: plan() performs every read for
 * the kind, and the returned PlannedKind applies exactly that plan.
 */

import type { ConfigDiff } from '../types.js';

/**
 * Result of applying a kind's plan
 */
export interface KindApplyResult {
  /** True if any mutating action ran */
  changed: boolean;
  /** Human-readable descriptions of the actions taken */
  actions: string[];
  /** Non-fatal problems (e.g. a failed process restart) */
  warnings: string[];
}

/**
 * A fully observed kind, ready to apply
 */
export interface PlannedKind {
  /** Pending changes, empty when the host already conforms */
  changes: ConfigDiff[];
  apply(): KindApplyResult;
}

export interface ResourceKind {
  /** Config section name (`brew`, `mas`, `dotfiles`, `vscode`, `macos`) */
  name: string;
  /** Programs that must be on PATH before planning */
  programs: readonly string[];
  plan(): PlannedKind;
}
