/**
 * Desired-state configuration types (system.yaml)
 */

import type { ScalarValue } from '../reconcilers/defaults/types.js';

/**
 * `[brew]` section
 */
export interface BrewConfig {
  formulae: string[];
  casks: string[];
}

/**
 * A Mac App Store application
 */
export interface MasApp {
  /** Display name (informational) */
  name: string;
  /** Numeric App Store id, kept as text */
  id: string;
}

export interface MasConfig {
  apps: MasApp[];
}

/**
 * A dotfile to link
 *
 * - implicit: `path` under the dotfiles root is linked at the same path under home
 * - explicit: `original` under the dotfiles root is linked at `link`, which may
 *   start with `~/`
 */
export type DotfileEntry =
  | { kind: 'implicit'; path: string }
  | { kind: 'explicit'; original: string; link: string };

export interface DotfilesConfig {
  files: DotfileEntry[];
}

export interface VscodeConfig {
  /** Extension ids in their published case (e.g. `rust-lang.rust-analyzer`) */
  extensions: string[];
}

/**
 * macOS preference sections
 */
export type MacosSection =
  | 'dock'
  | 'mission-control'
  | 'safari'
  | 'system'
  | 'magic-mouse'
  | 'finder';

/**
 * Option values per section, keyed by option name (e.g. `icon-size`)
 */
export type MacosConfig = Partial<Record<MacosSection, Record<string, ScalarValue>>>;

/**
 * The complete desired state; every section is optional
 */
export interface SystemConfig {
  brew?: BrewConfig;
  mas?: MasConfig;
  dotfiles?: DotfilesConfig;
  vscode?: VscodeConfig;
  macos?: MacosConfig;
}
