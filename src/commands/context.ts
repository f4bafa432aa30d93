/**
 * Shared wiring for commands: loads system.yaml and builds the coordinator's
 * collaborators from the global options.
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import type { CommandContext } from '../types.js';
import type { SystemConfig } from '../config/types.js';
import { loadSystemConfig } from '../config/loader.js';
import { SpawnExecutor } from '../exec/executor.js';
import type { RunDependencies, RunOptions } from '../coordinator/types.js';
import { createLogger, parseLogLevel } from '../utils/logger.js';

/** Dotfiles root used when --dotfiles-dir is not given */
export const DEFAULT_DOTFILES_SUBDIR = 'dotfiles';

/**
 * Everything a command needs from the outside world
 */
export interface CommandDependencies extends RunDependencies {
  home: string;
  /** Overrides loading system.yaml from the config directory */
  loadConfig?: (configDir: string) => SystemConfig;
}

/**
 * Production dependencies: real processes, real filesystem, stderr logger
 */
export function createDependencies(ctx: CommandContext): CommandDependencies {
  const level = ctx.options.verbose
    ? 'debug'
    : parseLogLevel(process.env.HOSTSYNC_LOG_LEVEL) ?? (ctx.outputFormat === 'json' ? 'warn' : 'info');

  return {
    executor: new SpawnExecutor(),
    logger: createLogger({ level, json: process.env.HOSTSYNC_LOG_JSON === 'true', timestamps: false }),
    home: homedir(),
  };
}

/**
 * Resolve the dotfiles root: --dotfiles-dir, else `<configDir>/dotfiles`
 */
export function resolveDotfilesDir(ctx: CommandContext): string {
  const { configDir, dotfilesDir } = ctx.options;
  return resolve(dotfilesDir ?? join(configDir, DEFAULT_DOTFILES_SUBDIR));
}

export function loadConfig(ctx: CommandContext, deps: CommandDependencies): SystemConfig {
  const load = deps.loadConfig ?? loadSystemConfig;
  return load(ctx.options.configDir);
}

export function runOptions(ctx: CommandContext, deps: CommandDependencies, dryRun: boolean): RunOptions {
  return {
    dryRun,
    dotfilesDir: resolveDotfilesDir(ctx),
    home: deps.home,
  };
}
