/**
 * Run coordinator
 *
 * Sequences the resource kinds. For each configured kind the required
 * programs are located, the kind is planned (reads only) and, unless this is
 * a dry run, the plan is applied. The first error aborts the run.
 */

import type { SystemConfig } from '../config/types.js';
import { requireProgram } from '../exec/which.js';
import type { ResourceKind } from '../reconcilers/kind.js';
import { brewKind } from '../reconcilers/brew/index.js';
import { masKind } from '../reconcilers/mas/index.js';
import { vscodeKind } from '../reconcilers/vscode/index.js';
import { macosKind } from '../reconcilers/macos/index.js';
import { dotfilesKind } from '../reconcilers/dotfiles/apply.js';
import { nodeLinkFilesystem } from '../reconcilers/dotfiles/fs.js';
import {
  KIND_ORDER,
  type KindName,
  type KindOutcome,
  type RunDependencies,
  type RunOptions,
  type RunReport,
} from './types.js';

/**
 * Build the resource kind for a config section, or undefined when the
 * section is absent
 */
export function buildKind(
  name: KindName,
  config: SystemConfig,
  options: RunOptions,
  deps: RunDependencies
): ResourceKind | undefined {
  const logger = deps.logger.child({ kind: name });

  switch (name) {
    case 'brew':
      return config.brew && brewKind(deps.executor, config.brew, logger);
    case 'mas':
      return config.mas && masKind(deps.executor, config.mas, logger);
    case 'dotfiles':
      return (
        config.dotfiles &&
        dotfilesKind(
          config.dotfiles.files,
          { dotfilesDir: options.dotfilesDir, home: options.home },
          logger,
          deps.fs ?? nodeLinkFilesystem
        )
      );
    case 'vscode':
      return config.vscode && vscodeKind(deps.executor, config.vscode, logger);
    case 'macos':
      return config.macos && macosKind(deps.executor, config.macos, logger);
  }
}

function reconcileKind(
  name: KindName,
  kind: ResourceKind,
  dryRun: boolean,
  deps: RunDependencies
): KindOutcome {
  for (const program of kind.programs) {
    requireProgram(deps.executor, program);
  }

  const planned = kind.plan();
  deps.logger.debug(`Planned ${name}`, { changes: planned.changes.length });

  if (dryRun) {
    return { kind: name, status: 'planned', changes: planned.changes, actions: [], warnings: [] };
  }

  const result = planned.apply();
  for (const warning of result.warnings) {
    deps.logger.warn(warning, { kind: name });
  }

  return {
    kind: name,
    status: result.changed ? 'changed' : 'unchanged',
    changes: planned.changes,
    actions: result.actions,
    warnings: result.warnings,
  };
}

/**
 * Reconcile the host against a configuration
 */
export function runReconcile(
  config: SystemConfig,
  options: RunOptions,
  deps: RunDependencies
): RunReport {
  const dryRun = options.dryRun ?? false;
  const outcomes: KindOutcome[] = [];

  for (const name of KIND_ORDER) {
    const kind = buildKind(name, config, options, deps);
    if (!kind) {
      deps.logger.debug(`Skipping ${name}: not configured`);
      outcomes.push({ kind: name, status: 'skipped', changes: [], actions: [], warnings: [] });
      continue;
    }

    const verb = dryRun ? 'Planning' : 'Reconciling';
    deps.logger.info(`${verb} ${name}`);
    try {
      outcomes.push(reconcileKind(name, kind, dryRun, deps));
    } catch (err) {
      deps.logger.error(`${verb} ${name} failed`, err instanceof Error ? err : new Error(String(err)), { kind: name });
      throw err;
    }
  }

  return {
    dryRun,
    changed: outcomes.some((o) => o.status === 'changed'),
    outcomes,
  };
}
