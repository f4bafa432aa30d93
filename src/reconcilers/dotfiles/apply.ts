/**
 * Dotfile link apply logic
 *
 * Entries are applied strictly in declared order. Each target is classified
 * again when its turn comes, its parent directory created if needed, then:
 *   absent          → create link
 *   symlink-correct → nothing
 *   symlink-wrong   → remove, create
 *   symlink-broken  → remove, create
 * Any filesystem error aborts the remaining entries.
 */

import { dirname } from 'node:path';
import type { DotfileEntry } from '../../config/types.js';
import type { Logger } from '../../utils/logger.js';
import { silentLogger } from '../../utils/logger.js';
import type { ResourceKind, PlannedKind } from '../kind.js';
import type { LinkFilesystem } from './fs.js';
import { nodeLinkFilesystem } from './fs.js';
import type {
  DotfilesContext,
  LinkApplyEntry,
  LinkApplyResult,
  LinkPlan,
  LinkPlanEntry,
} from './types.js';
import { FilesystemConflictError } from '../../errors.js';
import { planDotfiles, linkPlanToDiffs, classifyTarget, actionForState } from './plan.js';

export interface LinkApplyOptions {
  logger?: Logger;
}

function applyEntry(fs: LinkFilesystem, entry: LinkPlanEntry, log: Logger): LinkApplyEntry {
  const { source, target } = entry;

  // An earlier entry may have linked the same target
  const { state } = classifyTarget(fs, target, source);
  if (state === 'occupied') {
    throw new FilesystemConflictError(target);
  }
  const action = actionForState(state);
  const result: LinkApplyEntry = { source, target, state, action };

  const parent = dirname(target);
  if (!fs.exists(parent)) {
    fs.createDirectory(parent);
    result.createdDirectory = parent;
    log.info(`Created directory: ${parent}`);
  }

  switch (action) {
    case 'none':
      log.info(`${target} already correctly linked`);
      return result;
    case 'replace':
      fs.removeSymlink(target);
      log.info(`Removed ${state === 'symlink-broken' ? 'broken' : 'incorrect'} symlink: ${target}`);
      break;
    case 'create':
      break;
  }

  fs.createSymlink(source, target);
  log.info(`Linked ${target} -> ${source}`);
  return result;
}

/**
 * Apply a link plan
 */
export function applyLinkPlan(
  fs: LinkFilesystem,
  plan: LinkPlan,
  options: LinkApplyOptions = {}
): LinkApplyResult {
  const log = options.logger ?? silentLogger;
  const entries = plan.entries.map((entry) => applyEntry(fs, entry, log));

  return {
    entries,
    changed: entries.some((e) => e.action !== 'none' || e.createdDirectory !== undefined),
  };
}

/**
 * Plan and apply in one step
 */
export function reconcileDotfiles(
  fs: LinkFilesystem,
  files: readonly DotfileEntry[],
  context: DotfilesContext,
  options: LinkApplyOptions = {}
): LinkApplyResult {
  return applyLinkPlan(fs, planDotfiles(fs, files, context), options);
}

/**
 * Resource kind for the `dotfiles` section
 */
export function dotfilesKind(
  files: readonly DotfileEntry[],
  context: DotfilesContext,
  logger?: Logger,
  fs: LinkFilesystem = nodeLinkFilesystem
): ResourceKind {
  return {
    name: 'dotfiles',
    programs: [],
    plan(): PlannedKind {
      const plan = planDotfiles(fs, files, context);
      return {
        changes: linkPlanToDiffs(plan),
        apply() {
          const result = applyLinkPlan(fs, plan, { logger });
          const actions: string[] = [];
          for (const entry of result.entries) {
            if (entry.createdDirectory) actions.push(`created directory ${entry.createdDirectory}`);
            if (entry.action === 'create') actions.push(`linked ${entry.target} -> ${entry.source}`);
            if (entry.action === 'replace') actions.push(`relinked ${entry.target} -> ${entry.source}`);
          }
          return { changed: result.changed, actions, warnings: [] };
        },
      };
    },
  };
}
