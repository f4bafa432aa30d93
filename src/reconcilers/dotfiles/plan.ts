/**
 * Dotfile link classification and planning
 *
 * Planning only reads the filesystem. It fails before anything is touched
 * if the dotfiles root or any source is missing, or if any target is
 * occupied by a regular file or directory.
 */

import { dirname, resolve } from 'node:path';
import type { DotfileEntry } from '../../config/types.js';
import type { ConfigDiff } from '../../types.js';
import { FilesystemConflictError, PreconditionNotFoundError } from '../../errors.js';
import type { LinkFilesystem } from './fs.js';
import type {
  DotfilesContext,
  LinkAction,
  LinkPlan,
  LinkPlanEntry,
  LinkState,
} from './types.js';
import { resolveDotfile } from './paths.js';

/**
 * Classification of an existing target plus the raw link text, if any
 */
export interface TargetClassification {
  state: LinkState;
  currentLink?: string;
}

/**
 * Classify what exists at `target` relative to the expected `source`
 */
export function classifyTarget(
  fs: LinkFilesystem,
  target: string,
  source: string
): TargetClassification {
  const type = fs.entryType(target);

  if (type === 'absent') {
    return { state: 'absent' };
  }

  if (type !== 'symlink') {
    return { state: 'occupied' };
  }

  const currentLink = fs.readLink(target);
  const pointsAt = resolve(dirname(target), currentLink);

  if (pointsAt === source) {
    return { state: 'symlink-correct', currentLink };
  }

  if (!fs.exists(target)) {
    return { state: 'symlink-broken', currentLink };
  }

  // Same file reached through a different spelling (e.g. /var vs /private/var)
  if (fs.realPath(target) === fs.realPath(source)) {
    return { state: 'symlink-correct', currentLink };
  }

  return { state: 'symlink-wrong', currentLink };
}

/**
 * Action required to converge a classified target
 */
export function actionForState(state: LinkState): LinkAction {
  switch (state) {
    case 'absent':
      return 'create';
    case 'symlink-wrong':
    case 'symlink-broken':
      return 'replace';
    case 'symlink-correct':
      return 'none';
    case 'occupied':
      throw new Error('Occupied targets have no action');
  }
}

/**
 * Resolve, check and classify every entry
 *
 * @throws PreconditionNotFoundError if the dotfiles root or a source is missing
 * @throws FilesystemConflictError if a target is a regular file or directory
 */
export function planDotfiles(
  fs: LinkFilesystem,
  files: readonly DotfileEntry[],
  context: DotfilesContext
): LinkPlan {
  if (!fs.exists(context.dotfilesDir)) {
    throw new PreconditionNotFoundError('directory', context.dotfilesDir, 'Pass --dotfiles-dir pointing at your dotfiles checkout');
  }
  const dotfilesDir = fs.realPath(context.dotfilesDir);

  const resolved = files.map((entry) => resolveDotfile(entry, dotfilesDir, context.home));

  for (const dotfile of resolved) {
    if (!fs.exists(dotfile.source)) {
      throw new PreconditionNotFoundError('source', dotfile.source);
    }
  }

  const entries: LinkPlanEntry[] = resolved.map((dotfile) => {
    const { state, currentLink } = classifyTarget(fs, dotfile.target, dotfile.source);
    if (state === 'occupied') {
      throw new FilesystemConflictError(dotfile.target);
    }
    return { ...dotfile, state, action: actionForState(state), currentLink };
  });

  return { dotfilesDir, entries };
}

/**
 * Display diffs for links that need work
 */
export function linkPlanToDiffs(plan: LinkPlan): ConfigDiff[] {
  const diffs: ConfigDiff[] = [];

  for (const entry of plan.entries) {
    if (entry.action === 'none') continue;

    const path = `dotfiles/${entry.target}`;
    if (entry.state === 'absent') {
      diffs.push({ path, type: 'added', desired: entry.source });
    } else {
      diffs.push({
        path,
        type: 'modified',
        desired: entry.source,
        actual: entry.state === 'symlink-broken' ? `${entry.currentLink} (broken)` : entry.currentLink,
      });
    }
  }

  return diffs;
}
