/**
 * Dotfile reconciler exports
 */

export type {
  LinkState,
  LinkAction,
  ResolvedDotfile,
  LinkPlanEntry,
  DotfilesContext,
  LinkPlan,
  LinkApplyEntry,
  LinkApplyResult,
} from './types.js';

export type { EntryType, LinkFilesystem } from './fs.js';
export { nodeLinkFilesystem } from './fs.js';

export { expandHome, resolveDotfile } from './paths.js';

export type { TargetClassification } from './plan.js';
export { classifyTarget, actionForState, planDotfiles, linkPlanToDiffs } from './plan.js';

export type { LinkApplyOptions } from './apply.js';
export { applyLinkPlan, reconcileDotfiles, dotfilesKind } from './apply.js';
