/**
 * Run coordinator exports
 */

export {
  KIND_ORDER,
  type KindName,
  type KindStatus,
  type KindOutcome,
  type RunReport,
  type RunOptions,
  type RunDependencies,
} from './types.js';

export { buildKind, runReconcile } from './run.js';
