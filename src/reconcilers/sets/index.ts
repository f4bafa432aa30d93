/**
 * Set-difference reconciler exports
 */

export type { SetReconcilerSpec, SetPlan, SetApplyResult } from './types.js';
export { findMissing, planSet, describeItem, setPlanToDiffs } from './diff.js';
export type { SetApplyOptions } from './apply.js';
export { applySetPlan, reconcileSet } from './apply.js';
