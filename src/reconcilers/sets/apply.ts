/**
 * Set-difference apply logic
 *
 * Installs missing records one at a time, in plan order. The first failure
 * propagates and later records are not attempted.
 */

import type { Logger } from '../../utils/logger.js';
import { silentLogger } from '../../utils/logger.js';
import type { SetReconcilerSpec, SetPlan, SetApplyResult } from './types.js';
import { describeItem, planSet } from './diff.js';

/**
 * Options for applying a set plan
 */
export interface SetApplyOptions {
  logger?: Logger;
}

/**
 * Install every missing record in the plan
 */
export function applySetPlan<TDesired, TKey>(
  spec: SetReconcilerSpec<TDesired, TKey>,
  plan: SetPlan<TDesired>,
  options: SetApplyOptions = {}
): SetApplyResult<TDesired> {
  const log = options.logger ?? silentLogger;
  const installed: TDesired[] = [];

  if (plan.missing.length === 0) {
    log.info(`All ${spec.kind} are installed`);
  }

  for (const item of plan.missing) {
    const label = describeItem(spec, item);
    log.info(`Installing ${spec.kind}: ${label}`);
    spec.install(item);
    installed.push(item);
  }

  return {
    kind: spec.kind,
    installed,
    changed: installed.length > 0,
  };
}

/**
 * Plan and apply in one step
 */
export function reconcileSet<TDesired, TKey>(
  spec: SetReconcilerSpec<TDesired, TKey>,
  desired: readonly TDesired[],
  options: SetApplyOptions = {}
): SetApplyResult<TDesired> {
  return applySetPlan(spec, planSet(spec, desired), options);
}
