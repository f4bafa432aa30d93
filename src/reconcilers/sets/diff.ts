/**
 * Set-difference diff algorithm
 *
 * Compares desired records with the installed identity set. Pure apart from
 * the single actual-state query in planSet.
 */

import type { ConfigDiff } from '../../types.js';
import type { SetReconcilerSpec, SetPlan } from './types.js';

/**
 * Desired records whose identity is not in the actual set
 *
 * Order follows `desired`; duplicates are kept, so a record declared twice
 * is attempted twice.
 */
export function findMissing<TDesired, TKey>(
  desired: readonly TDesired[],
  actual: ReadonlySet<TKey>,
  identify: (item: TDesired) => TKey
): TDesired[] {
  return desired.filter((item) => !actual.has(identify(item)));
}

/**
 * Query the live system once and split desired records into missing/present
 */
export function planSet<TDesired, TKey>(
  spec: SetReconcilerSpec<TDesired, TKey>,
  desired: readonly TDesired[]
): SetPlan<TDesired> {
  const actual = spec.queryActual();
  const identify = (item: TDesired): TKey => spec.identify(item);

  return {
    kind: spec.kind,
    missing: findMissing(desired, actual, identify),
    present: desired.filter((item) => actual.has(identify(item))),
  };
}

/**
 * Describe a record for display
 */
export function describeItem<TDesired, TKey>(
  spec: SetReconcilerSpec<TDesired, TKey>,
  item: TDesired
): string {
  return spec.describe ? spec.describe(item) : String(spec.identify(item));
}

/**
 * Convert a plan into display diffs (one `added` entry per missing record)
 */
export function setPlanToDiffs<TDesired, TKey>(
  spec: SetReconcilerSpec<TDesired, TKey>,
  plan: SetPlan<TDesired>
): ConfigDiff[] {
  return plan.missing.map((item): ConfigDiff => ({
    path: `${plan.kind}/${describeItem(spec, item)}`,
    type: 'added',
    desired: 'installed',
    actual: undefined,
  }));
}
