/**
 * Unit Tests: Set-difference reconciler
 *
 * Covers findMissing ordering and duplicates, planSet's single query, and
 * applySetPlan's in-order, fail-fast installs.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  findMissing,
  planSet,
  setPlanToDiffs,
  describeItem,
  applySetPlan,
  reconcileSet,
  type SetReconcilerSpec,
} from '../../src/reconcilers/sets/index.js';
import { WriteFailedError } from '../../src/errors.js';

// =============================================================================
// Test Fixtures
// =============================================================================

function createSpec(
  actual: string[],
  overrides: Partial<SetReconcilerSpec<string, string>> = {}
): SetReconcilerSpec<string, string> & { installed: string[] } {
  const installed: string[] = [];
  return {
    kind: 'test.items',
    identify: (item) => item,
    queryActual: () => new Set(actual),
    install: (item) => {
      installed.push(item);
    },
    installed,
    ...overrides,
  };
}

// =============================================================================
// findMissing
// =============================================================================

describe('findMissing', () => {
  it('returns desired records absent from the actual set, in desired order', () => {
    expect(findMissing(['c', 'a', 'b'], new Set(['a']), (x) => x)).toEqual(['c', 'b']);
  });

  it('keeps duplicates of a missing record', () => {
    expect(findMissing(['a', 'a', 'b'], new Set(['a']), (x) => x)).toEqual(['b']);
    expect(findMissing(['b', 'a', 'b'], new Set(['a']), (x) => x)).toEqual(['b', 'b']);
  });

  it('returns nothing when desired is empty', () => {
    expect(findMissing([], new Set(['a', 'b']), (x) => x)).toEqual([]);
  });

  it('returns everything when actual is empty', () => {
    expect(findMissing(['x', 'y'], new Set<string>(), (x) => x)).toEqual(['x', 'y']);
  });

  it('compares through the identity function', () => {
    const identify = (id: string) => id.toLowerCase();
    expect(findMissing(['Foo.Bar', 'Baz.Qux'], new Set(['foo.bar']), identify)).toEqual(['Baz.Qux']);
  });
});

// =============================================================================
// planSet
// =============================================================================

describe('planSet', () => {
  it('queries the actual set exactly once', () => {
    const queryActual = vi.fn(() => new Set(['a']));
    const spec = createSpec([], { queryActual });

    const plan = planSet(spec, ['a', 'b', 'c']);

    expect(queryActual).toHaveBeenCalledTimes(1);
    expect(plan).toEqual({ kind: 'test.items', missing: ['b', 'c'], present: ['a'] });
  });

  it('does not install anything', () => {
    const spec = createSpec([]);
    planSet(spec, ['a']);
    expect(spec.installed).toEqual([]);
  });
});

describe('setPlanToDiffs', () => {
  it('emits one added diff per missing record', () => {
    const spec = createSpec(['a']);
    const plan = planSet(spec, ['a', 'b']);

    expect(setPlanToDiffs(spec, plan)).toEqual([
      { path: 'test.items/b', type: 'added', desired: 'installed', actual: undefined },
    ]);
  });

  it('uses describe for the label when given', () => {
    const spec = createSpec([], { describe: (item) => `<${item}>` });
    expect(describeItem(spec, 'x')).toBe('<x>');
    expect(setPlanToDiffs(spec, planSet(spec, ['x']))[0]?.path).toBe('test.items/<x>');
  });
});

// =============================================================================
// applySetPlan
// =============================================================================

describe('applySetPlan', () => {
  it('installs missing records in order and reports changed', () => {
    const spec = createSpec(['b']);
    const result = applySetPlan(spec, planSet(spec, ['c', 'b', 'a']));

    expect(spec.installed).toEqual(['c', 'a']);
    expect(result).toEqual({ kind: 'test.items', installed: ['c', 'a'], changed: true });
  });

  it('attempts a duplicated missing record once per occurrence', () => {
    const spec = createSpec([]);
    applySetPlan(spec, planSet(spec, ['a', 'a']));
    expect(spec.installed).toEqual(['a', 'a']);
  });

  it('reports unchanged when nothing is missing', () => {
    const spec = createSpec(['a', 'b']);
    const result = applySetPlan(spec, planSet(spec, ['a', 'b']));

    expect(spec.installed).toEqual([]);
    expect(result.changed).toBe(false);
  });

  it('stops at the first failed install', () => {
    const attempted: string[] = [];
    const spec = createSpec([], {
      install: (item) => {
        attempted.push(item);
        if (item === 'b') throw new WriteFailedError('tool install b', 1, 'boom');
      },
    });

    expect(() => applySetPlan(spec, planSet(spec, ['a', 'b', 'c']))).toThrow(WriteFailedError);
    expect(attempted).toEqual(['a', 'b']);
  });
});

describe('reconcileSet', () => {
  it('is idempotent once installs are reflected in the actual set', () => {
    const actual = new Set<string>();
    const spec = createSpec([], {
      queryActual: () => new Set(actual),
      install: (item) => {
        actual.add(item);
      },
    });

    expect(reconcileSet(spec, ['a', 'b']).changed).toBe(true);
    const second = reconcileSet(spec, ['a', 'b']);
    expect(second.changed).toBe(false);
    expect(second.installed).toEqual([]);
  });
});
