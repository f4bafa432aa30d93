/**
 * Unit Tests: Idempotent scalar writer
 *
 * Type tags, read-compare-write through `defaults`, and restart batching.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  booleanType,
  integerType,
  enumType,
  readScalar,
  planScalar,
  setScalar,
  scalarPlanToDiff,
  RestartBatch,
  type ScalarSetting,
} from '../../src/reconcilers/defaults/index.js';
import { ParseFailedError, QueryFailedError, WriteFailedError } from '../../src/errors.js';
import { FakeHost } from '../fixtures/fake-host.js';

let host: FakeHost;

beforeEach(() => {
  host = new FakeHost();
});

// =============================================================================
// Type tags
// =============================================================================

describe('booleanType', () => {
  it('parses 0/1 and true/false in any case', () => {
    expect(booleanType.parse('1')).toBe(true);
    expect(booleanType.parse('0')).toBe(false);
    expect(booleanType.parse('TRUE')).toBe(true);
    expect(booleanType.parse('False\n')).toBe(false);
  });

  it('rejects anything else', () => {
    expect(() => booleanType.parse('yes')).toThrow(ParseFailedError);
  });

  it('serializes as true/false', () => {
    expect(booleanType.serialize(true)).toBe('true');
    expect(booleanType.serialize(false)).toBe('false');
  });
});

describe('integerType', () => {
  it('parses signed decimals', () => {
    expect(integerType.parse('48')).toBe(48);
    expect(integerType.parse('-3')).toBe(-3);
    expect(integerType.parse(' +7 ')).toBe(7);
  });

  it('rejects fractions and words', () => {
    expect(() => integerType.parse('4.5')).toThrow('Unable to parse value as integer: "4.5"');
    expect(() => integerType.parse('big')).toThrow(ParseFailedError);
  });

  it('rejects integers beyond the safe range', () => {
    expect(() => integerType.parse('9007199254740993')).toThrow(ParseFailedError);
    expect(integerType.isValue(1e21)).toBe(false);
    expect(integerType.isValue(Number.MAX_SAFE_INTEGER)).toBe(true);
  });

  it('accepts only integer numbers as values', () => {
    expect(integerType.isValue(3)).toBe(true);
    expect(integerType.isValue(3.5)).toBe(false);
    expect(integerType.isValue('3')).toBe(false);
  });
});

describe('enumType', () => {
  const orientation = enumType('dock orientation', ['left', 'bottom', 'right'] as const);

  it('accepts exact members', () => {
    expect(orientation.parse('left\n')).toBe('left');
    expect(orientation.typeFlag).toBe('-string');
  });

  it('rejects other tokens, including different case', () => {
    expect(() => orientation.parse('Left')).toThrow('Expected one of left, bottom, right: "Left"');
  });
});

// =============================================================================
// readScalar / planScalar
// =============================================================================

describe('readScalar', () => {
  it('returns the parsed value of a set key', () => {
    host.defaults.set('com.apple.dock tilesize', '48');
    expect(readScalar(host, 'com.apple.dock', 'tilesize', integerType)).toEqual({ state: 'set', value: 48 });
    expect(host.commandLines()).toEqual(['defaults read com.apple.dock tilesize']);
  });

  it('reports a key that was never written as unset', () => {
    expect(readScalar(host, 'com.apple.dock', 'autohide', booleanType)).toEqual({ state: 'unset' });
  });

  it('raises QueryFailedError for any other failure', () => {
    host.override('defaults read com.apple.dock autohide', { exitCode: 1, stderr: 'Permission denied' });
    expect(() => readScalar(host, 'com.apple.dock', 'autohide', booleanType)).toThrow(QueryFailedError);
  });

  it('raises ParseFailedError when the stored value has the wrong type', () => {
    host.defaults.set('com.apple.dock tilesize', 'huge');
    expect(() => readScalar(host, 'com.apple.dock', 'tilesize', integerType)).toThrow(ParseFailedError);
  });
});

describe('planScalar', () => {
  it('needs a write for an unset key', () => {
    const plan = planScalar(host, { domain: 'com.apple.dock', key: 'autohide', type: booleanType, value: false });
    expect(plan.needsWrite).toBe(true);
  });

  it('compares the parsed value, not the text', () => {
    host.defaults.set('com.apple.dock autohide', '1');
    const plan = planScalar(host, { domain: 'com.apple.dock', key: 'autohide', type: booleanType, value: true });
    expect(plan.needsWrite).toBe(false);
  });
});

// =============================================================================
// setScalar
// =============================================================================

describe('setScalar', () => {
  const autohide: ScalarSetting<boolean> = {
    domain: 'com.apple.dock',
    key: 'autohide',
    type: booleanType,
    value: true,
  };

  it('skips the write when the value already matches', () => {
    host.defaults.set('com.apple.dock autohide', '1');

    expect(setScalar(host, autohide)).toEqual({ changed: false });
    expect(host.mutations()).toEqual([]);
  });

  it('writes with the type flag when the value differs', () => {
    host.defaults.set('com.apple.dock autohide', '0');

    expect(setScalar(host, autohide)).toEqual({ changed: true });
    expect(host.mutations()).toEqual(['defaults write com.apple.dock autohide -bool true']);
  });

  it('always writes an unset key', () => {
    expect(setScalar(host, { ...autohide, value: false })).toEqual({ changed: true });
    expect(host.mutations()).toEqual(['defaults write com.apple.dock autohide -bool false']);
  });

  it('is idempotent', () => {
    setScalar(host, autohide);
    expect(setScalar(host, autohide)).toEqual({ changed: false });
    expect(host.mutations()).toHaveLength(1);
  });

  it('raises WriteFailedError when defaults write fails', () => {
    host.override('defaults write com.apple.dock autohide -bool true', { exitCode: 1 });
    expect(() => setScalar(host, autohide)).toThrow(WriteFailedError);
  });

  it('does not write when the read cannot be parsed', () => {
    host.defaults.set('com.apple.dock autohide', 'maybe');
    expect(() => setScalar(host, autohide)).toThrow(ParseFailedError);
    expect(host.mutations()).toEqual([]);
  });
});

describe('scalarPlanToDiff', () => {
  const tilesize: ScalarSetting<number> = { domain: 'com.apple.dock', key: 'tilesize', type: integerType, value: 48 };

  it('returns null when nothing differs', () => {
    host.defaults.set('com.apple.dock tilesize', '48');
    expect(scalarPlanToDiff(planScalar(host, tilesize))).toBeNull();
  });

  it('reports an unset key as added', () => {
    expect(scalarPlanToDiff(planScalar(host, tilesize))).toEqual({
      path: 'com.apple.dock.tilesize',
      type: 'added',
      desired: 48,
    });
  });

  it('reports a different value as modified', () => {
    host.defaults.set('com.apple.dock tilesize', '36');
    expect(scalarPlanToDiff(planScalar(host, tilesize))).toEqual({
      path: 'com.apple.dock.tilesize',
      type: 'modified',
      desired: 48,
      actual: 36,
    });
  });
});

// =============================================================================
// RestartBatch
// =============================================================================

describe('RestartBatch', () => {
  it('restarts a process once if any of its writes changed', () => {
    const batch = new RestartBatch();
    batch.record('Dock', false);
    batch.record('Dock', true);
    batch.record('Dock', false);
    batch.record('Finder', false);

    expect(batch.targets()).toEqual(['Dock']);
    expect(batch.flush(host)).toEqual({ restarted: ['Dock'], warnings: [] });
    expect(host.mutations()).toEqual(['killall Dock']);
  });

  it('restarts nothing when no write changed', () => {
    const batch = new RestartBatch();
    batch.record('Dock', false);

    expect(batch.flush(host)).toEqual({ restarted: [], warnings: [] });
    expect(host.commandLines()).toEqual([]);
  });

  it('restarts in the order processes were first recorded', () => {
    const batch = new RestartBatch();
    batch.record('Finder', true);
    batch.record('Dock', true);
    batch.record('Finder', true);

    batch.flush(host);
    expect(host.mutations()).toEqual(['killall Finder', 'killall Dock']);
  });

  it('turns a failed restart into a warning', () => {
    host.override('killall Safari', {
      exitCode: 1,
      stderr: 'No matching processes belonging to you were found\n',
    });
    const batch = new RestartBatch();
    batch.record('Safari', true);

    expect(batch.flush(host)).toEqual({
      restarted: [],
      warnings: ['killall Safari exited 1: No matching processes belonging to you were found'],
    });
  });

  it('refuses records after flushing', () => {
    const batch = new RestartBatch();
    batch.flush(host);
    expect(() => batch.record('Dock', true)).toThrow('Restart batch already flushed');
  });
});
