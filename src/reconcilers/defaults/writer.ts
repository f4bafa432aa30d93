/**
 * Idempotent scalar writer for macOS `defaults`
 *
 * One read-compare-write per setting. The write runs only when the typed
 * actual value differs from the desired value, or when the key has never
 * been set. Nothing is retried.
 */

import type { ProcessExecutor } from '../../exec/executor.js';
import { formatCommand } from '../../exec/executor.js';
import { runWrite } from '../../exec/checked.js';
import { QueryFailedError } from '../../errors.js';
import type { ConfigDiff } from '../../types.js';
import type { Logger } from '../../utils/logger.js';
import { silentLogger } from '../../utils/logger.js';
import type {
  DefaultsType,
  ScalarValue,
  ScalarSetting,
  ScalarRead,
  ScalarPlan,
  ScalarWriteOutcome,
} from './types.js';

export const DEFAULTS_PROGRAM = 'defaults';

/**
 * stderr fragment `defaults read` prints for a key that was never written:
 * "The domain/default pair of (com.apple.dock, foo) does not exist"
 */
const UNSET_MARKER = 'does not exist';

/**
 * Read and parse the current value of a preference
 *
 * @throws QueryFailedError if `defaults read` fails for any reason other than
 *   a missing key
 * @throws ParseFailedError if the stored value does not match the type
 */
export function readScalar<T extends ScalarValue>(
  executor: ProcessExecutor,
  domain: string,
  key: string,
  type: DefaultsType<T>
): ScalarRead<T> {
  const args = ['read', domain, key];
  const output = executor.run(DEFAULTS_PROGRAM, args);

  if (output.exitCode !== 0) {
    if (output.stderr.includes(UNSET_MARKER)) {
      return { state: 'unset' };
    }
    throw new QueryFailedError(formatCommand(DEFAULTS_PROGRAM, args), output.exitCode, output.stderr);
  }

  return { state: 'set', value: type.parse(output.stdout.trim()) };
}

/**
 * Read the current value and decide whether a write is needed
 */
export function planScalar<T extends ScalarValue>(
  executor: ProcessExecutor,
  setting: ScalarSetting<T>
): ScalarPlan<T> {
  const actual = readScalar(executor, setting.domain, setting.key, setting.type);

  return {
    setting,
    actual,
    needsWrite: actual.state === 'unset' || actual.value !== setting.value,
  };
}

export interface ScalarWriteOptions {
  logger?: Logger;
}

/**
 * Write the desired value if the plan says it differs
 *
 * @throws WriteFailedError if `defaults write` exits non-zero
 */
export function writeScalar<T extends ScalarValue>(
  executor: ProcessExecutor,
  plan: ScalarPlan<T>,
  options: ScalarWriteOptions = {}
): ScalarWriteOutcome {
  const log = options.logger ?? silentLogger;
  const { domain, key, type, value } = plan.setting;
  const serialized = type.serialize(value);

  if (!plan.needsWrite) {
    log.info(`${domain}.${key} already set to ${serialized}`);
    return { changed: false };
  }

  log.info(`Setting ${domain}.${key} = ${serialized} (${type.typeFlag})`);
  runWrite(executor, DEFAULTS_PROGRAM, ['write', domain, key, type.typeFlag, serialized]);

  return { changed: true };
}

/**
 * Read, compare and conditionally write one setting
 *
 * @returns `changed: true` if a write occurred
 */
export function setScalar<T extends ScalarValue>(
  executor: ProcessExecutor,
  setting: ScalarSetting<T>,
  options: ScalarWriteOptions = {}
): ScalarWriteOutcome {
  return writeScalar(executor, planScalar(executor, setting), options);
}

/**
 * Display diff for a plan that needs a write
 */
export function scalarPlanToDiff<T extends ScalarValue>(plan: ScalarPlan<T>): ConfigDiff | null {
  if (!plan.needsWrite) return null;

  const { domain, key, value } = plan.setting;
  if (plan.actual.state === 'unset') {
    return { path: `${domain}.${key}`, type: 'added', desired: value };
  }

  return {
    path: `${domain}.${key}`,
    type: 'modified',
    desired: value,
    actual: plan.actual.value,
  };
}
