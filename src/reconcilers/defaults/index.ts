/**
 * Preference (`defaults`) reconciler exports
 */

export type {
  ScalarValue,
  DefaultsTypeFlag,
  DefaultsType,
  ScalarSetting,
  ScalarRead,
  ScalarPlan,
  ScalarWriteOutcome,
} from './types.js';

export { booleanType, integerType, enumType } from './tags.js';

export type { ScalarWriteOptions } from './writer.js';
export {
  DEFAULTS_PROGRAM,
  readScalar,
  planScalar,
  writeScalar,
  setScalar,
  scalarPlanToDiff,
} from './writer.js';

export type { RestartResult } from './restart.js';
export { RestartBatch, RESTART_PROGRAM } from './restart.js';
