/**
 * Configuration module exports
 */

export type {
  BrewConfig,
  MasApp,
  MasConfig,
  DotfileEntry,
  DotfilesConfig,
  VscodeConfig,
  MacosSection,
  MacosConfig,
  SystemConfig,
} from './types.js';

export {
  ConfigValidationError,
  unknownField,
  invalidType,
  invalidValue,
  missingRequiredField,
  type ConfigErrorCode,
  type ValidationIssue,
} from './errors.js';

export { validateSystemConfig, type ConfigValidationResult } from './validator.js';

export {
  CONFIG_FILE_NAME,
  resolveConfigPath,
  parseSystemConfig,
  loadSystemConfig,
  type ConfigLoadOptions,
} from './loader.js';
