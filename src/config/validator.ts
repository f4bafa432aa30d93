/**
 * system.yaml validation
 *
 * Turns the parsed YAML document into a typed SystemConfig, collecting an
 * issue for every field that does not fit instead of stopping at the first.
 */

import type {
  BrewConfig,
  DotfileEntry,
  DotfilesConfig,
  MacosConfig,
  MasApp,
  MasConfig,
  SystemConfig,
  VscodeConfig,
} from './types.js';
import type { ScalarValue } from '../reconcilers/defaults/types.js';
import {
  MACOS_CATALOG,
  MACOS_SECTIONS,
  findCatalogEntry,
  isMacosSection,
} from '../reconcilers/macos/catalog.js';
import {
  invalidType,
  invalidValue,
  missingRequiredField,
  unknownField,
  type ValidationIssue,
} from './errors.js';

const TOP_LEVEL_FIELDS = ['brew', 'mas', 'dotfiles', 'vscode', 'macos'] as const;

/**
 * Result of validation; `config` is set only when there are no issues
 */
export interface ConfigValidationResult {
  config?: SystemConfig;
  issues: ValidationIssue[];
}

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkFields(
  record: UnknownRecord,
  path: string,
  allowed: readonly string[],
  issues: ValidationIssue[]
): void {
  for (const key of Object.keys(record)) {
    if (!allowed.includes(key)) {
      issues.push(unknownField(path ? `${path}.${key}` : key, allowed));
    }
  }
}

function readStringList(
  value: unknown,
  path: string,
  issues: ValidationIssue[]
): string[] {
  if (!Array.isArray(value)) {
    issues.push(invalidType(path, 'a list of strings', value));
    return [];
  }

  const result: string[] = [];
  value.forEach((item, index) => {
    if (typeof item === 'string' && item.trim().length > 0) {
      result.push(item.trim());
    } else {
      issues.push(invalidType(`${path}[${index}]`, 'a non-empty string', item));
    }
  });
  return result;
}

function validateBrew(value: unknown, issues: ValidationIssue[]): BrewConfig | undefined {
  if (!isRecord(value)) {
    issues.push(invalidType('brew', 'a mapping', value));
    return undefined;
  }
  checkFields(value, 'brew', ['formulae', 'casks'], issues);

  return {
    formulae: value.formulae === undefined ? [] : readStringList(value.formulae, 'brew.formulae', issues),
    casks: value.casks === undefined ? [] : readStringList(value.casks, 'brew.casks', issues),
  };
}

function validateMasApp(value: unknown, path: string, issues: ValidationIssue[]): MasApp | undefined {
  if (!isRecord(value)) {
    issues.push(invalidType(path, 'a mapping with name and id', value));
    return undefined;
  }
  checkFields(value, path, ['name', 'id'], issues);

  const { name, id } = value;
  let valid = true;

  if (name === undefined) {
    issues.push(missingRequiredField(path, 'name'));
    valid = false;
  } else if (typeof name !== 'string') {
    issues.push(invalidType(`${path}.name`, 'a string', name));
    valid = false;
  }

  let appId: string | undefined;
  if (id === undefined) {
    issues.push(missingRequiredField(path, 'id'));
  } else if (typeof id === 'number' && Number.isSafeInteger(id) && id > 0) {
    appId = String(id);
  } else if (typeof id === 'string' && /^\d+$/.test(id.trim())) {
    appId = id.trim();
  } else {
    issues.push(invalidValue(`${path}.id`, `App Store id must be numeric, got ${JSON.stringify(id)}`, [
      'Find the id with `mas search <name>` or `mas list`',
    ]));
  }

  if (!valid || appId === undefined || typeof name !== 'string') {
    return undefined;
  }
  return { name, id: appId };
}

function validateMas(value: unknown, issues: ValidationIssue[]): MasConfig | undefined {
  if (!isRecord(value)) {
    issues.push(invalidType('mas', 'a mapping', value));
    return undefined;
  }
  checkFields(value, 'mas', ['apps'], issues);

  if (value.apps === undefined) {
    issues.push(missingRequiredField('mas', 'apps'));
    return undefined;
  }
  if (!Array.isArray(value.apps)) {
    issues.push(invalidType('mas.apps', 'a list', value.apps));
    return undefined;
  }

  const apps: MasApp[] = [];
  value.apps.forEach((item: unknown, index: number) => {
    const app = validateMasApp(item, `mas.apps[${index}]`, issues);
    if (app) apps.push(app);
  });
  return { apps };
}

function validateDotfileEntry(
  value: unknown,
  path: string,
  issues: ValidationIssue[]
): DotfileEntry | undefined {
  if (typeof value === 'string') {
    if (value.trim().length === 0) {
      issues.push(invalidValue(path, 'Dotfile path must not be empty'));
      return undefined;
    }
    return { kind: 'implicit', path: value };
  }

  if (!isRecord(value)) {
    issues.push(invalidType(path, 'a path or a mapping with original and link', value));
    return undefined;
  }
  checkFields(value, path, ['original', 'link'], issues);

  const { original, link } = value;
  if (typeof original !== 'string' || original.length === 0) {
    issues.push(original === undefined ? missingRequiredField(path, 'original') : invalidType(`${path}.original`, 'a string', original));
  }
  if (typeof link !== 'string' || link.length === 0) {
    issues.push(link === undefined ? missingRequiredField(path, 'link') : invalidType(`${path}.link`, 'a string', link));
  }

  if (typeof original !== 'string' || typeof link !== 'string' || !original || !link) {
    return undefined;
  }
  return { kind: 'explicit', original, link };
}

function validateDotfiles(value: unknown, issues: ValidationIssue[]): DotfilesConfig | undefined {
  if (!isRecord(value)) {
    issues.push(invalidType('dotfiles', 'a mapping', value));
    return undefined;
  }
  checkFields(value, 'dotfiles', ['files'], issues);

  if (value.files === undefined) {
    issues.push(missingRequiredField('dotfiles', 'files'));
    return undefined;
  }
  if (!Array.isArray(value.files)) {
    issues.push(invalidType('dotfiles.files', 'a list', value.files));
    return undefined;
  }

  const files: DotfileEntry[] = [];
  value.files.forEach((item: unknown, index: number) => {
    const entry = validateDotfileEntry(item, `dotfiles.files[${index}]`, issues);
    if (entry) files.push(entry);
  });
  return { files };
}

function validateVscode(value: unknown, issues: ValidationIssue[]): VscodeConfig | undefined {
  if (!isRecord(value)) {
    issues.push(invalidType('vscode', 'a mapping', value));
    return undefined;
  }
  checkFields(value, 'vscode', ['extensions'], issues);

  if (value.extensions === undefined) {
    issues.push(missingRequiredField('vscode', 'extensions'));
    return undefined;
  }
  return { extensions: readStringList(value.extensions, 'vscode.extensions', issues) };
}

function validateMacos(value: unknown, issues: ValidationIssue[]): MacosConfig | undefined {
  if (!isRecord(value)) {
    issues.push(invalidType('macos', 'a mapping', value));
    return undefined;
  }

  const config: MacosConfig = {};

  for (const [section, options] of Object.entries(value)) {
    if (!isMacosSection(section)) {
      issues.push(unknownField(`macos.${section}`, MACOS_SECTIONS));
      continue;
    }
    if (!isRecord(options)) {
      issues.push(invalidType(`macos.${section}`, 'a mapping', options));
      continue;
    }

    const values: Record<string, ScalarValue> = {};
    for (const [option, optionValue] of Object.entries(options)) {
      const path = `macos.${section}.${option}`;
      const entry = findCatalogEntry(section, option);
      if (!entry) {
        const known = MACOS_CATALOG.filter((e) => e.section === section).map((e) => e.option);
        issues.push(unknownField(path, known));
        continue;
      }
      if (!entry.type.isValue(optionValue)) {
        issues.push(invalidType(path, entry.type.name, optionValue));
        continue;
      }
      values[option] = optionValue;
    }
    config[section] = values;
  }

  return config;
}

/**
 * Validate a parsed system.yaml document
 */
export function validateSystemConfig(raw: unknown): ConfigValidationResult {
  const issues: ValidationIssue[] = [];

  // An empty file parses to null: nothing to reconcile
  if (raw === null || raw === undefined) {
    return { config: {}, issues };
  }

  if (!isRecord(raw)) {
    issues.push(invalidType('(root)', 'a mapping', raw));
    return { issues };
  }

  checkFields(raw, '', TOP_LEVEL_FIELDS, issues);

  const config: SystemConfig = {};
  if (raw.brew !== undefined) config.brew = validateBrew(raw.brew, issues);
  if (raw.mas !== undefined) config.mas = validateMas(raw.mas, issues);
  if (raw.dotfiles !== undefined) config.dotfiles = validateDotfiles(raw.dotfiles, issues);
  if (raw.vscode !== undefined) config.vscode = validateVscode(raw.vscode, issues);
  if (raw.macos !== undefined) config.macos = validateMacos(raw.macos, issues);

  return issues.length === 0 ? { config, issues } : { issues };
}
