/**
 * system.yaml loading
 *
 * Reads `<configDir>/system.yaml`, parses it with `yaml` and validates the
 * result into a SystemConfig.
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { SystemConfig } from './types.js';
import { ConfigValidationError } from './errors.js';
import { validateSystemConfig } from './validator.js';

/** Name of the desired-state file inside the config directory */
export const CONFIG_FILE_NAME = 'system.yaml';

export interface ConfigLoadOptions {
  /** Base for a relative config directory (defaults to cwd) */
  basePath?: string;
}

/**
 * Resolve the absolute path of system.yaml for a config directory
 */
export function resolveConfigPath(configDir: string, options: ConfigLoadOptions = {}): string {
  const dir = isAbsolute(configDir) ? configDir : resolve(options.basePath ?? process.cwd(), configDir);
  return join(dir, CONFIG_FILE_NAME);
}

/**
 * Parse and validate system.yaml content
 *
 * @throws ConfigValidationError on a YAML syntax error or invalid fields
 */
export function parseSystemConfig(content: string, source = CONFIG_FILE_NAME): SystemConfig {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigValidationError(`Failed to parse ${source}`, [
      { code: 'INVALID_YAML', message, path: source },
    ]);
  }

  const { config, issues } = validateSystemConfig(raw);
  if (!config) {
    throw new ConfigValidationError(
      `${source} has ${issues.length} ${issues.length === 1 ? 'problem' : 'problems'}`,
      issues
    );
  }
  return config;
}

/**
 * Load system.yaml from a config directory
 *
 * @throws ConfigValidationError when the file is missing or invalid
 */
export function loadSystemConfig(configDir: string, options: ConfigLoadOptions = {}): SystemConfig {
  const configPath = resolveConfigPath(configDir, options);

  if (!existsSync(configPath)) {
    throw new ConfigValidationError(`Configuration not found: ${configPath}`, [
      {
        code: 'CONFIG_NOT_FOUND',
        message: `No ${CONFIG_FILE_NAME} in ${configDir}`,
        path: configPath,
        suggestions: [
          'Pass --config-dir or set HOSTSYNC_CONFIG_DIR',
          'Start from config/system.example.yaml',
        ],
      },
    ]);
  }

  return parseSystemConfig(readFileSync(configPath, 'utf-8'), configPath);
}
