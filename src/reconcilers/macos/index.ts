/**
 * macOS preferences reconciler
 *
 * Reads every configured preference first, then writes the ones that
 * differ, then restarts each affected process once.
 */

import type { ProcessExecutor } from '../../exec/executor.js';
import type { MacosConfig } from '../../config/types.js';
import type { ConfigDiff } from '../../types.js';
import type { Logger } from '../../utils/logger.js';
import { silentLogger } from '../../utils/logger.js';
import type { ScalarPlan, ScalarSetting } from '../defaults/types.js';
import { DEFAULTS_PROGRAM, planScalar, writeScalar, scalarPlanToDiff } from '../defaults/writer.js';
import { RestartBatch, RESTART_PROGRAM } from '../defaults/restart.js';
import type { ResourceKind, PlannedKind, KindApplyResult } from '../kind.js';
import { MACOS_CATALOG, type CatalogEntry } from './catalog.js';

export type { CatalogEntry } from './catalog.js';
export {
  MACOS_CATALOG,
  MACOS_SECTIONS,
  DOCK_ORIENTATIONS,
  MOUSE_BUTTON_MODES,
  findCatalogEntry,
  isMacosSection,
} from './catalog.js';

/**
 * A configured preference bound to its catalog entry
 */
export interface MacosSetting {
  entry: CatalogEntry;
  setting: ScalarSetting;
}

/**
 * Resolve configured options against the catalog, in catalog order
 *
 * @throws Error if a value does not match its catalog type (the config
 *   validator rejects these earlier)
 */
export function resolveMacosSettings(config: MacosConfig): MacosSetting[] {
  const settings: MacosSetting[] = [];

  for (const entry of MACOS_CATALOG) {
    const value = config[entry.section]?.[entry.option];
    if (value === undefined) continue;

    if (!entry.type.isValue(value)) {
      throw new Error(
        `macos.${entry.section}.${entry.option}: expected ${entry.type.name}, got ${JSON.stringify(value)}`
      );
    }

    settings.push({
      entry,
      setting: { domain: entry.domain, key: entry.key, type: entry.type, value },
    });
  }

  return settings;
}

export interface PlannedSetting {
  entry: CatalogEntry;
  plan: ScalarPlan;
}

/**
 * Write every setting that differs and restart affected processes once
 */
export function applyMacosPlan(
  executor: ProcessExecutor,
  planned: readonly PlannedSetting[],
  logger: Logger = silentLogger
): KindApplyResult {
  const batch = new RestartBatch();
  const actions: string[] = [];
  const warnings: string[] = [];

  for (const { entry, plan } of planned) {
    const { changed } = writeScalar(executor, plan, { logger });
    if (changed) {
      const { domain, key, type, value } = plan.setting;
      actions.push(`set ${domain}.${key} = ${type.serialize(value)}`);
      if (!entry.restart) {
        warnings.push(`macos.${entry.section}.${entry.option} takes effect after logging out`);
      }
    }
    if (entry.restart) {
      batch.record(entry.restart, changed);
    }
  }

  const restarts = batch.flush(executor, logger);
  actions.push(...restarts.restarted.map((name) => `restarted ${name}`));
  warnings.push(...restarts.warnings);

  return {
    changed: actions.length > 0,
    actions,
    warnings,
  };
}

/**
 * Resource kind for the `macos` section
 */
export function macosKind(
  executor: ProcessExecutor,
  config: MacosConfig,
  logger?: Logger
): ResourceKind {
  return {
    name: 'macos',
    programs: [DEFAULTS_PROGRAM, RESTART_PROGRAM],
    plan(): PlannedKind {
      const planned: PlannedSetting[] = resolveMacosSettings(config).map(({ entry, setting }) => ({
        entry,
        plan: planScalar(executor, setting),
      }));

      const changes = planned
        .map(({ plan }) => scalarPlanToDiff(plan))
        .filter((diff): diff is ConfigDiff => diff !== null);

      return {
        changes,
        apply: () => applyMacosPlan(executor, planned, logger),
      };
    },
  };
}
