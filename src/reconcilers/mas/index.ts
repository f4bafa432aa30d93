/**
 * Mac App Store reconciler
 *
 * Apps are identified by their numeric id; the configured name is only used
 * for display.
 */

import type { ProcessExecutor } from '../../exec/executor.js';
import { runQuery, runWrite } from '../../exec/checked.js';
import type { MasApp, MasConfig } from '../../config/types.js';
import type { Logger } from '../../utils/logger.js';
import type { SetReconcilerSpec } from '../sets/types.js';
import { planSet, setPlanToDiffs } from '../sets/diff.js';
import { applySetPlan } from '../sets/apply.js';
import type { ResourceKind, PlannedKind } from '../kind.js';
import { parseMasList, type MasListRecord } from './parse.js';

export type { MasListRecord } from './parse.js';
export { parseMasList, parseMasListLine } from './parse.js';

export const MAS_PROGRAM = 'mas';

/**
 * Installed apps (`mas list`)
 *
 * @throws ParseFailedError if any line is malformed
 */
export function listInstalledApps(executor: ProcessExecutor): MasListRecord[] {
  return parseMasList(runQuery(executor, MAS_PROGRAM, ['list']).stdout);
}

export function createMasAppSpec(executor: ProcessExecutor): SetReconcilerSpec<MasApp, string> {
  return {
    kind: 'mas.apps',
    identify: (app) => app.id,
    queryActual: () => new Set(listInstalledApps(executor).map((record) => record.id)),
    install: (app) => {
      runWrite(executor, MAS_PROGRAM, ['install', app.id], { stdio: 'inherit' });
    },
    describe: (app) => `${app.name} (${app.id})`,
  };
}

/**
 * Resource kind for the `mas` section
 */
export function masKind(
  executor: ProcessExecutor,
  config: MasConfig,
  logger?: Logger
): ResourceKind {
  return {
    name: 'mas',
    programs: [MAS_PROGRAM],
    plan(): PlannedKind {
      const spec = createMasAppSpec(executor);
      const plan = planSet(spec, config.apps);

      return {
        changes: setPlanToDiffs(spec, plan),
        apply() {
          const result = applySetPlan(spec, plan, { logger });
          return {
            changed: result.changed,
            actions: result.installed.map((app) => `installed app ${app.name} (${app.id})`),
            warnings: [],
          };
        },
      };
    },
  };
}
