/**
 * VS Code extension reconciler
 *
 * Extension ids are case-sensitive when installing, but
 * `code --list-extensions` reports them lower-cased. Membership is therefore
 * tested on lower-cased ids while installs use the configured spelling.
 */

import type { ProcessExecutor } from '../../exec/executor.js';
import { outputLines } from '../../exec/executor.js';
import { runQuery, runWrite } from '../../exec/checked.js';
import type { VscodeConfig } from '../../config/types.js';
import type { Logger } from '../../utils/logger.js';
import type { SetReconcilerSpec } from '../sets/types.js';
import { planSet, setPlanToDiffs } from '../sets/diff.js';
import { applySetPlan } from '../sets/apply.js';
import type { ResourceKind, PlannedKind } from '../kind.js';

export const CODE_PROGRAM = 'code';

/**
 * Installed extension ids, lower-cased
 */
export function listInstalledExtensions(executor: ProcessExecutor): Set<string> {
  const output = runQuery(executor, CODE_PROGRAM, ['--list-extensions']);
  return new Set(outputLines(output.stdout).map((id) => id.toLowerCase()));
}

export function createExtensionSpec(executor: ProcessExecutor): SetReconcilerSpec<string, string> {
  return {
    kind: 'vscode.extensions',
    identify: (id) => id.toLowerCase(),
    queryActual: () => listInstalledExtensions(executor),
    install: (id) => {
      runWrite(executor, CODE_PROGRAM, ['--install-extension', id], { stdio: 'inherit' });
    },
    describe: (id) => id,
  };
}

/**
 * Resource kind for the `vscode` section
 */
export function vscodeKind(
  executor: ProcessExecutor,
  config: VscodeConfig,
  logger?: Logger
): ResourceKind {
  return {
    name: 'vscode',
    programs: [CODE_PROGRAM],
    plan(): PlannedKind {
      const spec = createExtensionSpec(executor);
      const plan = planSet(spec, config.extensions);

      return {
        changes: setPlanToDiffs(spec, plan),
        apply() {
          const result = applySetPlan(spec, plan, { logger });
          return {
            changed: result.changed,
            actions: result.installed.map((id) => `installed extension ${id}`),
            warnings: [],
          };
        },
      };
    },
  };
}
