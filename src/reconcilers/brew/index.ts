/**
 * Homebrew reconciler
 *
 * Formulae and casks are two independent set-difference kinds sharing the
 * `brew` program.
 */

import type { ProcessExecutor } from '../../exec/executor.js';
import { outputLines } from '../../exec/executor.js';
import { runQuery, runWrite } from '../../exec/checked.js';
import type { BrewConfig } from '../../config/types.js';
import type { Logger } from '../../utils/logger.js';
import type { SetReconcilerSpec } from '../sets/types.js';
import { planSet, setPlanToDiffs } from '../sets/diff.js';
import { applySetPlan } from '../sets/apply.js';
import type { ResourceKind, PlannedKind } from '../kind.js';

export const BREW_PROGRAM = 'brew';

/**
 * Installed top-level formulae (`brew leaves`)
 */
export function listInstalledFormulae(executor: ProcessExecutor): Set<string> {
  return new Set(outputLines(runQuery(executor, BREW_PROGRAM, ['leaves']).stdout));
}

/**
 * Installed casks (`brew list --cask`)
 */
export function listInstalledCasks(executor: ProcessExecutor): Set<string> {
  return new Set(outputLines(runQuery(executor, BREW_PROGRAM, ['list', '--cask']).stdout));
}

export function createFormulaSpec(executor: ProcessExecutor): SetReconcilerSpec<string, string> {
  return {
    kind: 'brew.formulae',
    identify: (name) => name,
    queryActual: () => listInstalledFormulae(executor),
    install: (name) => {
      runWrite(executor, BREW_PROGRAM, ['install', name], { stdio: 'inherit' });
    },
  };
}

export function createCaskSpec(executor: ProcessExecutor): SetReconcilerSpec<string, string> {
  return {
    kind: 'brew.casks',
    identify: (name) => name,
    queryActual: () => listInstalledCasks(executor),
    install: (name) => {
      runWrite(executor, BREW_PROGRAM, ['install', '--cask', name], { stdio: 'inherit' });
    },
  };
}

/**
 * Resource kind for the `brew` section
 *
 * Both listings are queried before any install runs.
 */
export function brewKind(
  executor: ProcessExecutor,
  config: BrewConfig,
  logger?: Logger
): ResourceKind {
  return {
    name: 'brew',
    programs: [BREW_PROGRAM],
    plan(): PlannedKind {
      const formulaSpec = createFormulaSpec(executor);
      const caskSpec = createCaskSpec(executor);
      const formulaPlan = planSet(formulaSpec, config.formulae);
      const caskPlan = planSet(caskSpec, config.casks);

      return {
        changes: [
          ...setPlanToDiffs(formulaSpec, formulaPlan),
          ...setPlanToDiffs(caskSpec, caskPlan),
        ],
        apply() {
          const formulae = applySetPlan(formulaSpec, formulaPlan, { logger });
          const casks = applySetPlan(caskSpec, caskPlan, { logger });
          return {
            changed: formulae.changed || casks.changed,
            actions: [
              ...formulae.installed.map((name) => `installed formula ${name}`),
              ...casks.installed.map((name) => `installed cask ${name}`),
            ],
            warnings: [],
          };
        },
      };
    },
  };
}
