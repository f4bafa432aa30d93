/**
 * run command - Reconcile the host against system.yaml
 */

import type { CommandContext, CommandResult } from '../types.js';
import type { RunReport } from '../coordinator/types.js';
import { runReconcile } from '../coordinator/run.js';
import { header, dryRunNotice, printRunReport, printDiff, verbose } from '../utils/output.js';
import {
  createDependencies,
  loadConfig,
  runOptions,
  type CommandDependencies,
} from './context.js';

export interface RunCommandOptions {
  /** Plan every kind without applying */
  dryRun?: boolean;
}

/**
 * Execute the run command
 *
 * Errors from loading or reconciling propagate to the caller.
 */
export function runCommand(
  ctx: CommandContext,
  options: RunCommandOptions = {},
  deps: CommandDependencies = createDependencies(ctx)
): CommandResult<RunReport> {
  const { options: globalOpts, outputFormat } = ctx;
  const dryRun = options.dryRun ?? false;

  verbose(`Config directory: ${globalOpts.configDir}`, globalOpts.verbose);

  const config = loadConfig(ctx, deps);
  const report = runReconcile(config, runOptions(ctx, deps, dryRun), deps);

  if (outputFormat === 'human') {
    header('Host Reconciliation');
    if (dryRun) {
      dryRunNotice();
    }
    printRunReport(report);
    if (dryRun) {
      printDiff(report.outcomes.flatMap((o) => o.changes), outputFormat);
    }
  }

  const warnings = report.outcomes.flatMap((o) => o.warnings);
  const pending = report.outcomes.reduce((n, o) => n + o.changes.length, 0);

  return {
    success: true,
    message: dryRun
      ? pending === 0
        ? 'Host already matches configuration'
        : `${pending} change(s) would be applied`
      : report.changed
        ? 'Host reconciled'
        : 'Host already matches configuration',
    data: report,
    errors: warnings.length > 0 ? warnings : undefined,
  };
}
