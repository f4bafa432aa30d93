/**
 * diff command - Show what `run` would change, without changing anything
 */

import type { CommandContext, CommandResult, ConfigDiff } from '../types.js';
import type { KindName } from '../coordinator/types.js';
import { runReconcile } from '../coordinator/run.js';
import { printDiff, info, verbose, header } from '../utils/output.js';
import {
  createDependencies,
  loadConfig,
  runOptions,
  type CommandDependencies,
} from './context.js';

export interface DiffResult {
  diffs: ConfigDiff[];
  /** Kinds with no config section */
  skipped: KindName[];
}

/**
 * Execute the diff command
 */
export function diffCommand(
  ctx: CommandContext,
  deps: CommandDependencies = createDependencies(ctx)
): CommandResult<DiffResult> {
  const { options: globalOpts, outputFormat } = ctx;

  verbose(`Executing diff command`, globalOpts.verbose);

  if (outputFormat === 'human') {
    header('Configuration Diff');
    info(`Comparing ${globalOpts.configDir} with the host...`);
  }

  const config = loadConfig(ctx, deps);
  const report = runReconcile(config, runOptions(ctx, deps, true), deps);

  const diffs = report.outcomes.flatMap((o) => o.changes);
  const skipped = report.outcomes.filter((o) => o.status === 'skipped').map((o) => o.kind);

  if (outputFormat === 'human') {
    printDiff(diffs, outputFormat);
    if (skipped.length > 0) {
      verbose(`Not configured: ${skipped.join(', ')}`, globalOpts.verbose);
    }
  }

  return {
    success: true,
    message: diffs.length === 0 ? 'No differences found' : `Found ${diffs.length} difference(s)`,
    data: { diffs, skipped },
  };
}
