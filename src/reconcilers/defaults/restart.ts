/**
 * Batched restarts of processes that cache preference values
 *
 * Several settings can belong to one process (Dock reads orientation,
 * autohide, tile size and Mission Control keys). The process is killed once,
 * after every write for it has been recorded, and only if one of them
 * changed something. macOS relaunches it with the new values.
 */

import type { ProcessExecutor } from '../../exec/executor.js';
import { formatCommand } from '../../exec/executor.js';
import type { Logger } from '../../utils/logger.js';
import { silentLogger } from '../../utils/logger.js';

export const RESTART_PROGRAM = 'killall';

/**
 * Result of flushing a batch
 */
export interface RestartResult {
  /** Processes restarted, in the order they were first recorded */
  restarted: string[];
  /** Restart failures; surfaced to the caller, not retried */
  warnings: string[];
}

export class RestartBatch {
  private readonly pending = new Map<string, boolean>();
  private flushed = false;

  /**
   * Record the outcome of one write belonging to `processName`
   */
  record(processName: string, changed: boolean): void {
    if (this.flushed) {
      throw new Error(`Restart batch already flushed; cannot record ${processName}`);
    }
    this.pending.set(processName, (this.pending.get(processName) ?? false) || changed);
  }

  /**
   * Processes that will be restarted on flush
   */
  targets(): string[] {
    return Array.from(this.pending.entries())
      .filter(([, changed]) => changed)
      .map(([name]) => name);
  }

  /**
   * Restart every process with at least one changed write
   */
  flush(executor: ProcessExecutor, logger: Logger = silentLogger): RestartResult {
    this.flushed = true;
    const restarted: string[] = [];
    const warnings: string[] = [];

    for (const name of this.targets()) {
      logger.info(`Restarting ${name} to apply changes...`);
      const output = executor.run(RESTART_PROGRAM, [name]);
      if (output.exitCode === 0) {
        restarted.push(name);
      } else {
        const message = `${formatCommand(RESTART_PROGRAM, [name])} exited ${output.exitCode}${
          output.stderr.trim() ? `: ${output.stderr.trim()}` : ''
        }`;
        logger.warn(`Restart failed: ${message}`);
        warnings.push(message);
      }
    }

    return { restarted, warnings };
  }
}
