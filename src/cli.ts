/**
 * hostsync CLI - Converge a macOS host to the state declared in system.yaml
 *
 * Commands:
 * - run: Install missing packages, link dotfiles, write preferences
 * - diff: Show what run would change
 */

import { Command, Option } from 'commander';
import type { GlobalOptions, CommandContext, CommandResult } from './types.js';
import { runCommand, diffCommand } from './commands/index.js';
import { printResult, error } from './utils/output.js';
import { formatError } from './errors.js';

const VERSION = '0.1.0';

type RawGlobalOptions = {
  configDir: string;
  dotfilesDir?: string;
  json?: boolean;
  verbose?: boolean;
};

/**
 * Create the command context from parsed options
 */
export function createContext(raw: RawGlobalOptions): CommandContext {
  const options: GlobalOptions = {
    configDir: raw.configDir,
    dotfilesDir: raw.dotfilesDir,
    json: raw.json ?? false,
    verbose: raw.verbose ?? false,
  };

  return {
    options,
    outputFormat: options.json ? 'json' : 'human',
  };
}

/**
 * Print a command result and map it to an exit code; thrown errors exit 1
 */
function execute<T>(ctx: CommandContext, label: string, command: () => CommandResult<T>): number {
  try {
    const result = command();
    printResult(result, ctx.outputFormat);
    return result.success ? 0 : 1;
  } catch (err) {
    if (ctx.outputFormat === 'json') {
      printResult({ success: false, message: `${label} failed`, errors: [formatError(err)] }, 'json');
    } else {
      error(`${label} failed`);
      console.error(formatError(err));
    }
    return 1;
  }
}

/**
 * Build the commander program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('hostsync')
    .description('Declarative reconciler for macOS packages, dotfiles and preferences')
    .version(VERSION)
    .addOption(
      new Option('--config-dir <dir>', 'Directory containing system.yaml')
        .env('HOSTSYNC_CONFIG_DIR')
        .default('.')
    )
    .addOption(
      new Option('--dotfiles-dir <dir>', 'Dotfiles root (default: <config-dir>/dotfiles)')
        .env('HOSTSYNC_DOTFILES_DIR')
    )
    .addOption(
      new Option('--json', 'Output JSON for CI/automation')
        .default(false)
    )
    .addOption(
      new Option('-v, --verbose', 'Enable verbose logging')
        .default(false)
    );

  /**
   * run command - Reconcile the host
   */
  program
    .command('run')
    .description('Reconcile the host against system.yaml')
    .option('--dry-run', 'Show what would happen without making changes', false)
    .action((cmdOpts: { dryRun?: boolean }) => {
      const ctx = createContext(program.opts<RawGlobalOptions>());
      process.exitCode = execute(ctx, 'Run', () => runCommand(ctx, { dryRun: cmdOpts.dryRun }));
    });

  /**
   * diff command - Show pending changes
   */
  program
    .command('diff')
    .description('Show differences between system.yaml and the host')
    .action(() => {
      const ctx = createContext(program.opts<RawGlobalOptions>());
      process.exitCode = execute(ctx, 'Diff', () => diffCommand(ctx));
    });

  return program;
}
