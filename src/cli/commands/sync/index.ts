/**
 * Sync Commands
 *
 * Usage:
 *   brahms-sync [sync] [options]       Both exports, collections first
 *   brahms-sync collections [options]  Plant collections only
 *   brahms-sync images [options]       Species images only
 *
 * Global options (target, paths, --dry-run, logging) are defined on the
 * program and read through optsWithGlobals().
 */

import type { Command } from 'commander';
import { errorMessage } from '../../../core/errors.js';
import type { RecordKind } from '../../../core/types.js';
import { formatDuration } from '../../../core/utils/logger.js';
import { formatSummary } from '../../../sync/summary.js';
import { initializeContext, type CLIContext, type GlobalOptions } from '../../lib/context.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../../lib/exit-codes.js';
import { runSync } from './run.js';

const ALL_KINDS: readonly RecordKind[] = ['plant-collections', 'species-images'];

/**
 * Run a sync for the given exports and report the outcome
 *
 * Errors are mapped to exit codes; nothing is thrown.
 */
export async function executeSync(options: GlobalOptions, kinds: readonly RecordKind[]): Promise<ExitCode> {
  let context: CLIContext;
  try {
    context = await initializeContext(options);
  } catch (error) {
    console.error(`[ERROR] ${errorMessage(error)}`);
    return exitCodeFor(error);
  }

  const { config, logger, startTime } = context;

  try {
    const summaries = await runSync({ config, logger, kinds });

    for (const summary of summaries) {
      if (config.logging.json) {
        console.log(JSON.stringify(summary));
      } else {
        console.log(`${formatSummary(summary)} in ${formatDuration(summary.durationMs)}`);
      }
    }

    logger.info('Sync finished', { durationMs: Date.now() - startTime });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const exitCode = exitCodeFor(error);
    logger.error(errorMessage(error), {
      error: error instanceof Error ? error.name : typeof error,
      exitCode,
      durationMs: Date.now() - startTime,
    });
    if (exitCode === EXIT_CODES.CONFIG_ERROR) {
      console.error(`[ERROR] ${errorMessage(error)}`);
    }
    return exitCode;
  }
}

function registerKindCommand(
  parent: Command,
  name: string,
  description: string,
  kinds: readonly RecordKind[]
): void {
  parent
    .command(name)
    .description(description)
    .action(async (_options: unknown, command: Command) => {
      process.exitCode = await executeSync(command.optsWithGlobals<GlobalOptions>(), kinds);
    });
}

/**
 * Register sync subcommands and make `sync` the default action
 */
export function registerSyncCommands(program: Command): void {
  registerKindCommand(program, 'sync', 'Sync plant collections, then species images', ALL_KINDS);
  registerKindCommand(program, 'collections', 'Sync plant collections only', ['plant-collections']);
  registerKindCommand(program, 'images', 'Attach species images only', ['species-images']);

  program.action(async () => {
    process.exitCode = await executeSync(program.opts<GlobalOptions>(), ALL_KINDS);
  });
}
