#!/usr/bin/env node
/**
 * BRAHMS Sync CLI Entry Point
 *
 * Pushes the living-collections and species-image exports to the garden
 * website API.
 *
 * @module brahms-sync-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { config as loadDotenv } from 'dotenv';

import packageJson from '../package.json' with { type: 'json' };
import { registerSyncCommands } from '../src/cli/commands/sync/index.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../src/core/utils/logger.js';

export { EXIT_CODES, type ExitCode } from '../src/cli/lib/exit-codes.js';

// ============================================================================
// Option parsers
// ============================================================================

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  return value;
}

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('Must be a positive integer (milliseconds)');
  }
  return ms;
}

// ============================================================================
// CLI Setup
// ============================================================================

function createProgram(): Command {
  const program = new Command();

  program
    .name('brahms-sync')
    .description('Sync BRAHMS plant collection and species image exports with the garden website')
    .version(packageJson.version, '-V, --version', 'Output the version number')
    .option('--target <host>', 'API host (default: redbuttegarden.org)')
    .option('--ssl', 'Use https (default)')
    .option('--no-ssl', 'Use plain http')
    .option('--plant-data-path <path>', 'Plant collections export (default: living_plant_collections.csv)')
    .option('--image-data-path <path>', 'Species image export (default: species_image_locations.csv)')
    .option('--config <path>', 'Path to config file (default: .brahms-syncrc)')
    .option('--dry-run', 'Transform rows without contacting the API')
    .option('--log-file <path>', 'Persistent log file (default: main.log)')
    .option('--log-level <level>', 'Console log level: debug|info|warn|error (default: debug)', parseLogLevel)
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--timeout <ms>', 'HTTP timeout in milliseconds (default: 30000)', parseTimeout);

  registerSyncCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  loadDotenv();

  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
