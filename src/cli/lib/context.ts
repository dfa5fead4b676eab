/**
 * Per-invocation CLI context: resolved configuration and the logger built
 * from it.
 */

import { createLogger, type LogLevel, type Logger } from '../../core/utils/logger.js';
import { loadConfig, validateConfig, type ValidSyncConfig } from './config.js';

/**
 * Global options as parsed by commander
 */
export type GlobalOptions = {
  target?: string;
  ssl?: boolean;
  plantDataPath?: string;
  imageDataPath?: string;
  config?: string;
  dryRun?: boolean;
  logFile?: string;
  logLevel?: LogLevel;
  json?: boolean;
  timeout?: number;
};

export interface CLIContext {
  readonly config: ValidSyncConfig;
  readonly logger: Logger;
  readonly startTime: number;
}

/**
 * @throws {ConfigurationError} If configuration cannot be loaded or is invalid
 */
export async function initializeContext(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<CLIContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    env,
    overrides: {
      target: options.target,
      ssl: options.ssl,
      plantDataPath: options.plantDataPath,
      imageDataPath: options.imageDataPath,
      dryRun: options.dryRun,
      logFile: options.logFile,
      logLevel: options.logLevel,
      json: options.json,
      timeout: options.timeout,
    },
  });
  validateConfig(config);

  const logger = createLogger({
    console: { level: config.logging.consoleLevel, json: config.logging.json },
    file: { filePath: config.paths.logFile, level: config.logging.fileLevel },
  });

  return { config, logger, startTime };
}
