/**
 * BRAHMS Sync Configuration Management
 *
 * Loads configuration from .brahms-syncrc (YAML) with environment variable
 * overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (BRAHMS_SYNC_*)
 * 3. Config file (.brahms-syncrc or --config path)
 * 4. Default values
 *
 * API credentials are read separately (RBG_API_USERNAME / RBG_API_PASSWORD)
 * and never from the config file.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../../core/errors.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../../core/utils/logger.js';
import { EXPORT_ENCODINGS, isExportEncoding, type ExportEncoding } from '../../ingestion/export-reader.js';
import type { ImagePathStrategy } from '../../transformation/image-path.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  readonly plantData: string;
  readonly imageData: string;
  readonly logFile: string;
  /** Custom plant-collections column profile (JSON or YAML) */
  readonly plantSchema: string | null;
  /** Custom species-images column profile (JSON or YAML) */
  readonly imageSchema: string | null;
}

/**
 * Export file format; encodings are checked by validateConfig
 */
export interface ExportConfig {
  readonly delimiter: string;
  readonly plantEncoding: string;
  /** Tried in order on the header */
  readonly imageEncodings: readonly string[];
}

export interface ImagesConfig {
  readonly strategy: ImagePathStrategy;
  readonly drivePrefix: string | null;
  /** Default: the shared photo library under the home directory */
  readonly mountPoint: string | null;
}

export interface HttpConfig {
  /** Request timeout in milliseconds */
  readonly timeout: number;
  /** Retries for species lookups; submissions never retry */
  readonly retries: number;
}

export interface LoggingConfig {
  readonly consoleLevel: LogLevel;
  readonly fileLevel: LogLevel;
  readonly json: boolean;
}

export interface SyncConfig {
  readonly version: number;
  /** API host, e.g. redbuttegarden.org */
  readonly target: string;
  readonly ssl: boolean;
  readonly paths: PathsConfig;
  readonly export: ExportConfig;
  readonly images: ImagesConfig;
  readonly http: HttpConfig;
  readonly logging: LoggingConfig;
  readonly dryRun: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

export interface ValidExportConfig extends ExportConfig {
  readonly plantEncoding: ExportEncoding;
  readonly imageEncodings: readonly [ExportEncoding, ...ExportEncoding[]];
}

/**
 * Configuration that passed validateConfig
 */
export interface ValidSyncConfig extends SyncConfig {
  readonly export: ValidExportConfig;
}

export interface ApiCredentials {
  readonly username: string;
  readonly password: string;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<SyncConfig, 'configPath'> = {
  version: 1,
  target: 'redbuttegarden.org',
  ssl: true,

  paths: {
    plantData: 'living_plant_collections.csv',
    imageData: 'species_image_locations.csv',
    logFile: 'main.log',
    plantSchema: null,
    imageSchema: null,
  },

  export: {
    delimiter: '|',
    plantEncoding: 'utf-16le',
    imageEncodings: ['utf-8', 'utf-16le'],
  },

  images: {
    strategy: 'auto',
    drivePrefix: null,
    mountPoint: null,
  },

  http: {
    timeout: 30000,
    retries: 2,
  },

  logging: {
    consoleLevel: 'debug',
    fileLevel: 'warn',
    json: false,
  },

  dryRun: false,
};

// ============================================================================
// Config file schema (YAML)
// ============================================================================

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    target: z.string().min(1).optional(),
    ssl: z.boolean().optional(),
    paths: z
      .object({
        plant_data: z.string().min(1).optional(),
        image_data: z.string().min(1).optional(),
        log_file: z.string().min(1).optional(),
        plant_schema: z.string().min(1).optional(),
        image_schema: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    export: z
      .object({
        delimiter: z.string().optional(),
        plant_encoding: z.string().optional(),
        image_encodings: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    images: z
      .object({
        strategy: z.enum(['auto', 'direct', 'mapped-drive']).optional(),
        drive_prefix: z.string().min(1).optional(),
        mount_point: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    http: z
      .object({
        timeout: z.number().optional(),
        retries: z.number().int().optional(),
      })
      .strict()
      .optional(),
    logging: z
      .object({
        console_level: LogLevelSchema.optional(),
        file_level: LogLevelSchema.optional(),
        json: z.boolean().optional(),
      })
      .strict()
      .optional(),
    dry_run: z.boolean().optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.brahms-syncrc',
  '.brahms-syncrc.yaml',
  '.brahms-syncrc.yml',
  '.brahms-syncrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content (YAML also handles JSON)
 */
function parseConfigFile(filePath: string): ConfigFile {
  let data: unknown;
  try {
    data = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${errorMessage(error)}`);
  }

  // An empty file parses as null
  const result = ConfigFileSchema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid config file ${filePath}: ${issues}`);
  }
  return result.data;
}

/**
 * Reads BRAHMS_SYNC_* variables from an environment
 */
class EnvReader {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  get(name: string): string | undefined {
    const value = this.env[`BRAHMS_SYNC_${name}`];
    return value === '' ? undefined : value;
  }

  bool(name: string): boolean | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  }

  number(name: string): number | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    const num = Number(value);
    if (Number.isNaN(num)) {
      throw new ConfigurationError(`BRAHMS_SYNC_${name} must be a number, got "${value}"`);
    }
    return num;
  }

  list(name: string): string[] | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== '');
  }

  logLevel(name: string): LogLevel | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    if (!isLogLevel(value)) {
      throw new ConfigurationError(
        `BRAHMS_SYNC_${name} must be one of ${LOG_LEVELS.join(', ')}, got "${value}"`
      );
    }
    return value;
  }

  strategy(name: string): ImagePathStrategy | undefined {
    const value = this.get(name);
    if (value === undefined) return undefined;
    if (value !== 'auto' && value !== 'direct' && value !== 'mapped-drive') {
      throw new ConfigurationError(
        `BRAHMS_SYNC_${name} must be one of auto, direct, mapped-drive, got "${value}"`
      );
    }
    return value;
  }
}

/**
 * CLI flag overrides
 */
export interface ConfigOverrides {
  readonly target?: string;
  readonly ssl?: boolean;
  readonly plantDataPath?: string;
  readonly imageDataPath?: string;
  readonly dryRun?: boolean;
  readonly logFile?: string;
  readonly logLevel?: LogLevel;
  readonly json?: boolean;
  readonly timeout?: number;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  readonly overrides?: ConfigOverrides;
  /** Default: process.env */
  readonly env?: NodeJS.ProcessEnv;
  /** Where the config file search starts (default: process.cwd()) */
  readonly cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigurationError} If the config file is missing, unreadable or
 *   malformed, or an environment variable has an invalid value
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<SyncConfig> {
  const env = new EnvReader(options.env ?? process.env);
  const cwd = options.cwd ?? process.cwd();
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let file: ConfigFile = {};

  const explicitPath = options.configPath ?? env.get('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigurationError(`Config file not found: ${configPath}`);
    }
    file = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      file = parseConfigFile(configPath);
    }
  }

  return {
    version: file.version ?? DEFAULT_CONFIG.version,
    target: overrides.target ?? env.get('TARGET') ?? file.target ?? DEFAULT_CONFIG.target,
    ssl: overrides.ssl ?? env.bool('SSL') ?? file.ssl ?? DEFAULT_CONFIG.ssl,

    paths: {
      plantData:
        overrides.plantDataPath ??
        env.get('PLANT_DATA_PATH') ??
        file.paths?.plant_data ??
        DEFAULT_CONFIG.paths.plantData,
      imageData:
        overrides.imageDataPath ??
        env.get('IMAGE_DATA_PATH') ??
        file.paths?.image_data ??
        DEFAULT_CONFIG.paths.imageData,
      logFile:
        overrides.logFile ?? env.get('LOG_FILE') ?? file.paths?.log_file ?? DEFAULT_CONFIG.paths.logFile,
      plantSchema: env.get('PLANT_SCHEMA') ?? file.paths?.plant_schema ?? DEFAULT_CONFIG.paths.plantSchema,
      imageSchema: env.get('IMAGE_SCHEMA') ?? file.paths?.image_schema ?? DEFAULT_CONFIG.paths.imageSchema,
    },

    export: {
      delimiter: env.get('DELIMITER') ?? file.export?.delimiter ?? DEFAULT_CONFIG.export.delimiter,
      plantEncoding:
        env.get('PLANT_ENCODING') ?? file.export?.plant_encoding ?? DEFAULT_CONFIG.export.plantEncoding,
      imageEncodings:
        env.list('IMAGE_ENCODINGS') ?? file.export?.image_encodings ?? DEFAULT_CONFIG.export.imageEncodings,
    },

    images: {
      strategy:
        env.strategy('IMAGE_PATH_STRATEGY') ?? file.images?.strategy ?? DEFAULT_CONFIG.images.strategy,
      drivePrefix:
        env.get('DRIVE_PREFIX') ?? file.images?.drive_prefix ?? DEFAULT_CONFIG.images.drivePrefix,
      mountPoint: env.get('MOUNT_POINT') ?? file.images?.mount_point ?? DEFAULT_CONFIG.images.mountPoint,
    },

    http: {
      timeout: overrides.timeout ?? env.number('TIMEOUT') ?? file.http?.timeout ?? DEFAULT_CONFIG.http.timeout,
      retries: env.number('RETRIES') ?? file.http?.retries ?? DEFAULT_CONFIG.http.retries,
    },

    logging: {
      consoleLevel:
        overrides.logLevel ??
        env.logLevel('LOG_LEVEL') ??
        file.logging?.console_level ??
        DEFAULT_CONFIG.logging.consoleLevel,
      fileLevel:
        env.logLevel('FILE_LOG_LEVEL') ?? file.logging?.file_level ?? DEFAULT_CONFIG.logging.fileLevel,
      json: overrides.json ?? env.bool('JSON') ?? file.logging?.json ?? DEFAULT_CONFIG.logging.json,
    },

    dryRun: overrides.dryRun ?? env.bool('DRY_RUN') ?? file.dry_run ?? DEFAULT_CONFIG.dryRun,
    configPath,
  };
}

/**
 * Validate configuration
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: SyncConfig): asserts config is ValidSyncConfig {
  if (config.version !== 1) {
    throw new ConfigurationError(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (config.export.delimiter.length !== 1) {
    throw new ConfigurationError(
      `Delimiter must be a single character, got "${config.export.delimiter}"`
    );
  }

  if (!(config.http.timeout > 0)) {
    throw new ConfigurationError('Timeout must be a positive number');
  }

  if (!Number.isInteger(config.http.retries) || config.http.retries < 0) {
    throw new ConfigurationError('Retries must be a non-negative integer');
  }

  const encodings = [config.export.plantEncoding, ...config.export.imageEncodings];
  for (const encoding of encodings) {
    if (!isExportEncoding(encoding)) {
      throw new ConfigurationError(
        `Unsupported encoding: ${encoding}. Must be one of: ${EXPORT_ENCODINGS.join(', ')}`
      );
    }
  }

  if (config.export.imageEncodings.length === 0) {
    throw new ConfigurationError('At least one image export encoding is required');
  }
}

/**
 * Base URL of the collections API
 */
export function apiBaseUrl(config: SyncConfig): string {
  return `${config.ssl ? 'https' : 'http'}://${config.target}`;
}

/**
 * Read API credentials from the environment
 *
 * @throws {ConfigurationError} If either variable is unset or empty
 */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): ApiCredentials {
  const username = env.RBG_API_USERNAME;
  const password = env.RBG_API_PASSWORD;

  if (!username || !password) {
    throw new ConfigurationError(
      'Please set RBG_API_USERNAME and RBG_API_PASSWORD environment variables.'
    );
  }
  return { username, password };
}
