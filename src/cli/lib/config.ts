/**
 * merkle-audit CLI Configuration Management
 *
 * Loads configuration from .merkle-auditrc (YAML or JSON) with environment
 * variable overrides and sensible defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (MERKLE_AUDIT_*)
 * 3. Config file (.merkle-auditrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { DEFAULT_ALGORITHM, DEFAULT_ENCODING } from '../../core/constants.js';
import { InvalidConfigurationError } from '../../core/errors.js';
import { formatIssues } from '../../schemas/issues.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Hashing regime for commands that hash without a proof to follow
 */
export interface HashingDefaults {
  readonly algorithm: string;
  readonly encoding: string;
  readonly rawBytes: boolean;
  readonly security: boolean;
}

/**
 * Paths configuration
 */
export interface PathsConfig {
  /** Directory receipts are written to; null disables storage */
  readonly receipts: string | null;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;
  readonly hashing: HashingDefaults;
  readonly paths: PathsConfig;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().positive().optional(),
    hashing: z
      .object({
        algorithm: z.string().optional(),
        encoding: z.string().optional(),
        raw_bytes: z.boolean().optional(),
        security: z.boolean().optional(),
      })
      .optional(),
    paths: z
      .object({
        receipts: z.string().nullable().optional(),
      })
      .optional(),
  })
  .nullable();

type ConfigFile = NonNullable<z.infer<typeof ConfigFileSchema>>;

// ============================================================================
// Default Configuration
// ============================================================================

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'configPath'> = {
  version: 1,

  hashing: {
    algorithm: DEFAULT_ALGORITHM,
    encoding: DEFAULT_ENCODING,
    rawBytes: true,
    security: true,
  },

  paths: {
    receipts: null,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.merkle-auditrc',
  '.merkle-auditrc.yaml',
  '.merkle-auditrc.yml',
  '.merkle-auditrc.json',
];

/**
 * Find config file in current directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content
 */
function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    // YAML is a superset of JSON, so this also handles .json files
    raw = parseYaml(content);
  } catch (error) {
    throw new InvalidConfigurationError(`Config file ${filePath} is not valid YAML`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = ConfigFileSchema.safeParse(raw ?? null);
  if (!parsed.success) {
    throw new InvalidConfigurationError(`Config file ${filePath} is invalid`, formatIssues(parsed.error));
  }

  return parsed.data ?? {};
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  return process.env[`MERKLE_AUDIT_${name}`];
}

/**
 * Get boolean environment variable
 */
function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory the config file search starts from (default: cwd) */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    algorithm?: string;
    encoding?: string;
    security?: boolean;
    receiptsDir?: string;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @param options - Configuration loading options
 * @returns Merged configuration
 * @throws Error if an explicit config file does not exist
 * @throws InvalidConfigurationError if the config file is malformed
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new Error(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (existsSync(configPath)) {
        fileConfig = parseConfigFile(configPath);
      }
    } else {
      configPath = findConfigFile(options.cwd ?? process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const overrides = options.overrides ?? {};

  return {
    version: fileConfig.version ?? DEFAULT_CONFIG.version,

    hashing: {
      algorithm:
        overrides.algorithm ??
        getEnvVar('ALGORITHM') ??
        fileConfig.hashing?.algorithm ??
        DEFAULT_CONFIG.hashing.algorithm,
      encoding:
        overrides.encoding ??
        getEnvVar('ENCODING') ??
        fileConfig.hashing?.encoding ??
        DEFAULT_CONFIG.hashing.encoding,
      rawBytes:
        getEnvBool('RAW_BYTES') ??
        fileConfig.hashing?.raw_bytes ??
        DEFAULT_CONFIG.hashing.rawBytes,
      security:
        overrides.security ??
        getEnvBool('SECURITY') ??
        fileConfig.hashing?.security ??
        DEFAULT_CONFIG.hashing.security,
    },

    paths: {
      receipts:
        overrides.receiptsDir ??
        getEnvVar('RECEIPTS_DIR') ??
        fileConfig.paths?.receipts ??
        DEFAULT_CONFIG.paths.receipts,
    },

    // Runtime flags
    verbose: overrides.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: overrides.json ?? getEnvBool('JSON') ?? false,
    configPath,
  };
}
