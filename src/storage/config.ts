/**
 * Config Module
 *
 * Project-level settings read from `cohesion.config.json` in the analyzed
 * directory:
 * - Zod schema validation for configuration
 * - Loading config with defaults
 * - Generation of a documented default config file
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { getConfigPath } from '../utils/paths.js';
import { getLogger } from '../utils/logger.js';
import { SORT_KEYS } from '../engines/cohesionAnalysis.js';

// ============================================================================
// File Size Parser
// ============================================================================

/**
 * Parse a file size string to bytes
 *
 * Supports KB and MB units.
 *
 * @param size - Size string like "1MB" or "500KB"
 * @returns Size in bytes
 * @throws Error if format is invalid
 *
 * @example
 * ```typescript
 * parseFileSize('1MB')   // => 1048576
 * parseFileSize('500KB') // => 512000
 * ```
 */
export function parseFileSize(size: string): number {
  const match = size.match(/^(\d+)(KB|MB)$/i);
  if (!match) {
    throw new Error(
      `Invalid file size format: "${size}". Expected format like "1MB" or "500KB".`
    );
  }

  const value = parseInt(match[1], 10);
  const unit = match[2].toUpperCase();

  return unit === 'MB' ? value * 1024 * 1024 : value * 1024;
}

// ============================================================================
// Config Schema
// ============================================================================

const FILE_SIZE_REGEX = /^\d+(KB|MB)$/i;

/**
 * Zod schema for configuration validation
 *
 * Underscore-prefixed documentation fields are stripped before parsing.
 */
export const ConfigSchema = z
  .object({
    /** Glob patterns for files to include (default: all files) */
    include: z.array(z.string()).default(['**/*']),

    /** Glob patterns for files to exclude (in addition to hardcoded excludes) */
    exclude: z.array(z.string()).default([]),

    /** Leave test files out of the analysis */
    skipTestFiles: z.boolean().default(true),

    /** Maximum file size to analyze (e.g., "1MB", "500KB") */
    maxFileSize: z
      .string()
      .regex(FILE_SIZE_REGEX, 'Must be a valid file size like "1MB" or "500KB"')
      .default('1MB'),

    /** Files processed concurrently (default: 2 x CPU count) */
    concurrency: z.number().int().positive().optional(),

    /** Rows shown in the report table */
    top: z.number().int().positive().default(20),

    /** Report order */
    sort: z.enum(['lcom', 'wmc', 'cbo', 'dit']).default('lcom'),
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Config with documentation fields for generated config files
 */
export interface ConfigWithDocs extends Config {
  _comment?: string;
  _hardcodedExcludes?: string[];
  _availableOptions?: Record<string, string>;
}

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Config = {
  include: ['**/*'],
  exclude: [],
  skipTestFiles: true,
  maxFileSize: '1MB',
  top: 20,
  sort: 'lcom',
};

/**
 * Exclusion patterns applied to every scan
 */
export const HARDCODED_EXCLUDES: readonly string[] = [
  'node_modules/',
  '.git/',
  'dist/',
  'build/',
  'vendor/',
  'coverage/',
] as const;

// ============================================================================
// Config I/O Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strip underscore-prefixed documentation fields from an object
 */
function stripDocumentationFields(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (!key.startsWith('_')) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Load configuration for a project root
 *
 * Falls back to defaults if the file is missing, is not valid JSON, or
 * fails schema validation.
 *
 * @example
 * ```typescript
 * const config = await loadConfig('/home/dev/shapes');
 * console.log(config.maxFileSize); // "1MB"
 * ```
 */
export async function loadConfig(projectPath: string): Promise<Config> {
  const logger = getLogger();
  const configPath = getConfigPath(projectPath);

  try {
    if (!fs.existsSync(configPath)) {
      logger.debug('ConfigManager', 'No config file found, using defaults', {
        configPath,
      });
      return { ...DEFAULT_CONFIG };
    }

    const content = await fs.promises.readFile(configPath, 'utf-8');
    const rawConfig: unknown = JSON.parse(content);

    if (!isRecord(rawConfig)) {
      logger.warn('ConfigManager', 'Config is not a JSON object, using defaults', {
        configPath,
      });
      return { ...DEFAULT_CONFIG };
    }

    const result = ConfigSchema.safeParse(stripDocumentationFields(rawConfig));

    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join('; ');
      logger.warn('ConfigManager', 'Config validation failed, using defaults', {
        configPath,
        errors,
      });
      return { ...DEFAULT_CONFIG };
    }

    logger.debug('ConfigManager', 'Config loaded successfully', { configPath });
    return result.data;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn('ConfigManager', 'Failed to load config, using defaults', {
      configPath,
      error: message,
    });
    return { ...DEFAULT_CONFIG };
  }
}

export function configExists(projectPath: string): boolean {
  return fs.existsSync(getConfigPath(projectPath));
}

/**
 * Write a default config file with documentation fields
 *
 * @returns Path of the written file
 */
export async function generateDefaultConfig(projectPath: string): Promise<string> {
  const logger = getLogger();
  const configPath = getConfigPath(projectPath);

  const configWithDocs: ConfigWithDocs = {
    _comment:
      'oo-cohesion configuration file. Modify these settings to customize the analysis.',
    _hardcodedExcludes: [...HARDCODED_EXCLUDES],
    _availableOptions: {
      include: 'Array of glob patterns for files to include (default: ["**/*"])',
      exclude:
        'Array of glob patterns for additional files to exclude (merged with hardcoded excludes)',
      skipTestFiles: 'Leave test files out of the analysis (default: true)',
      maxFileSize:
        'Skip files larger than this, e.g., "1MB" or "500KB" (default: "1MB")',
      concurrency: 'Files processed concurrently (default: 2 x CPU count)',
      top: 'Rows shown in the report table (default: 20)',
      sort: `Report order, one of ${SORT_KEYS.join(', ')} (default: "lcom")`,
    },
    ...DEFAULT_CONFIG,
  };

  const json = JSON.stringify(configWithDocs, null, 2);
  await fs.promises.writeFile(configPath, json + '\n', 'utf-8');

  logger.info('ConfigManager', 'Generated default config file', { configPath });
  return configPath;
}
