/**
 * Configuration for the coach overlap cross-reference
 */

import 'dotenv/config';
import { existsSync, readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { createLogger } from './utils/index.js';

const logger = createLogger('config');

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const PROJECT_ROOT = join(__dirname, '..');

// =============================================================================
// DATA PATHS
// =============================================================================
export const PROGRAM_DB_PATH =
  process.env.PROGRAM_DB_PATH || join(PROJECT_ROOT, 'data', 'program_school_years.json');
export const SCHOOL_ALIASES_PATH =
  process.env.SCHOOL_ALIASES_PATH || join(PROJECT_ROOT, 'data', 'school_aliases.json');
export const CONFIG_PATH = process.env.CONFIG_PATH || join(PROJECT_ROOT, 'config.json');

// =============================================================================
// MATCHING SETTINGS
// =============================================================================

// Seasons considered: [start, end). "present" resolves against end.
export const DEFAULT_YEAR_RANGE = {
  start: 2020,
  end: 2026,
};

export const DEFAULT_CACHE_STALENESS_DAYS = 30;

// Minimum normalized similarity for a fuzzy school-name match
export const FUZZY_MATCH_THRESHOLD = 0.85;

// =============================================================================
// CONFIG FILE
// =============================================================================

const configSchema = z.object({
  year_range: z
    .object({
      start: z.number().int().default(DEFAULT_YEAR_RANGE.start),
      end: z.number().int().default(DEFAULT_YEAR_RANGE.end),
    })
    .default({}),
  cache_staleness_days: z.number().int().positive().default(DEFAULT_CACHE_STALENESS_DAYS),
});

export type CrossReferenceConfig = z.infer<typeof configSchema>;

export function defaultConfig(): CrossReferenceConfig {
  return {
    year_range: { ...DEFAULT_YEAR_RANGE },
    cache_staleness_days: DEFAULT_CACHE_STALENESS_DAYS,
  };
}

/**
 * Load config.json, falling back to defaults when the file is absent or invalid.
 */
export function loadConfig(configPath: string = CONFIG_PATH): CrossReferenceConfig {
  if (!existsSync(configPath)) {
    logger.debug(`No config at ${configPath}, using defaults`);
    return defaultConfig();
  }

  try {
    const raw: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Invalid config at ${configPath}: ${parsed.error.message}`);
      return defaultConfig();
    }
    logger.debug(
      `Loaded config: year_range=${parsed.data.year_range.start}-${parsed.data.year_range.end}`
    );
    return parsed.data;
  } catch (error) {
    logger.warn(`Could not read config at ${configPath}: ${error}`);
    return defaultConfig();
  }
}

/**
 * Validate configuration
 */
export function validateConfig(
  config: CrossReferenceConfig
): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.year_range.end <= config.year_range.start) {
    errors.push(
      `year_range.end (${config.year_range.end}) must be after year_range.start (${config.year_range.start})`
    );
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
