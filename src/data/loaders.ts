/**
 * Data Loaders
 *
 * Reads the program database, alias table and coach files from disk.
 * Program and alias files are required: any failure raises DataLoadError.
 * Coach files are loaded one at a time so the batch can skip bad ones.
 */

import { readFileSync } from 'fs';
import { basename } from 'path';
import { z } from 'zod';
import { cleanSchoolName, createLogger } from '../utils/index.js';
import type {
  AliasTable,
  CoachRecord,
  CoachSource,
  ProgramYearDatabase,
} from '../types/index.js';
import type { TargetSchool } from '../analysis/alias-coverage.js';

const logger = createLogger('loader');

// =============================================================================
// ERRORS
// =============================================================================

export class DataLoadError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${message}: ${path}`, options);
    this.name = 'DataLoadError';
    this.path = path;
  }
}

// =============================================================================
// SCHEMAS
// =============================================================================

const academicYearSchema = z.string().regex(/^\d{4}-\d{4}$/, 'expected "YYYY-YYYY"');

const programDbSchema = z.record(z.string(), z.array(academicYearSchema));

const aliasListSchema = z.array(z.string());

// Scraped coach data carries nulls and stray numbers; a bad field reads as absent
const lenientString = z.string().optional().catch(undefined);

const careerStintSchema = z
  .object({
    school: lenientString,
    position: lenientString,
    years: lenientString,
    source_url: lenientString,
  })
  .passthrough();

// Entries that are not objects are dropped one at a time
const careerHistorySchema = z
  .array(z.unknown())
  .optional()
  .catch(undefined)
  .transform(entries =>
    entries?.flatMap(entry => {
      const stint = careerStintSchema.safeParse(entry);
      return stint.success ? [stint.data] : [];
    })
  );

const coachRecordSchema = z
  .object({
    name: lenientString,
    current_position: lenientString,
    current_school: lenientString,
    research_status: lenientString,
    career_history: careerHistorySchema,
  })
  .passthrough();

const coachFileSchema = z.union([z.array(z.unknown()), coachRecordSchema]);

// =============================================================================
// JSON
// =============================================================================

/**
 * Read and parse a JSON file. Missing, unreadable or malformed files raise
 * DataLoadError with the underlying error as cause.
 */
export function loadJsonFile(filePath: string): unknown {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new DataLoadError(filePath, 'Could not read file', { cause: error });
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DataLoadError(filePath, 'Invalid JSON', { cause: error });
  }
}

/**
 * Top-level JSON object minus "_"-prefixed keys ("_comment", "_source", ...)
 */
function withoutReservedKeys(filePath: string, raw: unknown): Record<string, unknown> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new DataLoadError(filePath, 'Expected a JSON object');
  }
  return Object.fromEntries(Object.entries(raw).filter(([key]) => !key.startsWith('_')));
}

// =============================================================================
// PROGRAM DATABASE
// =============================================================================

/**
 * Load the program database with canonical (uppercase) keys.
 * Keys that collapse to the same canonical name have their years merged.
 */
export function loadProgramDatabase(filePath: string): ProgramYearDatabase {
  const parsed = programDbSchema.safeParse(withoutReservedKeys(filePath, loadJsonFile(filePath)));
  if (!parsed.success) {
    throw new DataLoadError(filePath, `Invalid program database (${parsed.error.message})`);
  }
  return canonicalizeProgramDatabase(parsed.data);
}

export function canonicalizeProgramDatabase(
  raw: Record<string, string[]>
): ProgramYearDatabase {
  const db: ProgramYearDatabase = {};

  for (const [school, years] of Object.entries(raw)) {
    const canonical = cleanSchoolName(school);
    const existing = db[canonical];

    if (existing) {
      logger.warn(`Program database has duplicate entries for ${canonical}, merging years`);
      db[canonical] = [...new Set([...existing, ...years])].sort();
    } else {
      db[canonical] = [...years];
    }
  }

  return db;
}

// =============================================================================
// ALIAS TABLE
// =============================================================================

/**
 * Load the alias table. Keys starting with "_" (e.g. "_comment") are ignored.
 */
export function loadAliasTable(filePath: string): AliasTable {
  const raw = withoutReservedKeys(filePath, loadJsonFile(filePath));

  const table: AliasTable = {};
  for (const [canonical, value] of Object.entries(raw)) {
    const aliases = aliasListSchema.safeParse(value);
    if (!aliases.success) {
      throw new DataLoadError(filePath, `Aliases for "${canonical}" must be a list of strings`);
    }
    table[canonical] = aliases.data;
  }

  return table;
}

// =============================================================================
// COACH FILES
// =============================================================================

/**
 * Load one coach file as a single record or a combined roster.
 * Raises DataLoadError on unreadable, malformed or mis-shaped files. Inside a
 * readable file, bad fields and entries are dropped rather than the file.
 */
export function loadCoachSource(filePath: string): CoachSource {
  const parsed = coachFileSchema.safeParse(loadJsonFile(filePath));
  if (!parsed.success) {
    throw new DataLoadError(filePath, `Not a coach record or list of coach records (${parsed.error.message})`);
  }

  const file = basename(filePath);
  if (Array.isArray(parsed.data)) {
    const coaches: CoachRecord[] = [];
    parsed.data.forEach((entry, i) => {
      const coach = coachRecordSchema.safeParse(entry);
      if (coach.success) {
        coaches.push(coach.data);
      } else {
        logger.warn(`${file}: skipping entry ${i}, not a coach record`);
      }
    });
    return { kind: 'combined', file, coaches };
  }
  return { kind: 'single', file, coach: parsed.data };
}

export function coachesFromSource(source: CoachSource): CoachRecord[] {
  switch (source.kind) {
    case 'single':
      return [source.coach];
    case 'combined':
      return source.coaches;
  }
}

// =============================================================================
// TARGET SCHOOL LISTS
// =============================================================================

const targetSchoolsSchema = z.object({
  schools: z.array(
    z.object({
      name: z.string().default(''),
      canonical: z.string().default(''),
    })
  ).default([]),
});

/**
 * Load a target school list: {"schools": [{"name", "canonical"}, ...]}
 */
export function loadTargetSchools(filePath: string): TargetSchool[] {
  const parsed = targetSchoolsSchema.safeParse(loadJsonFile(filePath));
  if (!parsed.success) {
    throw new DataLoadError(filePath, `Invalid target school list (${parsed.error.message})`);
  }
  return parsed.data.schools;
}
