/**
 * Batch Cross-Reference
 *
 * Runs every coach file in a directory through the overlap engine.
 * The program database and alias table must load; individual coach files
 * that fail are logged and skipped.
 */

import { readdirSync } from 'fs';
import { join } from 'path';
import { loadConfig } from '../config.js';
import { coachesFromSource, loadCoachSource, loadProgramDatabase, loadAliasTable } from '../data/loaders.js';
import { SchoolNormalizer } from '../normalize/school-normalizer.js';
import { createLogger, describeError } from '../utils/index.js';
import { validateCoachData } from '../analysis/validation.js';
import { crossReferenceCoach } from './engine.js';
import type { CoachSource, CrossReferenceResult } from '../types/index.js';

const logger = createLogger('batch');

export interface BatchPaths {
  coachesDir: string;
  programDbPath: string;
  aliasesPath: string;
  configPath?: string;
}

/**
 * List *.json files in a directory, sorted for a stable processing order.
 * A missing directory yields no files.
 */
export function listCoachFiles(coachesDir: string): string[] {
  try {
    return readdirSync(coachesDir)
      .filter(file => file.endsWith('.json'))
      .sort();
  } catch (error) {
    logger.warn(`Could not list coach files in ${coachesDir}: ${describeError(error)}`);
    return [];
  }
}

/**
 * Load every readable coach file. Failures are logged and dropped.
 */
export function loadCoachSources(coachesDir: string): CoachSource[] {
  const sources: CoachSource[] = [];

  for (const file of listCoachFiles(coachesDir)) {
    try {
      sources.push(loadCoachSource(join(coachesDir, file)));
    } catch (error) {
      logger.warn(`Error processing ${file}: ${describeError(error)}`);
    }
  }

  return sources;
}

export function crossReferenceAllCoaches(paths: BatchPaths): CrossReferenceResult[] {
  const { coachesDir, programDbPath, aliasesPath, configPath } = paths;

  logger.info(`Loading program database from ${programDbPath}`);
  const programDb = loadProgramDatabase(programDbPath);
  logger.info(`Program database contains ${Object.keys(programDb).length} schools`);

  const config = loadConfig(configPath);
  const normalizer = new SchoolNormalizer(programDb, loadAliasTable(aliasesPath));
  logger.info(`Loaded ${normalizer.aliasCount} school aliases`);

  const sources = loadCoachSources(coachesDir);
  logger.info(`Processing ${sources.length} coach files from ${coachesDir}`);

  const results: CrossReferenceResult[] = [];
  let overlapsFound = 0;

  for (const source of sources) {
    const coaches = coachesFromSource(source);
    if (source.kind === 'combined') {
      logger.debug(`Processing combined file ${source.file} with ${coaches.length} coaches`);
    }

    for (const coach of coaches) {
      const { warnings, errors } = validateCoachData(coach);
      for (const issue of [...errors, ...warnings]) {
        logger.debug(`${source.file} (${coach.name ?? 'unnamed'}): ${issue}`);
      }

      const result = crossReferenceCoach(coach, programDb, normalizer, config);
      results.push(result);

      if (result.has_overlap) {
        overlapsFound++;
        logger.debug(`  Found ${result.overlap_count} overlap(s) for ${result.coach_name}`);
      }
    }
  }

  logger.info(
    `Cross-reference complete: ${results.length} coaches, ${overlapsFound} with overlaps`
  );

  return results;
}
