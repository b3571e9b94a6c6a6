#!/usr/bin/env node
/**
 * Coach Overlap Cross-Reference
 *
 * Finds coaches whose past stints line up with years the donor-recruitment
 * program ran a drive at the same school.
 *
 * Usage:
 *   npm start -- --coaches cache/university_of_oregon/coaches
 *   npm start -- --normalize "Oregon St." --fuzzy
 *   npm start -- --check-targets data/target_schools.json
 *
 * Options:
 *   --db <path>        Program database (default data/program_school_years.json)
 *   --aliases <path>   Alias table (default data/school_aliases.json)
 *   --config <path>    Config file (default config.json)
 *   --fuzzy            Allow fuzzy matching with --normalize
 *   --json             Print cross-reference results as JSON on stdout;
 *                      log lines move to stderr
 */

import 'dotenv/config';
import { configureLogger, describeError, formatPercentage, logger } from './utils/index.js';
import {
  CONFIG_PATH,
  PROGRAM_DB_PATH,
  SCHOOL_ALIASES_PATH,
  loadConfig,
  validateConfig,
} from './config.js';
import { loadAliasTable, loadTargetSchools } from './data/loaders.js';
import { SchoolNormalizer } from './normalize/school-normalizer.js';
import { resolveNflTeam } from './normalize/nfl-filter.js';
import { crossReferenceAllCoaches } from './overlap/batch.js';
import { generateSummaryStats } from './analysis/summary.js';
import { validateSchoolNames } from './analysis/alias-coverage.js';
import type { CrossReferenceResult } from './types/index.js';

// =============================================================================
// CLI PARSING
// =============================================================================

interface CliArgs {
  coachesDir?: string;
  normalize?: string;
  checkTargets?: string;
  fuzzy: boolean;
  json: boolean;
  dbPath: string;
  aliasesPath: string;
  configPath: string;
}

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);

  const valueOf = (flag: string): string | undefined => {
    const idx = args.indexOf(flag);
    if (idx !== -1 && args[idx + 1]) {
      return args[idx + 1];
    }
    return undefined;
  };

  return {
    coachesDir: valueOf('--coaches'),
    normalize: valueOf('--normalize'),
    checkTargets: valueOf('--check-targets'),
    fuzzy: args.includes('--fuzzy'),
    json: args.includes('--json'),
    dbPath: valueOf('--db') ?? PROGRAM_DB_PATH,
    aliasesPath: valueOf('--aliases') ?? SCHOOL_ALIASES_PATH,
    configPath: valueOf('--config') ?? CONFIG_PATH,
  };
}

// =============================================================================
// COMMANDS
// =============================================================================

function runCrossReference(args: CliArgs, coachesDir: string): void {
  const configCheck = validateConfig(loadConfig(args.configPath));
  if (!configCheck.valid) {
    for (const error of configCheck.errors) {
      logger.error(error);
    }
    process.exitCode = 1;
    return;
  }

  const results = crossReferenceAllCoaches({
    coachesDir,
    programDbPath: args.dbPath,
    aliasesPath: args.aliasesPath,
    configPath: args.configPath,
  });

  if (args.json) {
    console.log(JSON.stringify(results, null, 2));
    return;
  }

  printSummary(results);
}

function printSummary(results: CrossReferenceResult[]): void {
  const stats = generateSummaryStats(results);

  logger.divider();
  logger.info(`Total coaches processed: ${stats.total_coaches}`);
  logger.info(
    `Coaches with program overlap: ${stats.coaches_with_overlap} (${formatPercentage(stats.overlap_percentage / 100)})`
  );
  logger.info(
    `Data quality: ${stats.data_quality.verified} verified, ${stats.data_quality.partial} partial, ${stats.data_quality.unverified} unverified`
  );

  results
    .filter(result => result.has_overlap)
    .forEach((result, i) => {
      logger.step(i + 1, `${result.coach_name} (${result.current_position})`);
      for (const overlap of result.overlaps) {
        logger.success(`${overlap.school}, ${overlap.academic_year} - ${overlap.coach_position}`);
      }
    });
  logger.divider();
}

function runNormalize(args: CliArgs, name: string): void {
  const normalizer = SchoolNormalizer.fromFiles(args.dbPath, args.aliasesPath);
  const { normalized, matchType, score } = normalizer.normalize(name, { useFuzzy: args.fuzzy });

  logger.info(`Original: ${name}`);
  logger.info(`Normalized: ${normalized}`);
  logger.info(`Match type: ${matchType}`);
  logger.info(`In program database: ${normalizer.isProgramSchool(normalized)}`);

  const nflTeam = resolveNflTeam(name);
  logger.info(`Is NFL team: ${normalizer.isNflTeam(name)}${nflTeam ? ` (${nflTeam.teamKey})` : ''}`);

  if (score !== undefined) {
    logger.info(`Fuzzy match score: ${formatPercentage(score)}`);
  }
}

function runCheckTargets(args: CliArgs, targetsPath: string): void {
  const { matched, unmatched } = validateSchoolNames(
    loadTargetSchools(targetsPath),
    loadAliasTable(args.aliasesPath)
  );

  logger.divider();
  logger.info(`Matched: ${matched.length}`);
  logger.info(`Unmatched: ${unmatched.length}`);

  for (const school of unmatched) {
    logger.warn(`✗ ${school.name} (canonical: ${school.canonical}) needs an alias`);
  }
  for (const school of matched) {
    const marker = school.resolvedTo === school.canonical ? '✓' : '~';
    logger.debug(`${marker} ${school.name} → ${school.resolvedTo}`);
  }
  logger.divider();

  if (unmatched.length > 0) {
    process.exitCode = 1;
  } else {
    logger.success('All school names validated');
  }
}

// =============================================================================
// MAIN
// =============================================================================

function main(): void {
  const args = parseArgs();
  if (args.json) {
    configureLogger({ stream: 'stderr' });
  }

  try {
    if (args.normalize) {
      runNormalize(args, args.normalize);
    } else if (args.checkTargets) {
      runCheckTargets(args, args.checkTargets);
    } else if (args.coachesDir) {
      runCrossReference(args, args.coachesDir);
    } else {
      logger.error('Nothing to do: pass --coaches <dir>, --normalize <name> or --check-targets <file>');
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error(`Fatal: ${describeError(error)}`);
    process.exitCode = 1;
  }
}

main();
