/**
 * Overlap Engine
 *
 * Intersects each coaching stint's academic years with the years the
 * program ran at the same (normalized) school.
 */

import { DEFAULT_YEAR_RANGE, type CrossReferenceConfig } from '../config.js';
import { createLogger } from '../utils/index.js';
import type { SchoolNormalizer } from '../normalize/school-normalizer.js';
import { parseYearRange, yearToAcademicYear } from './years.js';
import type {
  CareerStint,
  CoachRecord,
  CrossReferenceResult,
  OverlapRecord,
  ProgramYearDatabase,
} from '../types/index.js';

const logger = createLogger('overlap');

const UNKNOWN = 'Unknown';

// =============================================================================
// PER-STINT MATCHING
// =============================================================================

/**
 * Find program overlaps across a coach's career history.
 *
 * Seasons are limited to [yearStart, yearEnd), and "present" resolves
 * against yearEnd. Output follows stint order, then season order.
 */
export function findOverlapsForCoach(
  careerHistory: readonly CareerStint[],
  programDb: ProgramYearDatabase,
  normalizer: SchoolNormalizer,
  yearStart: number = DEFAULT_YEAR_RANGE.start,
  yearEnd: number = DEFAULT_YEAR_RANGE.end
): OverlapRecord[] {
  const overlaps: OverlapRecord[] = [];

  for (const stint of careerHistory) {
    const school = stint.school ?? '';
    const yearsText = stint.years ?? '';
    const position = stint.position ?? UNKNOWN;

    if (!school || !yearsText) continue;

    if (normalizer.isNflTeam(school)) {
      logger.debug(`Skipping NFL stint: ${school}`);
      continue;
    }

    const { normalized, matchType } = normalizer.normalize(school);
    const programYears = programDb[normalized];
    if (!programYears) continue;

    const programYearSet = new Set(programYears);
    const seasons = parseYearRange(yearsText, yearEnd).filter(
      year => year >= yearStart && year < yearEnd
    );

    for (const season of seasons) {
      const academicYear = yearToAcademicYear(season);
      if (programYearSet.has(academicYear)) {
        overlaps.push({
          school: normalized,
          school_original: school,
          academic_year: academicYear,
          coach_position: position,
          match_type: matchType,
        });
      }
    }
  }

  return overlaps;
}

// =============================================================================
// PER-COACH AGGREGATION
// =============================================================================

/**
 * Cross-reference one coach, echoing identity fields onto the result.
 */
export function crossReferenceCoach(
  coach: CoachRecord,
  programDb: ProgramYearDatabase,
  normalizer: SchoolNormalizer,
  config?: Pick<CrossReferenceConfig, 'year_range'>
): CrossReferenceResult {
  const yearStart = config?.year_range.start ?? DEFAULT_YEAR_RANGE.start;
  const yearEnd = config?.year_range.end ?? DEFAULT_YEAR_RANGE.end;
  const careerHistory = coach.career_history ?? [];

  const overlaps = findOverlapsForCoach(careerHistory, programDb, normalizer, yearStart, yearEnd);

  return {
    coach_name: coach.name ?? UNKNOWN,
    current_position: coach.current_position ?? UNKNOWN,
    current_school: coach.current_school ?? UNKNOWN,
    research_status: coach.research_status ?? UNKNOWN,
    career_history: careerHistory,
    has_overlap: overlaps.length > 0,
    overlaps,
    overlap_count: overlaps.length,
  };
}
