/**
 * Year-range parsing and academic-year conversion
 *
 * A listed range is a run of football seasons, end year included:
 * "2020-2022" is the 2020, 2021 and 2022 seasons. Season Y is played in
 * academic year "Y-(Y+1)" (Fall Y - Spring Y+1).
 */

import dayjs from 'dayjs';
import type { AcademicYear } from '../types/index.js';

const PRESENT_PATTERN = /^(\d{4})\s*-\s*present/;
const RANGE_PATTERN = /^(\d{4})\s*-\s*(\d{4})/;
const SINGLE_YEAR_PATTERN = /^(\d{4})/;

function seasonRange(start: number, endExclusive: number): number[] {
  const seasons: number[] = [];
  for (let year = start; year < endExclusive; year++) {
    seasons.push(year);
  }
  return seasons;
}

/**
 * Parse a human-written year range into ascending calendar years.
 *
 * "2020-2022"    -> [2020, 2021, 2022]
 * "2024-present" -> [2024, 2025] when currentYear is 2026; the season in
 *                   progress is left out since its academic year is still open
 * "2023"         -> [2023]
 * anything else  -> []
 */
export function parseYearRange(
  text: string,
  currentYear: number = dayjs().year()
): number[] {
  if (!text) return [];
  const value = text.trim().toLowerCase();

  if (value.includes('present')) {
    const match = PRESENT_PATTERN.exec(value);
    if (!match) return [];
    return seasonRange(Number(match[1]), currentYear);
  }

  const range = RANGE_PATTERN.exec(value);
  if (range) {
    return seasonRange(Number(range[1]), Number(range[2]) + 1);
  }

  const single = SINGLE_YEAR_PATTERN.exec(value);
  if (single) {
    return [Number(single[1])];
  }

  return [];
}

/**
 * 2020 -> "2020-2021"
 */
export function yearToAcademicYear(year: number): AcademicYear {
  return `${year}-${year + 1}`;
}
