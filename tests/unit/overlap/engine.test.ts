/**
 * Overlap Engine Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { crossReferenceCoach, findOverlapsForCoach } from '../../../src/overlap/engine.js';
import { SchoolNormalizer } from '../../../src/normalize/school-normalizer.js';
import type { AliasTable, CoachRecord, ProgramYearDatabase } from '../../../src/types/index.js';

const PROGRAM_DB: ProgramYearDatabase = {
  'OREGON STATE UNIVERSITY': ['2020-2021', '2021-2022', '2022-2023'],
  'TULANE UNIVERSITY': ['2018-2019', '2020-2021', '2024-2025', '2025-2026'],
  'DENVER BRONCOS': ['2020-2021', '2021-2022'],
};

const ALIASES: AliasTable = {
  'OREGON STATE UNIVERSITY': ['Oregon State'],
  'UNIVERSITY OF GEORGIA': ['Georgia'],
};

describe('findOverlapsForCoach', () => {
  let normalizer: SchoolNormalizer;

  beforeEach(() => {
    normalizer = new SchoolNormalizer(PROGRAM_DB, ALIASES);
  });

  it('should emit one overlap per matching academic year', () => {
    const overlaps = findOverlapsForCoach(
      [{ school: 'Oregon State', position: 'Linebackers Coach', years: '2020-2022' }],
      PROGRAM_DB,
      normalizer
    );

    expect(overlaps).toEqual([
      {
        school: 'OREGON STATE UNIVERSITY',
        school_original: 'Oregon State',
        academic_year: '2020-2021',
        coach_position: 'Linebackers Coach',
        match_type: 'alias',
      },
      {
        school: 'OREGON STATE UNIVERSITY',
        school_original: 'Oregon State',
        academic_year: '2021-2022',
        coach_position: 'Linebackers Coach',
        match_type: 'alias',
      },
      {
        school: 'OREGON STATE UNIVERSITY',
        school_original: 'Oregon State',
        academic_year: '2022-2023',
        coach_position: 'Linebackers Coach',
        match_type: 'alias',
      },
    ]);
  });

  it('should find nothing for a school outside the program database', () => {
    const overlaps = findOverlapsForCoach(
      [{ school: 'Georgia', position: 'Defensive Coordinator', years: '2019-2021' }],
      PROGRAM_DB,
      normalizer
    );
    expect(overlaps).toEqual([]);
  });

  it('should skip NFL stints even when the database lists them', () => {
    const overlaps = findOverlapsForCoach(
      [{ school: 'Denver Broncos', position: 'Quality Control', years: '2020-2021' }],
      PROGRAM_DB,
      normalizer
    );
    expect(overlaps).toEqual([]);
  });

  it('should limit seasons to the configured window', () => {
    const overlaps = findOverlapsForCoach(
      [{ school: 'Tulane University', position: 'Analyst', years: '2018-present' }],
      PROGRAM_DB,
      normalizer,
      2020,
      2026
    );

    expect(overlaps.map(o => o.academic_year)).toEqual(['2020-2021', '2024-2025', '2025-2026']);
    expect(overlaps.every(o => o.match_type === 'exact')).toBe(true);
  });

  it('should resolve present against the window end', () => {
    const overlaps = findOverlapsForCoach(
      [{ school: 'Tulane University', position: 'Analyst', years: '2018-present' }],
      PROGRAM_DB,
      normalizer,
      2020,
      2025
    );

    expect(overlaps.map(o => o.academic_year)).toEqual(['2020-2021', '2024-2025']);
  });

  it('should keep stint order, then season order', () => {
    const overlaps = findOverlapsForCoach(
      [
        { school: 'Tulane University', position: 'Analyst', years: '2024-2025' },
        { school: 'Oregon State', position: 'Safeties Coach', years: '2021-2022' },
      ],
      PROGRAM_DB,
      normalizer
    );

    expect(overlaps.map(o => `${o.school} ${o.academic_year}`)).toEqual([
      'TULANE UNIVERSITY 2024-2025',
      'TULANE UNIVERSITY 2025-2026',
      'OREGON STATE UNIVERSITY 2021-2022',
      'OREGON STATE UNIVERSITY 2022-2023',
    ]);
  });

  it('should skip stints with missing school or years', () => {
    const overlaps = findOverlapsForCoach(
      [
        { school: 'Oregon State', position: 'Analyst' },
        { position: 'Analyst', years: '2020-2022' },
        { school: '', years: '2020-2022' },
      ],
      PROGRAM_DB,
      normalizer
    );
    expect(overlaps).toEqual([]);
  });

  it('should contribute nothing for unparseable years', () => {
    const overlaps = findOverlapsForCoach(
      [{ school: 'Oregon State', position: 'Analyst', years: 'TBD' }],
      PROGRAM_DB,
      normalizer
    );
    expect(overlaps).toEqual([]);
  });

  it('should default a missing position to Unknown', () => {
    const overlaps = findOverlapsForCoach(
      [{ school: 'Oregon State', years: '2022' }],
      PROGRAM_DB,
      normalizer
    );
    expect(overlaps).toHaveLength(1);
    expect(overlaps[0].coach_position).toBe('Unknown');
  });

  it('should keep an empty position as given', () => {
    const overlaps = findOverlapsForCoach(
      [{ school: 'Oregon State', position: '', years: '2022' }],
      PROGRAM_DB,
      normalizer
    );
    expect(overlaps).toHaveLength(1);
    expect(overlaps[0].coach_position).toBe('');
  });

  it('should not fuzzy match school names', () => {
    const overlaps = findOverlapsForCoach(
      [{ school: 'Oregon State Universty', position: 'Analyst', years: '2020-2022' }],
      PROGRAM_DB,
      normalizer
    );
    expect(overlaps).toEqual([]);
    expect(normalizer.getFuzzyMatchLog()).toEqual([]);
  });
});

describe('crossReferenceCoach', () => {
  let normalizer: SchoolNormalizer;

  const coach: CoachRecord = {
    name: 'Jordan Reyes',
    current_position: 'Defensive Coordinator',
    current_school: 'University of Oregon',
    research_status: 'FOUND',
    career_history: [
      { school: 'University of Oregon', position: 'Defensive Coordinator', years: '2023-present' },
      { school: 'Oregon State', position: 'Linebackers Coach', years: '2020-2022' },
      { school: 'Denver Broncos', position: 'Quality Control', years: '2018-2019' },
    ],
  };

  beforeEach(() => {
    normalizer = new SchoolNormalizer(PROGRAM_DB, ALIASES);
  });

  it('should wrap overlaps with counts and identity fields', () => {
    const result = crossReferenceCoach(coach, PROGRAM_DB, normalizer);

    expect(result.coach_name).toBe('Jordan Reyes');
    expect(result.current_position).toBe('Defensive Coordinator');
    expect(result.current_school).toBe('University of Oregon');
    expect(result.research_status).toBe('FOUND');
    expect(result.career_history).toBe(coach.career_history);
    expect(result.has_overlap).toBe(true);
    expect(result.overlap_count).toBe(3);
    expect(result.overlaps.map(o => o.academic_year)).toEqual([
      '2020-2021',
      '2021-2022',
      '2022-2023',
    ]);
  });

  it('should read the year window from config', () => {
    const result = crossReferenceCoach(coach, PROGRAM_DB, normalizer, {
      year_range: { start: 2021, end: 2026 },
    });

    expect(result.overlap_count).toBe(2);
    expect(result.overlaps.map(o => o.academic_year)).toEqual(['2021-2022', '2022-2023']);
  });

  it('should echo empty identity fields without substituting Unknown', () => {
    const result = crossReferenceCoach(
      { name: '', current_position: '', current_school: 'University of Oregon' },
      PROGRAM_DB,
      normalizer
    );

    expect(result.coach_name).toBe('');
    expect(result.current_position).toBe('');
    expect(result.current_school).toBe('University of Oregon');
    expect(result.research_status).toBe('Unknown');
  });

  it('should report no overlap for an empty career', () => {
    const result = crossReferenceCoach({ name: 'Sam Ortiz' }, PROGRAM_DB, normalizer);

    expect(result).toEqual({
      coach_name: 'Sam Ortiz',
      current_position: 'Unknown',
      current_school: 'Unknown',
      research_status: 'Unknown',
      career_history: [],
      has_overlap: false,
      overlaps: [],
      overlap_count: 0,
    });
  });
});
