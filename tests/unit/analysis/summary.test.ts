/**
 * Summary Statistics Tests
 */

import { describe, it, expect } from 'vitest';
import { determineDataQuality, generateSummaryStats } from '../../../src/analysis/summary.js';
import type { CrossReferenceResult, OverlapRecord } from '../../../src/types/index.js';

function overlap(school: string, academicYear: string): OverlapRecord {
  return {
    school,
    school_original: school,
    academic_year: academicYear,
    coach_position: 'Analyst',
    match_type: 'exact',
  };
}

function result(
  name: string,
  overlaps: OverlapRecord[],
  sources: (string | undefined)[],
  researchStatus = 'FOUND'
): CrossReferenceResult {
  return {
    coach_name: name,
    current_position: 'Analyst',
    current_school: 'University of Oregon',
    research_status: researchStatus,
    career_history: sources.map(source_url => ({
      school: 'Tulane',
      position: 'Analyst',
      years: '2021-2022',
      source_url,
    })),
    has_overlap: overlaps.length > 0,
    overlaps,
    overlap_count: overlaps.length,
  };
}

describe('determineDataQuality', () => {
  it('should be VERIFIED when every stint has a source', () => {
    expect(determineDataQuality([{ source_url: 'https://example.com/a' }], 'FOUND')).toBe('VERIFIED');
  });

  it('should be PARTIAL when some stints have a source', () => {
    expect(
      determineDataQuality([{ source_url: 'https://example.com/a' }, { source_url: '' }], 'PARTIAL')
    ).toBe('PARTIAL');
  });

  it('should be UNVERIFIED without sources or history', () => {
    expect(determineDataQuality([{ school: 'Tulane' }], 'FOUND')).toBe('UNVERIFIED');
    expect(determineDataQuality([], 'FOUND')).toBe('UNVERIFIED');
  });

  it('should be UNVERIFIED for unresolved research', () => {
    expect(determineDataQuality([{ source_url: 'https://example.com/a' }], 'NOT_FOUND')).toBe('UNVERIFIED');
    expect(determineDataQuality([{ source_url: 'https://example.com/a' }], 'AMBIGUOUS')).toBe('UNVERIFIED');
  });
});

describe('generateSummaryStats', () => {
  it('should total overlaps and schools across coaches', () => {
    const stats = generateSummaryStats([
      result(
        'Jordan Reyes',
        [overlap('TULANE UNIVERSITY', '2020-2021'), overlap('OREGON STATE UNIVERSITY', '2021-2022')],
        ['https://example.com/a']
      ),
      result('Sam Ortiz', [overlap('TULANE UNIVERSITY', '2024-2025')], ['https://example.com/b', undefined]),
      result('Casey Lin', [], [undefined]),
      result('Riley Park', [], [], 'NOT_FOUND'),
    ]);

    expect(stats).toEqual({
      total_coaches: 4,
      coaches_with_overlap: 2,
      coaches_without_overlap: 2,
      total_overlap_instances: 3,
      unique_overlap_schools: 2,
      overlap_schools_list: ['OREGON STATE UNIVERSITY', 'TULANE UNIVERSITY'],
      data_quality: { verified: 1, partial: 1, unverified: 2 },
      overlap_percentage: 50,
    });
  });

  it('should handle an empty run', () => {
    const stats = generateSummaryStats([]);
    expect(stats.total_coaches).toBe(0);
    expect(stats.overlap_percentage).toBe(0);
    expect(stats.overlap_schools_list).toEqual([]);
  });
});
