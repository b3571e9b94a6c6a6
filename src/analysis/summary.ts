/**
 * Summary statistics over a cross-reference run
 */

import type {
  CareerStint,
  CrossReferenceResult,
  DataQuality,
  SummaryStats,
} from '../types/index.js';

/**
 * Confidence in a coach's career data, based on how many stints cite a source.
 */
export function determineDataQuality(
  careerHistory: readonly CareerStint[],
  researchStatus: string
): DataQuality {
  if (researchStatus === 'NOT_FOUND' || researchStatus === 'AMBIGUOUS') {
    return 'UNVERIFIED';
  }
  if (careerHistory.length === 0) {
    return 'UNVERIFIED';
  }

  const withSource = careerHistory.filter(stint => Boolean(stint.source_url)).length;

  if (withSource === careerHistory.length) return 'VERIFIED';
  if (withSource > 0) return 'PARTIAL';
  return 'UNVERIFIED';
}

export function generateSummaryStats(results: readonly CrossReferenceResult[]): SummaryStats {
  const totalCoaches = results.length;
  const coachesWithOverlap = results.filter(r => r.has_overlap).length;
  const totalOverlaps = results.reduce((sum, r) => sum + r.overlap_count, 0);

  const dataQuality = { verified: 0, partial: 0, unverified: 0 };
  for (const result of results) {
    switch (determineDataQuality(result.career_history, result.research_status)) {
      case 'VERIFIED':
        dataQuality.verified++;
        break;
      case 'PARTIAL':
        dataQuality.partial++;
        break;
      case 'UNVERIFIED':
        dataQuality.unverified++;
        break;
    }
  }

  const overlapSchools = new Set(results.flatMap(r => r.overlaps.map(o => o.school)));

  return {
    total_coaches: totalCoaches,
    coaches_with_overlap: coachesWithOverlap,
    coaches_without_overlap: totalCoaches - coachesWithOverlap,
    total_overlap_instances: totalOverlaps,
    unique_overlap_schools: overlapSchools.size,
    overlap_schools_list: [...overlapSchools].sort(),
    data_quality: dataQuality,
    overlap_percentage: totalCoaches > 0 ? (coachesWithOverlap / totalCoaches) * 100 : 0,
  };
}
