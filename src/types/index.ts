/**
 * Core type definitions for the coach overlap cross-reference
 */

// =============================================================================
// PROGRAM DATA TYPES
// =============================================================================

/** Uppercase, whitespace-collapsed school name used as a program database key */
export type CanonicalSchoolName = string;

/** "YYYY-YYYY" label, e.g. "2021-2022" (Fall 2021 - Spring 2022) */
export type AcademicYear = string;

/** Canonical school → academic years the program ran there */
export type ProgramYearDatabase = Record<CanonicalSchoolName, AcademicYear[]>;

/** Canonical school → free-text variants a human might use */
export type AliasTable = Record<CanonicalSchoolName, string[]>;

export interface AliasConflict {
  alias: string;
  previous: CanonicalSchoolName;
  replacement: CanonicalSchoolName;
}

// =============================================================================
// COACH TYPES
// =============================================================================

export type ResearchStatus = 'FOUND' | 'PARTIAL' | 'NOT_FOUND' | 'AMBIGUOUS';

export const RESEARCH_STATUSES: readonly ResearchStatus[] = [
  'FOUND',
  'PARTIAL',
  'NOT_FOUND',
  'AMBIGUOUS',
];

export interface CareerStint {
  school?: string;
  position?: string;
  years?: string;       // "2020-2022", "2024-present", "2023"
  source_url?: string;
}

export interface CoachRecord {
  name?: string;
  current_position?: string;
  current_school?: string;
  research_status?: string;
  career_history?: CareerStint[];
}

/** One coach file holds either a single record or a combined roster */
export type CoachSource =
  | { kind: 'single'; file: string; coach: CoachRecord }
  | { kind: 'combined'; file: string; coaches: CoachRecord[] };

// =============================================================================
// MATCHING TYPES
// =============================================================================

export type MatchType = 'exact' | 'alias' | 'fuzzy' | 'none';

export interface NormalizeResult {
  normalized: CanonicalSchoolName;
  matchType: MatchType;
  score?: number;       // Only set for fuzzy matches
}

export interface NormalizeOptions {
  useFuzzy?: boolean;
  fuzzyThreshold?: number;
}

export interface FuzzyMatchEntry {
  original: string;
  matched_to: CanonicalSchoolName;
  score: number;
}

export interface BatchNormalizeEntry {
  original: string;
  normalized: CanonicalSchoolName;
  matchType: MatchType;
  inProgramDb: boolean;
}

// =============================================================================
// RESULT TYPES
// =============================================================================

export interface OverlapRecord {
  school: CanonicalSchoolName;
  school_original: string;
  academic_year: AcademicYear;
  coach_position: string;
  match_type: MatchType;
}

export interface CrossReferenceResult {
  coach_name: string;
  current_position: string;
  current_school: string;
  research_status: string;
  career_history: CareerStint[];
  has_overlap: boolean;
  overlaps: OverlapRecord[];
  overlap_count: number;
}

export type DataQuality = 'VERIFIED' | 'PARTIAL' | 'UNVERIFIED';

export interface SummaryStats {
  total_coaches: number;
  coaches_with_overlap: number;
  coaches_without_overlap: number;
  total_overlap_instances: number;
  unique_overlap_schools: number;
  overlap_schools_list: CanonicalSchoolName[];
  data_quality: Record<Lowercase<DataQuality>, number>;
  overlap_percentage: number;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
