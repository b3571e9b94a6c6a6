/**
 * School Name Normalizer
 *
 * Canonicalizes free-text school names against the program database.
 * Resolution order, first hit wins:
 *   1. exact  - cleaned name is a canonical program school
 *   2. alias  - cleaned name is a known alias
 *   3. fuzzy  - best Levenshtein similarity above threshold (opt-in)
 *   4. none   - cleaned name returned unchanged
 */

import { FUZZY_MATCH_THRESHOLD } from '../config.js';
import { loadAliasTable, loadProgramDatabase } from '../data/loaders.js';
import { cleanSchoolName, createLogger } from '../utils/index.js';
import { findBestMatch } from './similarity.js';
import { isNflTeam } from './nfl-filter.js';
import type {
  AliasConflict,
  AliasTable,
  BatchNormalizeEntry,
  CanonicalSchoolName,
  FuzzyMatchEntry,
  NormalizeOptions,
  NormalizeResult,
  ProgramYearDatabase,
} from '../types/index.js';

const logger = createLogger('normalizer');

// =============================================================================
// REVERSE ALIAS INDEX
// =============================================================================

/**
 * Build uppercase alias -> canonical name.
 *
 * Later entries overwrite earlier ones. Overwrites that change the target
 * school are reported as conflicts so they can be fixed in the alias table.
 */
export function buildReverseAliasIndex(aliases: AliasTable): {
  index: Map<string, CanonicalSchoolName>;
  conflicts: AliasConflict[];
} {
  const index = new Map<string, CanonicalSchoolName>();
  const conflicts: AliasConflict[] = [];

  for (const [canonical, aliasList] of Object.entries(aliases)) {
    if (canonical.startsWith('_')) continue;
    const canonicalUpper = cleanSchoolName(canonical);

    for (const alias of aliasList) {
      const key = cleanSchoolName(alias);
      const previous = index.get(key);
      if (previous !== undefined && previous !== canonicalUpper) {
        conflicts.push({ alias: key, previous, replacement: canonicalUpper });
      }
      index.set(key, canonicalUpper);
    }
  }

  return { index, conflicts };
}

// =============================================================================
// NORMALIZER
// =============================================================================

export interface SchoolNormalizerOptions {
  /** Append fuzzy matches to the instance audit log (default true) */
  recordFuzzyMatches?: boolean;
}

export class SchoolNormalizer {
  private readonly programSchools: Set<CanonicalSchoolName>;
  private readonly reverseAliases: Map<string, CanonicalSchoolName>;
  private readonly recordFuzzyMatches: boolean;
  private fuzzyMatchLog: FuzzyMatchEntry[] = [];

  readonly aliasConflicts: readonly AliasConflict[];

  constructor(
    programDb: ProgramYearDatabase,
    aliases: AliasTable,
    options: SchoolNormalizerOptions = {}
  ) {
    this.programSchools = new Set(Object.keys(programDb).map(cleanSchoolName));

    const { index, conflicts } = buildReverseAliasIndex(aliases);
    this.reverseAliases = index;
    this.aliasConflicts = conflicts;
    this.recordFuzzyMatches = options.recordFuzzyMatches ?? true;

    for (const conflict of conflicts) {
      logger.warn(
        `Alias "${conflict.alias}" maps to both ${conflict.previous} and ${conflict.replacement}; using ${conflict.replacement}`
      );
    }
  }

  /**
   * Load both data files and build a normalizer.
   * File errors propagate as DataLoadError.
   */
  static fromFiles(
    programDbPath: string,
    aliasesPath: string,
    options?: SchoolNormalizerOptions
  ): SchoolNormalizer {
    return new SchoolNormalizer(
      loadProgramDatabase(programDbPath),
      loadAliasTable(aliasesPath),
      options
    );
  }

  get schoolCount(): number {
    return this.programSchools.size;
  }

  get aliasCount(): number {
    return this.reverseAliases.size;
  }

  isProgramSchool(name: CanonicalSchoolName): boolean {
    return this.programSchools.has(name);
  }

  isNflTeam(name: string): boolean {
    return isNflTeam(name);
  }

  normalize(name: string, options: NormalizeOptions = {}): NormalizeResult {
    const { useFuzzy = false, fuzzyThreshold = FUZZY_MATCH_THRESHOLD } = options;
    const cleaned = cleanSchoolName(name);

    if (this.programSchools.has(cleaned)) {
      return { normalized: cleaned, matchType: 'exact' };
    }

    const canonical = this.reverseAliases.get(cleaned);
    if (canonical !== undefined) {
      return { normalized: canonical, matchType: 'alias' };
    }

    if (useFuzzy && cleaned) {
      const best = findBestMatch(cleaned, this.programSchools, fuzzyThreshold);
      if (best) {
        if (this.recordFuzzyMatches) {
          this.fuzzyMatchLog.push({ original: name, matched_to: best.match, score: best.score });
        }
        logger.debug(`Fuzzy matched "${name}" -> ${best.match} (${best.score.toFixed(3)})`);
        return { normalized: best.match, matchType: 'fuzzy', score: best.score };
      }
    }

    return { normalized: cleaned, matchType: 'none' };
  }

  normalizeBatch(names: string[], useFuzzy: boolean = true): BatchNormalizeEntry[] {
    return names.map(name => {
      const { normalized, matchType } = this.normalize(name, { useFuzzy });
      return {
        original: name,
        normalized,
        matchType,
        inProgramDb: this.programSchools.has(normalized),
      };
    });
  }

  /**
   * Fuzzy matches recorded so far, for human review
   */
  getFuzzyMatchLog(): FuzzyMatchEntry[] {
    return [...this.fuzzyMatchLog];
  }

  clearFuzzyMatchLog(): void {
    this.fuzzyMatchLog = [];
  }
}
