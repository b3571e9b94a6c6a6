/**
 * Alias coverage check
 *
 * Confirms every school in a target list resolves through the alias table,
 * either by its display name or its expected canonical name. Unmatched
 * schools need aliases added before their coaches can be cross-referenced.
 */

import { cleanSchoolName } from '../utils/index.js';
import type { AliasTable, CanonicalSchoolName } from '../types/index.js';

export interface TargetSchool {
  name: string;
  canonical: string;
}

export interface MatchedSchool extends TargetSchool {
  resolvedTo: CanonicalSchoolName;
}

/**
 * Any name variation (canonical names included) -> canonical name
 */
export function buildAliasLookup(aliases: AliasTable): Map<string, CanonicalSchoolName> {
  const lookup = new Map<string, CanonicalSchoolName>();

  for (const [canonical, variations] of Object.entries(aliases)) {
    if (canonical.startsWith('_')) continue;
    lookup.set(cleanSchoolName(canonical), canonical);
    for (const alias of variations) {
      lookup.set(cleanSchoolName(alias), canonical);
    }
  }

  return lookup;
}

export function validateSchoolNames(
  targets: readonly TargetSchool[],
  aliases: AliasTable
): { matched: MatchedSchool[]; unmatched: TargetSchool[] } {
  const lookup = buildAliasLookup(aliases);
  const matched: MatchedSchool[] = [];
  const unmatched: TargetSchool[] = [];

  for (const target of targets) {
    const resolvedTo =
      lookup.get(cleanSchoolName(target.name)) ?? lookup.get(cleanSchoolName(target.canonical));

    if (resolvedTo) {
      matched.push({ ...target, resolvedTo });
    } else {
      unmatched.push({ ...target });
    }
  }

  return { matched, unmatched };
}
