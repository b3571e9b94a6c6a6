/**
 * NFL Filter
 *
 * Heuristic check for professional stints. NFL franchises never appear in
 * the program database, so they are skipped before normalization instead of
 * landing in the "none" match bucket.
 */

import {
  NFL_TEAMS,
  NFL_LEAGUE_KEYWORDS,
  COLLEGE_MARKERS,
  type NflTeam,
} from '../data/nfl-teams.js';

// =============================================================================
// KEYWORD TABLES
// =============================================================================

const NFL_KEYWORDS: string[] = [
  ...Object.values(NFL_TEAMS).map(team => team.nickname.toUpperCase()),
  ...NFL_LEAGUE_KEYWORDS,
];

// Longest first so "NEW YORK" style prefixes are tried before shorter ones
const NFL_CITIES: string[] = [
  ...new Set(Object.values(NFL_TEAMS).map(team => team.city.toUpperCase())),
].sort((a, b) => b.length - a.length);

function hasCollegeMarker(nameUpper: string): boolean {
  return COLLEGE_MARKERS.some(marker => nameUpper.includes(marker));
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

/**
 * True when the name looks like an NFL team rather than a school.
 *
 * "Dallas Cowboys" -> true
 * "Dallas Baptist University Cowboys" -> false (university guard)
 */
export function isNflTeam(name: string): boolean {
  if (!name) return false;
  const nameUpper = name.toUpperCase();

  if (hasCollegeMarker(nameUpper)) return false;

  return NFL_KEYWORDS.some(keyword => nameUpper.includes(keyword));
}

/**
 * Resolve the franchise behind an NFL-looking name, for diagnostics.
 *
 * Tries "city prefix + nickname in the remainder" first ("NEW ENGLAND PATRIOTS"),
 * then a bare nickname ("Patriots"). League-only names ("NFL") resolve to null.
 */
export function resolveNflTeam(name: string): { teamKey: string; team: NflTeam } | null {
  if (!isNflTeam(name)) return null;
  const nameUpper = name.toUpperCase().replace(/\s+/g, ' ').trim();

  for (const city of NFL_CITIES) {
    if (!nameUpper.startsWith(city)) continue;
    const remainder = nameUpper.slice(city.length).trim();

    for (const [teamKey, team] of Object.entries(NFL_TEAMS)) {
      if (team.city.toUpperCase() === city && remainder.includes(team.nickname.toUpperCase())) {
        return { teamKey, team };
      }
    }
  }

  for (const [teamKey, team] of Object.entries(NFL_TEAMS)) {
    if (nameUpper.includes(team.nickname.toUpperCase())) {
      return { teamKey, team };
    }
  }

  return null;
}
