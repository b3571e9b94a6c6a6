/**
 * NFL Franchise Table
 *
 * Source of the keyword and city lists used to keep professional stints out
 * of school-name normalization. Coaches move between the NFL and college
 * ranks often enough that these appear in most career histories.
 */

// =============================================================================
// TYPES
// =============================================================================

export interface NflTeam {
  city: string;
  nickname: string;
  conference: 'AFC' | 'NFC';
  division: 'East' | 'North' | 'South' | 'West';
}

// =============================================================================
// NFL TEAMS (32)
// =============================================================================

export const NFL_TEAMS: Record<string, NflTeam> = {
  // AFC
  buffalo_bills: { city: 'Buffalo', nickname: 'Bills', conference: 'AFC', division: 'East' },
  miami_dolphins: { city: 'Miami', nickname: 'Dolphins', conference: 'AFC', division: 'East' },
  new_england_patriots: { city: 'New England', nickname: 'Patriots', conference: 'AFC', division: 'East' },
  new_york_jets: { city: 'New York', nickname: 'Jets', conference: 'AFC', division: 'East' },
  baltimore_ravens: { city: 'Baltimore', nickname: 'Ravens', conference: 'AFC', division: 'North' },
  cincinnati_bengals: { city: 'Cincinnati', nickname: 'Bengals', conference: 'AFC', division: 'North' },
  cleveland_browns: { city: 'Cleveland', nickname: 'Browns', conference: 'AFC', division: 'North' },
  pittsburgh_steelers: { city: 'Pittsburgh', nickname: 'Steelers', conference: 'AFC', division: 'North' },
  houston_texans: { city: 'Houston', nickname: 'Texans', conference: 'AFC', division: 'South' },
  indianapolis_colts: { city: 'Indianapolis', nickname: 'Colts', conference: 'AFC', division: 'South' },
  jacksonville_jaguars: { city: 'Jacksonville', nickname: 'Jaguars', conference: 'AFC', division: 'South' },
  tennessee_titans: { city: 'Tennessee', nickname: 'Titans', conference: 'AFC', division: 'South' },
  denver_broncos: { city: 'Denver', nickname: 'Broncos', conference: 'AFC', division: 'West' },
  kansas_city_chiefs: { city: 'Kansas City', nickname: 'Chiefs', conference: 'AFC', division: 'West' },
  las_vegas_raiders: { city: 'Las Vegas', nickname: 'Raiders', conference: 'AFC', division: 'West' },
  los_angeles_chargers: { city: 'Los Angeles', nickname: 'Chargers', conference: 'AFC', division: 'West' },
  // NFC
  dallas_cowboys: { city: 'Dallas', nickname: 'Cowboys', conference: 'NFC', division: 'East' },
  new_york_giants: { city: 'New York', nickname: 'Giants', conference: 'NFC', division: 'East' },
  philadelphia_eagles: { city: 'Philadelphia', nickname: 'Eagles', conference: 'NFC', division: 'East' },
  washington_commanders: { city: 'Washington', nickname: 'Commanders', conference: 'NFC', division: 'East' },
  chicago_bears: { city: 'Chicago', nickname: 'Bears', conference: 'NFC', division: 'North' },
  detroit_lions: { city: 'Detroit', nickname: 'Lions', conference: 'NFC', division: 'North' },
  green_bay_packers: { city: 'Green Bay', nickname: 'Packers', conference: 'NFC', division: 'North' },
  minnesota_vikings: { city: 'Minnesota', nickname: 'Vikings', conference: 'NFC', division: 'North' },
  atlanta_falcons: { city: 'Atlanta', nickname: 'Falcons', conference: 'NFC', division: 'South' },
  carolina_panthers: { city: 'Carolina', nickname: 'Panthers', conference: 'NFC', division: 'South' },
  new_orleans_saints: { city: 'New Orleans', nickname: 'Saints', conference: 'NFC', division: 'South' },
  tampa_bay_buccaneers: { city: 'Tampa Bay', nickname: 'Buccaneers', conference: 'NFC', division: 'South' },
  arizona_cardinals: { city: 'Arizona', nickname: 'Cardinals', conference: 'NFC', division: 'West' },
  los_angeles_rams: { city: 'Los Angeles', nickname: 'Rams', conference: 'NFC', division: 'West' },
  san_francisco_49ers: { city: 'San Francisco', nickname: '49ers', conference: 'NFC', division: 'West' },
  seattle_seahawks: { city: 'Seattle', nickname: 'Seahawks', conference: 'NFC', division: 'West' },
};

// League-level terms that mark a stint as professional on their own
export const NFL_LEAGUE_KEYWORDS = ['NFL', 'NATIONAL FOOTBALL LEAGUE'];

// Words that mark a name as a school even when it contains a nickname
export const COLLEGE_MARKERS = ['UNIVERSITY', 'COLLEGE'];
