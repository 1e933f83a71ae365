/**
 * Oval League: Scoring Engine
 *
 * Public API surface for qualifying, starting grids, race scoring, season
 * standings, and the persistence and race-control collaborators around them.
 */

// Types
export type {
  Car,
  Dnq,
  Finish,
  Qualifier,
  StartingGridEntry,
  GridFillPolicy,
  PointsTable,
  PointsStructure,
  PolePosition,
  TeamOwners,
  RosterEntry,
  DriverRoster,
  TrackInfo,
  RawFinishInput,
  ScoredResult,
  TeamRaceResult,
  RaceRecord,
  SeasonRow,
  DriverStanding,
  OwnerStanding,
  PlayoffStanding,
  SeasonStandings,
} from './types.js';

export { DNQ, isDnq } from './types.js';

// Errors
export type { LookupKind } from './errors.js';
export { LookupError, RecordFormatError } from './errors.js';

// Randomness
export type { RandomSource } from './random.js';
export { createRng, shuffle, sample, defaultRandom } from './random.js';

// Qualifying
export type { QualifyingHistoryRow, TeamWeight } from './qualifying.js';
export {
  MAX_QUALIFIERS_PER_TEAM,
  MIN_WEIGHT,
  computeTeamWeights,
  denseRankDescending,
  qualifyingSequence,
} from './qualifying.js';

// Grid
export type { GridOptions } from './grid.js';
export { carsPerTeam, teamsInPoleOrder, buildStartingGrid } from './grid.js';

// Scoring
export type { ScoredRace } from './scoring.js';
export {
  POLE_BONUS,
  TEAM_TURNS_LED_BONUS,
  lookupPoints,
  calculateQualifyingPoints,
  findMostLedTeam,
  scoreRace,
  computeTeamRaceResults,
} from './scoring.js';

// Standings
export * from './standings/index.js';

// Race lifecycle
export type { RaceSetupConfig, PreparedRace, RaceCompletion } from './league.js';
export {
  prepareRace,
  completeRace,
  nextRaceNumber,
  racesToSeasonRows,
  rosterFromDrivers,
  formatRaceDate,
} from './league.js';

// Season persistence & configuration
export * from './season/index.js';

// Race-control server
export * from './server/index.js';

// Environment & logging
export type { LeagueEnv } from './env.js';
export { readLeagueEnv } from './env.js';
export type { LeagueLogger } from './utils/logger.js';
export { Logger, logger } from './utils/logger.js';
