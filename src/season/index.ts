/**
 * Season Module: persistence and configuration collaborators of the engine.
 */

export type { SeasonStore } from './store.js';
export { MemorySeasonStore } from './store.js';

export type { FileSeasonStoreConfig } from './file-store.js';
export { FileSeasonStore } from './file-store.js';

export type { LeagueConfig } from './config.js';
export {
  loadLeagueConfig,
  parseDrivers,
  parseTeamOwners,
  parseTracks,
  parsePointsStructure,
} from './config.js';

export {
  SEASON_COLUMNS,
  parseRaceRecord,
  parseScoredResult,
  seasonRowFromCsv,
} from './codec.js';
