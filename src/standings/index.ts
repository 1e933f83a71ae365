/**
 * Standings Module: season-wide driver, owner and playoff tables.
 */

export type { StandingsRow } from './standings.js';

export {
  PLAYOFF_CUTLINE,
  PLAYOFF_TABLE_SIZE,
  rankBy,
  driverStandings,
  ownerStandings,
  playoffStandings,
  computeSeasonStandings,
} from './standings.js';
