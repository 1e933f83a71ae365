/**
 * Core type definitions for the league scoring engine.
 *
 * Every record here is plain data: the engine never performs I/O, it only
 * transforms these shapes. Persistence round-trips them unchanged.
 */

// -- Identity --

export interface Car {
  /** Positive integer, unique within a race and across the season for one entrant. */
  carNumber: number;
  driver: string;
  team: string;
}

/** Sentinel finish for a car excluded from the finishing order. */
export const DNQ = 'DNQ';

export type Dnq = typeof DNQ;

/** Finishing position (1 = winner) or the DNQ sentinel. */
export type Finish = number | Dnq;

export function isDnq(value: Finish): value is Dnq {
  return value === DNQ;
}

// -- Qualifying & Grid --

export interface Qualifier extends Car {
  /** Rank within the team (1 = best). */
  teamPosition: number;
}

export interface StartingGridEntry extends Car {
  /** Dense 1..N over the whole grid. */
  startingPosition: number;
}

/** How warm-start grids treat team slots with no qualifier. */
export type GridFillPolicy = 'fill' | 'skip';

// -- Configuration (already parsed by a collaborator) --

/** Points keyed by finish position as a string, or by 'DNQ'. */
export type PointsTable = Record<string, number>;

export interface PointsStructure {
  points?: PointsTable;
  playoffPoints?: PointsTable;
  qualifyingPoints?: PointsTable;
}

/** Team name -> pick order (lower = earlier). */
export type PolePosition = Record<string, number>;

/** Team name -> owner name. */
export type TeamOwners = Record<string, string | null>;

export interface RosterEntry {
  name: string;
  team: string;
}

/** Car number (as a string key) -> roster entry. */
export type DriverRoster = Record<string, RosterEntry>;

export interface TrackInfo {
  name: string;
}

// -- Race Results --

export interface RawFinishInput {
  carNumber: number;
  finish: Finish;
  /** Non-negative turn count. */
  turnsLed: number;
}

export interface ScoredResult extends Car {
  finish: Finish;
  startingPos: number | Dnq;
  turnsLed: number;
  /** Race points including the turns-led bonus. */
  points: number;
  playoffPoints: number;
  /** Rank among teammates who finished (1 = best), 0 for DNQ. */
  relativeFinish: number;
  qualifyingPoints: number;
}

export interface TeamRaceResult {
  position: number;
  team: string;
  totalPoints: number;
  turnsLed: number;
  avgFinish: number;
  drivers: number;
}

export interface RaceRecord {
  /** YYYY-MM-DD */
  date: string;
  raceNum: number;
  trackId: string;
  results: ScoredResult[];
  teamResults: TeamRaceResult[];
}

/** One car's result in one race, flattened with its race identity. */
export interface SeasonRow extends ScoredResult {
  date: string;
  raceNum: number;
  trackId: string;
}

// -- Standings --

export interface DriverStanding extends Car {
  position: number;
  points: number;
  behind: number;
  starts: number;
  wins: number;
  top5s: number;
  top10s: number;
  turnsLed: number;
  playoffPoints: number;
}

export interface OwnerStanding {
  position: number;
  owner: string | null;
  team: string;
  points: number;
  behind: number;
  wins: number;
  top5s: number;
  top10s: number;
}

export interface PlayoffStanding extends Car {
  position: number;
  playoffPoints: number;
  wins: number;
  top5s: number;
  top10s: number;
  turnsLed: number;
  /** Signed gap to the cutline ("+3", "-2"), empty until the field is large enough. */
  margin: string;
}

export interface SeasonStandings {
  drivers: DriverStanding[];
  owners: OwnerStanding[];
  playoffs: PlayoffStanding[];
}
