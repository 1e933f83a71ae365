/**
 * League Race Lifecycle
 *
 * Ties the stages together for one race:
 *   1. prepareRace(): qualifying from season history, then the starting grid
 *   2. completeRace(): score the finish input and summarize teams
 *   3. computeSeasonStandings(): re-rank the season (standings module)
 *
 * Season history is owned by the caller (see season/store.ts): read it in full
 * before a race, append exactly one RaceRecord after.
 */

import type {
  Car,
  DriverRoster,
  GridFillPolicy,
  PointsStructure,
  PolePosition,
  Qualifier,
  RaceRecord,
  RawFinishInput,
  SeasonRow,
  StartingGridEntry,
} from './types.js';
import { type RandomSource, defaultRandom } from './random.js';
import { type QualifyingHistoryRow, qualifyingSequence } from './qualifying.js';
import { buildStartingGrid } from './grid.js';
import { scoreRace, computeTeamRaceResults } from './scoring.js';

// -- Race Setup --

export interface RaceSetupConfig {
  /** Season rows from every prior race. */
  history: readonly QualifyingHistoryRow[];
  /** Teams taking part (any order; pole rank decides grid order). */
  teams: readonly string[];
  polePosition: PolePosition;
  roster: readonly Car[];
  rng?: RandomSource;
  fillPolicy?: GridFillPolicy;
}

export interface PreparedRace {
  qualifiers: Qualifier[];
  grid: StartingGridEntry[];
}

/**
 * Run qualifying and build the grid. An empty grid means there is no race.
 */
export function prepareRace(config: RaceSetupConfig): PreparedRace {
  const rng = config.rng ?? defaultRandom;
  const qualifiers = qualifyingSequence(config.history, rng);
  const grid = buildStartingGrid({
    teams: config.teams,
    polePosition: config.polePosition,
    qualifiers,
    roster: config.roster,
    rng,
    fillPolicy: config.fillPolicy,
  });
  return { qualifiers, grid };
}

// -- Race Completion --

export interface RaceCompletion {
  grid: readonly StartingGridEntry[];
  finishers: readonly RawFinishInput[];
  points: PointsStructure;
  /** YYYY-MM-DD */
  date: string;
  raceNum: number;
  trackId: string;
}

/**
 * Score a finished race into the record the season store persists.
 *
 * @throws Error when the grid is empty
 * @throws LookupError when the finish input names a car not on the grid
 */
export function completeRace(completion: RaceCompletion): RaceRecord {
  if (completion.grid.length === 0) {
    throw new Error('Cannot score a race with an empty grid');
  }

  const { results, mostLedTeam } = scoreRace(completion.grid, completion.finishers, completion.points);
  const teamResults = computeTeamRaceResults(results, mostLedTeam);

  return {
    date: completion.date,
    raceNum: completion.raceNum,
    trackId: completion.trackId,
    results,
    teamResults,
  };
}

// -- Season Helpers --

/** 1 for an empty season, otherwise one past the highest race number. */
export function nextRaceNumber(history: ReadonlyArray<Pick<SeasonRow, 'raceNum'>>): number {
  return history.reduce((max, row) => Math.max(max, row.raceNum), 0) + 1;
}

/** Flatten race records into one season row per car per race. */
export function racesToSeasonRows(races: readonly RaceRecord[]): SeasonRow[] {
  return races.flatMap(race =>
    race.results.map(result => ({
      date: race.date,
      raceNum: race.raceNum,
      trackId: race.trackId,
      ...result,
    })),
  );
}

/** Convert the roster configuration into cars, ordered by car number. */
export function rosterFromDrivers(drivers: DriverRoster): Car[] {
  return Object.entries(drivers)
    .map(([carNumber, info]) => ({
      carNumber: Number(carNumber),
      driver: info.name,
      team: info.team,
    }))
    .sort((a, b) => a.carNumber - b.carNumber);
}

/** Format a date as YYYY-MM-DD (UTC). */
export function formatRaceDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
