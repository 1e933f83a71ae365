/**
 * Race scoring: per-car results and per-team race summaries.
 *
 * Per car:
 *   DNQ       → points, playoff and qualifying points from the 'DNQ' entries
 *   finisher  → points[finish] + turns led, playoffPoints[finish],
 *               qualifyingPoints[finish] (+4 from pole), rank among teammates
 *
 * Per team: summed points with +1 for the team that led the most turns.
 */

import type {
  PointsStructure,
  PointsTable,
  RawFinishInput,
  ScoredResult,
  StartingGridEntry,
  TeamRaceResult,
} from './types.js';
import { DNQ, isDnq } from './types.js';
import { LookupError } from './errors.js';

/** Qualifying points for starting on pole, regardless of the result. */
export const POLE_BONUS = 4;

/** Team race bonus for leading the most turns. */
export const TEAM_TURNS_LED_BONUS = 1;

export interface ScoredRace {
  /** One row per finish input, in input order. */
  results: ScoredResult[];
  /** Team with the strictly greatest turns led, or null if nobody led. */
  mostLedTeam: string | null;
}

/** Look up a points table entry; absent tables and keys score 0. */
export function lookupPoints(table: PointsTable | undefined, key: number | string): number {
  return table?.[String(key)] ?? 0;
}

/**
 * Qualifying points for a finish, plus the pole bonus when the car started first.
 */
export function calculateQualifyingPoints(
  finish: number,
  startingPos: number,
  points: PointsStructure,
): number {
  const base = lookupPoints(points.qualifyingPoints, finish);
  return startingPos === 1 ? base + POLE_BONUS : base;
}

function indexGrid(grid: readonly StartingGridEntry[]): Map<number, StartingGridEntry> {
  const byCar = new Map<number, StartingGridEntry>();
  for (const entry of grid) byCar.set(entry.carNumber, entry);
  return byCar;
}

function gridEntryFor(
  byCar: Map<number, StartingGridEntry>,
  carNumber: number,
): StartingGridEntry {
  const entry = byCar.get(carNumber);
  if (!entry) throw new LookupError('car', carNumber, 'not on the starting grid');
  return entry;
}

/**
 * Pick the team that led the most turns. Ties go to the team seen first;
 * no team qualifies when every total is zero.
 */
export function findMostLedTeam(teamTurnsLed: ReadonlyMap<string, number>): string | null {
  let best: string | null = null;
  let bestTurns = 0;
  for (const [team, turns] of teamTurnsLed) {
    if (turns > bestTurns) {
      best = team;
      bestTurns = turns;
    }
  }
  return best;
}

/**
 * Score a completed race.
 *
 * @param grid - Starting grid the race was run from
 * @param finishers - One entry per grid car; non-finishers carry finish 'DNQ'
 * @param points - Points configuration
 * @throws LookupError when an entry names a car that is not on the grid or
 *   names the same car twice
 */
export function scoreRace(
  grid: readonly StartingGridEntry[],
  finishers: readonly RawFinishInput[],
  points: PointsStructure,
): ScoredRace {
  const byCar = indexGrid(grid);

  const seen = new Set<number>();
  const teamFinishes = new Map<string, number[]>();
  const teamTurnsLed = new Map<string, number>();

  for (const input of finishers) {
    const entry = gridEntryFor(byCar, input.carNumber);
    if (seen.has(input.carNumber)) {
      throw new LookupError('car', input.carNumber, 'listed more than once');
    }
    seen.add(input.carNumber);

    if (isDnq(input.finish)) continue;
    const finishes = teamFinishes.get(entry.team) ?? [];
    finishes.push(input.finish);
    teamFinishes.set(entry.team, finishes);
    teamTurnsLed.set(entry.team, (teamTurnsLed.get(entry.team) ?? 0) + input.turnsLed);
  }

  for (const finishes of teamFinishes.values()) finishes.sort((a, b) => a - b);

  const results = finishers.map((input): ScoredResult => {
    const entry = gridEntryFor(byCar, input.carNumber);
    const car = { carNumber: entry.carNumber, driver: entry.driver, team: entry.team };

    if (isDnq(input.finish)) {
      return {
        ...car,
        finish: DNQ,
        startingPos: DNQ,
        turnsLed: 0,
        points: lookupPoints(points.points, DNQ),
        playoffPoints: lookupPoints(points.playoffPoints, DNQ),
        relativeFinish: 0,
        qualifyingPoints: lookupPoints(points.qualifyingPoints, DNQ),
      };
    }

    const teammates = teamFinishes.get(entry.team) ?? [];
    return {
      ...car,
      finish: input.finish,
      startingPos: entry.startingPosition,
      turnsLed: input.turnsLed,
      points: lookupPoints(points.points, input.finish) + input.turnsLed,
      playoffPoints: lookupPoints(points.playoffPoints, input.finish),
      relativeFinish: teammates.indexOf(input.finish) + 1,
      qualifyingPoints: calculateQualifyingPoints(input.finish, entry.startingPosition, points),
    };
  });

  return { results, mostLedTeam: findMostLedTeam(teamTurnsLed) };
}

/** Nearest hundredth. Averages of up to six integer finishes never land on a half-hundredth. */
function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Summarize a scored race per team.
 *
 * Teams are grouped in first-appearance order, then stable-sorted by total
 * points (descending). The turns-led bonus goes to mostLedTeam exactly once.
 */
export function computeTeamRaceResults(
  results: readonly ScoredResult[],
  mostLedTeam: string | null,
): TeamRaceResult[] {
  const teams = new Map<string, { points: number; turnsLed: number; finishes: number[]; drivers: number }>();

  for (const row of results) {
    const team = teams.get(row.team) ?? { points: 0, turnsLed: 0, finishes: [], drivers: 0 };
    team.points += row.points;
    team.turnsLed += row.turnsLed;
    team.drivers += 1;
    if (!isDnq(row.finish)) team.finishes.push(row.finish);
    teams.set(row.team, team);
  }

  const summaries = [...teams].map(([team, agg]) => ({
    team,
    totalPoints: agg.points + (team === mostLedTeam ? TEAM_TURNS_LED_BONUS : 0),
    turnsLed: agg.turnsLed,
    avgFinish:
      agg.finishes.length === 0
        ? 0
        : roundTo2(agg.finishes.reduce((sum, f) => sum + f, 0) / agg.finishes.length),
    drivers: agg.drivers,
  }));

  summaries.sort((a, b) => b.totalPoints - a.totalPoints);

  return summaries.map((s, i) => ({ position: i + 1, ...s }));
}
