/**
 * Season standings: driver, owner and playoff tables.
 *
 * Each view groups season rows by entity (first-appearance order), sums its
 * metrics, stable-sorts on its tie-break keys (all descending) and assigns
 * positions 1..N.
 *
 *   Driver:  points, wins, top5s, top10s, turnsLed
 *   Owner:   points, wins, top5s, top10s
 *   Playoff: playoffPoints, wins, top5s, top10s, turnsLed
 */

import type {
  Car,
  DriverStanding,
  Finish,
  OwnerStanding,
  PlayoffStanding,
  SeasonRow,
  SeasonStandings,
  TeamOwners,
} from '../types.js';
import { isDnq } from '../types.js';

/** Last position inside the playoff field. */
export const PLAYOFF_CUTLINE = 12;

/** Rows kept in the playoff table. */
export const PLAYOFF_TABLE_SIZE = 24;

export type StandingsRow = Pick<
  SeasonRow,
  'carNumber' | 'driver' | 'team' | 'finish' | 'points' | 'playoffPoints' | 'turnsLed'
>;

interface FinishCounts {
  starts: number;
  wins: number;
  top5s: number;
  top10s: number;
}

function countFinish(counts: FinishCounts, finish: Finish): void {
  if (isDnq(finish)) return;
  counts.starts += 1;
  if (finish === 1) counts.wins += 1;
  if (finish <= 5) counts.top5s += 1;
  if (finish <= 10) counts.top10s += 1;
}

interface CarTotals extends Car, FinishCounts {
  points: number;
  playoffPoints: number;
  turnsLed: number;
}

function groupBy<K, V>(
  rows: readonly StandingsRow[],
  keyOf: (row: StandingsRow) => K,
  init: (row: StandingsRow) => V,
  add: (acc: V, row: StandingsRow) => void,
): V[] {
  const groups = new Map<K, V>();
  for (const row of rows) {
    const key = keyOf(row);
    let acc = groups.get(key);
    if (acc === undefined) {
      acc = init(row);
      groups.set(key, acc);
    }
    add(acc, row);
  }
  return [...groups.values()];
}

function totalsByCar(rows: readonly StandingsRow[]): CarTotals[] {
  return groupBy(
    rows,
    row => `${row.carNumber}\u0000${row.driver}\u0000${row.team}`,
    (row): CarTotals => ({
      carNumber: row.carNumber,
      driver: row.driver,
      team: row.team,
      points: 0,
      playoffPoints: 0,
      turnsLed: 0,
      starts: 0,
      wins: 0,
      top5s: 0,
      top10s: 0,
    }),
    (acc, row) => {
      acc.points += row.points;
      acc.playoffPoints += row.playoffPoints;
      acc.turnsLed += row.turnsLed;
      countFinish(acc, row.finish);
    },
  );
}

/**
 * Stable sort, descending on each key in turn.
 */
export function rankBy<T>(rows: readonly T[], keys: ReadonlyArray<(row: T) => number>): T[] {
  return [...rows].sort((a, b) => {
    for (const key of keys) {
      const diff = key(b) - key(a);
      if (diff !== 0) return diff;
    }
    return 0;
  });
}

function maxOf(values: readonly number[]): number {
  return values.reduce((max, v) => (v > max ? v : max), -Infinity);
}

/**
 * Driver championship table. `behind` is the gap to the season's top points.
 */
export function driverStandings(rows: readonly StandingsRow[]): DriverStanding[] {
  const totals = totalsByCar(rows);
  const leader = maxOf(totals.map(t => t.points));

  const ranked = rankBy(totals, [t => t.points, t => t.wins, t => t.top5s, t => t.top10s, t => t.turnsLed]);

  return ranked.map((t, i) => ({
    position: i + 1,
    carNumber: t.carNumber,
    driver: t.driver,
    team: t.team,
    points: t.points,
    behind: leader - t.points,
    starts: t.starts,
    wins: t.wins,
    top5s: t.top5s,
    top10s: t.top10s,
    turnsLed: t.turnsLed,
    playoffPoints: t.playoffPoints,
  }));
}

/**
 * Owner championship table, one row per team. Teams with no owner mapping
 * report owner null.
 */
export function ownerStandings(rows: readonly StandingsRow[], teamOwners: TeamOwners): OwnerStanding[] {
  const totals = groupBy(
    rows,
    row => row.team,
    row => ({ team: row.team, points: 0, starts: 0, wins: 0, top5s: 0, top10s: 0 }),
    (acc, row) => {
      acc.points += row.points;
      countFinish(acc, row.finish);
    },
  );
  const leader = maxOf(totals.map(t => t.points));

  const ranked = rankBy(totals, [t => t.points, t => t.wins, t => t.top5s, t => t.top10s]);

  return ranked.map((t, i) => ({
    position: i + 1,
    owner: teamOwners[t.team] ?? null,
    team: t.team,
    points: t.points,
    behind: leader - t.points,
    wins: t.wins,
    top5s: t.top5s,
    top10s: t.top10s,
  }));
}

function formatMargin(delta: number): string {
  return delta < 0 ? `${delta}` : `+${delta}`;
}

/**
 * Playoff table with margins to the cutline.
 *
 * Once at least PLAYOFF_CUTLINE + 1 drivers are ranked, rows inside the cutline
 * show their lead over the first driver outside it, and rows outside show
 * their deficit to the last driver inside. Truncated to PLAYOFF_TABLE_SIZE rows.
 */
export function playoffStandings(rows: readonly StandingsRow[]): PlayoffStanding[] {
  const ranked = rankBy(totalsByCar(rows), [
    t => t.playoffPoints,
    t => t.wins,
    t => t.top5s,
    t => t.top10s,
    t => t.turnsLed,
  ]);

  const hasCutline = ranked.length > PLAYOFF_CUTLINE;
  const lastIn = hasCutline ? ranked[PLAYOFF_CUTLINE - 1].playoffPoints : 0;
  const firstOut = hasCutline ? ranked[PLAYOFF_CUTLINE].playoffPoints : 0;

  return ranked.slice(0, PLAYOFF_TABLE_SIZE).map((t, i) => {
    const position = i + 1;
    let margin = '';
    if (hasCutline) {
      margin = formatMargin(
        position <= PLAYOFF_CUTLINE ? t.playoffPoints - firstOut : t.playoffPoints - lastIn,
      );
    }
    return {
      position,
      carNumber: t.carNumber,
      driver: t.driver,
      team: t.team,
      playoffPoints: t.playoffPoints,
      wins: t.wins,
      top5s: t.top5s,
      top10s: t.top10s,
      turnsLed: t.turnsLed,
      margin,
    };
  });
}

/** All three standings views for a season. */
export function computeSeasonStandings(
  rows: readonly StandingsRow[],
  teamOwners: TeamOwners,
): SeasonStandings {
  return {
    drivers: driverStandings(rows),
    owners: ownerStandings(rows, teamOwners),
    playoffs: playoffStandings(rows),
  };
}
