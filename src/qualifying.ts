/**
 * Qualifying: weighted random ordering of cars within each team.
 *
 * A car's share of its team's lifetime qualifying points becomes its weight.
 * Each car draws u in [0, 1) and is keyed by u^(1/weight): a larger weight pulls
 * the key toward 1, so strong qualifiers usually rank first but upsets remain
 * possible (weighted sampling without replacement).
 */

import type { Car, Qualifier, SeasonRow } from './types.js';
import { type RandomSource, defaultRandom } from './random.js';

/** Only the best four cars of each team are ranked onto the grid. */
export const MAX_QUALIFIERS_PER_TEAM = 4;

/** Floor for sampling weights; keeps u^(1/weight) finite. */
export const MIN_WEIGHT = 1e-6;

export type QualifyingHistoryRow = Pick<SeasonRow, 'carNumber' | 'driver' | 'team' | 'qualifyingPoints'>;

export interface TeamWeight extends Car {
  /** Sum of qualifying points over all prior races. */
  qualifyingScore: number;
  /** Sum of qualifyingScore over the car's team. */
  teamPoints: number;
  /** Share of teamPoints (or 1 / team size), clamped to [MIN_WEIGHT, 1]. */
  weight: number;
}

function carKey(row: Car): string {
  return `${row.carNumber}\u0000${row.driver}\u0000${row.team}`;
}

function clampWeight(weight: number): number {
  if (Number.isNaN(weight)) return MIN_WEIGHT;
  return Math.min(1, Math.max(MIN_WEIGHT, weight));
}

/**
 * Aggregate season history into per-car qualifying scores and team weights.
 *
 * Cars keep the order in which they first appear in the history. A car with no
 * qualifying points, or any car of a team whose total is zero, gets the
 * equal-split weight 1 / team size rather than a zero share.
 */
export function computeTeamWeights(history: readonly QualifyingHistoryRow[]): TeamWeight[] {
  const scores = new Map<string, Car & { qualifyingScore: number }>();
  for (const row of history) {
    const key = carKey(row);
    const entry = scores.get(key);
    if (entry) {
      entry.qualifyingScore += row.qualifyingPoints;
    } else {
      scores.set(key, {
        carNumber: row.carNumber,
        driver: row.driver,
        team: row.team,
        qualifyingScore: row.qualifyingPoints,
      });
    }
  }

  const teamTotals = new Map<string, { points: number; size: number }>();
  for (const car of scores.values()) {
    const total = teamTotals.get(car.team) ?? { points: 0, size: 0 };
    total.points += car.qualifyingScore;
    total.size += 1;
    teamTotals.set(car.team, total);
  }

  return [...scores.values()].map(car => {
    const total = teamTotals.get(car.team) ?? { points: 0, size: 1 };
    const raw =
      total.points === 0 || car.qualifyingScore === 0
        ? 1 / total.size
        : car.qualifyingScore / total.points;
    return {
      ...car,
      teamPoints: total.points,
      weight: clampWeight(raw),
    };
  });
}

/**
 * Dense descending rank of values (1 = largest, equal values share a rank).
 */
export function denseRankDescending(values: readonly number[]): number[] {
  const distinct = [...new Set(values)].sort((a, b) => b - a);
  const rankOf = new Map(distinct.map((v, i) => [v, i + 1]));
  return values.map(v => rankOf.get(v) ?? distinct.length + 1);
}

/**
 * Produce each team's qualifying order from season history.
 *
 * Returns up to MAX_QUALIFIERS_PER_TEAM cars per team, grouped by team in
 * first-appearance order and sorted by teamPosition. Empty history yields an
 * empty list: the grid builder then falls back to a cold start.
 *
 * @param history - Season rows from every prior race (any order)
 * @param rng - Source for the per-car draws
 */
export function qualifyingSequence(
  history: readonly QualifyingHistoryRow[],
  rng: RandomSource = defaultRandom,
): Qualifier[] {
  if (history.length === 0) return [];

  const weighted = computeTeamWeights(history);
  const keyed = weighted.map(car => ({ car, key: rng() ** (1 / car.weight) }));

  const byTeam = new Map<string, typeof keyed>();
  for (const entry of keyed) {
    const members = byTeam.get(entry.car.team) ?? [];
    members.push(entry);
    byTeam.set(entry.car.team, members);
  }

  const qualifiers: Qualifier[] = [];
  for (const members of byTeam.values()) {
    const ranks = denseRankDescending(members.map(m => m.key));
    const ranked = members
      .map((m, i) => ({ ...m, rank: ranks[i] }))
      .filter(m => m.rank <= MAX_QUALIFIERS_PER_TEAM)
      .sort((a, b) => a.rank - b.rank);

    for (const { car, rank } of ranked) {
      qualifiers.push({
        carNumber: car.carNumber,
        driver: car.driver,
        team: car.team,
        teamPosition: rank,
      });
    }
  }

  return qualifiers;
}
