/**
 * Starting grid construction.
 *
 * Each team fields up to carsPerTeam(teamCount) cars. The grid is built by
 * walking team slots 1..carsPerTeam and, at each slot, placing one car per team
 * in pole order. Starting positions are dense 1..N across the whole field.
 *
 *   - Cold start (no qualifiers yet): every team's cars are a uniform random
 *     pick from its roster.
 *   - Warm start: each team's qualifiers fill slots in teamPosition order.
 *     Under the 'fill' policy, slots without a qualifier take random roster
 *     cars that are not yet on the grid; under 'skip' they stay empty.
 *
 * A car number appears at most once on the grid.
 */

import type {
  Car,
  GridFillPolicy,
  PolePosition,
  Qualifier,
  StartingGridEntry,
} from './types.js';
import { type RandomSource, defaultRandom, sample } from './random.js';

export interface GridOptions {
  /** Teams taking part in this race. */
  teams: readonly string[];
  polePosition: PolePosition;
  /** Output of qualifyingSequence(); empty for the season's first race. */
  qualifiers: readonly Qualifier[];
  /** Every car registered in the league. */
  roster: readonly Car[];
  rng?: RandomSource;
  /** Defaults to 'fill'. */
  fillPolicy?: GridFillPolicy;
}

/**
 * Cars each team fields, by number of teams in the race.
 * Fixed game-balance rule: 2 → 6, 3 → 5, 4 → 4, otherwise 3.
 */
export function carsPerTeam(teamCount: number): number {
  switch (teamCount) {
    case 2:
      return 6;
    case 3:
      return 5;
    case 4:
      return 4;
    default:
      return 3;
  }
}

/**
 * Order teams by pole rank (ascending). Teams without a pole rank follow in
 * their given order.
 */
export function teamsInPoleOrder(teams: readonly string[], polePosition: PolePosition): string[] {
  const ranked = teams
    .map((team, index) => ({ team, index, rank: polePosition[team] ?? Infinity }))
    .sort((a, b) => {
      if (a.rank !== b.rank) return a.rank < b.rank ? -1 : 1;
      return a.index - b.index;
    });
  return ranked.map(r => r.team);
}

function rosterOf(roster: readonly Car[], team: string): Car[] {
  return roster.filter(car => car.team === team);
}

/**
 * Qualifiers keyed to the cars they now are. A car number that qualified more
 * than once (driver change, team move) keeps only its best-ranked entry, and
 * takes the roster's current driver and team when the roster knows it.
 */
function resolveQualifiers(qualifiers: readonly Qualifier[], roster: readonly Car[]): Car[] {
  const current = new Map(roster.map(car => [car.carNumber, car]));
  const seen = new Set<number>();
  const resolved: Car[] = [];
  for (const q of [...qualifiers].sort((a, b) => a.teamPosition - b.teamPosition)) {
    if (seen.has(q.carNumber)) continue;
    seen.add(q.carNumber);
    resolved.push(current.get(q.carNumber) ?? { carNumber: q.carNumber, driver: q.driver, team: q.team });
  }
  return resolved;
}

function warmSelection(
  team: string,
  qualified: readonly Car[],
  roster: readonly Car[],
  slots: number,
  fillPolicy: GridFillPolicy,
  taken: Set<number>,
  rng: RandomSource,
): Car[] {
  const placed = qualified.filter(car => car.team === team).slice(0, slots);
  for (const car of placed) taken.add(car.carNumber);

  const needed = slots - placed.length;
  if (fillPolicy === 'skip' || needed <= 0) return placed;

  const fill = sample(
    rosterOf(roster, team).filter(car => !taken.has(car.carNumber)),
    needed,
    rng,
  );
  for (const car of fill) taken.add(car.carNumber);
  return [...placed, ...fill];
}

/**
 * Build the starting grid for a race.
 *
 * Returns an empty grid when no team has a car to field; callers treat that as
 * "no race".
 */
export function buildStartingGrid(options: GridOptions): StartingGridEntry[] {
  const {
    teams,
    polePosition,
    qualifiers,
    roster,
    rng = defaultRandom,
    fillPolicy = 'fill',
  } = options;

  const slots = carsPerTeam(teams.length);
  const ordered = teamsInPoleOrder(teams, polePosition);

  const qualified = resolveQualifiers(qualifiers, roster);
  // Car numbers already on the grid, across every team.
  const taken = new Set<number>();

  const selections = new Map<string, Car[]>();
  for (const team of ordered) {
    selections.set(
      team,
      qualifiers.length === 0
        ? sample(rosterOf(roster, team), slots, rng)
        : warmSelection(team, qualified, roster, slots, fillPolicy, taken, rng),
    );
  }

  const grid: StartingGridEntry[] = [];
  for (let slot = 0; slot < slots; slot++) {
    for (const team of ordered) {
      const car = selections.get(team)?.[slot];
      if (!car) continue;
      grid.push({ ...car, startingPosition: grid.length + 1 });
    }
  }

  return grid;
}
