/**
 * Season store contract.
 *
 * The store owns the season's history between races. The engine reads the
 * full history before a race and appends exactly one race record after it.
 */

import type { RaceRecord, SeasonRow, SeasonStandings } from '../types.js';
import { racesToSeasonRows } from '../league.js';

export interface SeasonStore {
  /** Every car's result in every race so far, in race order. */
  loadHistory(): SeasonRow[];
  /** Persist one completed race. */
  appendRace(race: RaceRecord): void;
  /** Persist the current standings tables. */
  saveStandings(standings: SeasonStandings): void;
}

/**
 * In-process store. Keeps copies so callers cannot mutate stored races.
 */
export class MemorySeasonStore implements SeasonStore {
  private readonly races: RaceRecord[];
  private standings: SeasonStandings | null = null;

  constructor(races: readonly RaceRecord[] = []) {
    this.races = races.map(race => structuredClone(race));
  }

  loadHistory(): SeasonRow[] {
    return racesToSeasonRows(this.races);
  }

  appendRace(race: RaceRecord): void {
    if (this.races.some(r => r.raceNum === race.raceNum)) {
      throw new Error(`Race ${race.raceNum} is already stored`);
    }
    this.races.push(structuredClone(race));
  }

  saveStandings(standings: SeasonStandings): void {
    this.standings = structuredClone(standings);
  }

  getRaces(): RaceRecord[] {
    return this.races.map(race => structuredClone(race));
  }

  getStandings(): SeasonStandings | null {
    return this.standings;
  }
}
