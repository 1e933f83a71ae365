/**
 * File-backed season store.
 *
 * Layout under dataDir:
 *   raw/race_<date>_r<raceNum>.json       one record per race (source of truth)
 *   season/season_<season>_results.csv   flattened rows, rebuilt after each race
 *   season/{driver,owner,playoff}_standings.csv
 */

import { existsSync, mkdirSync, readFileSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import type { RaceRecord, SeasonRow, SeasonStandings } from '../types.js';
import { RecordFormatError } from '../errors.js';
import { racesToSeasonRows } from '../league.js';
import type { SeasonStore } from './store.js';
import { SEASON_COLUMNS, expectArray, isRecord, parseRaceRecord, seasonRowFromCsv } from './codec.js';

export interface FileSeasonStoreConfig {
  dataDir: string;
  /** Season number used in the results CSV name. */
  season: number;
}

const RACE_FILE_PATTERN = /^race_.*\.json$/;

const DRIVER_COLUMNS = [
  'position', 'carNumber', 'driver', 'team', 'points', 'behind',
  'starts', 'wins', 'top5s', 'top10s', 'turnsLed', 'playoffPoints',
];
const OWNER_COLUMNS = ['position', 'owner', 'team', 'points', 'behind', 'wins', 'top5s', 'top10s'];
const PLAYOFF_COLUMNS = [
  'position', 'carNumber', 'driver', 'team', 'playoffPoints',
  'wins', 'top5s', 'top10s', 'turnsLed', 'margin',
];

function toCsv(rows: readonly object[], columns: readonly string[]): string {
  return stringify([...rows], { header: true, columns: [...columns] });
}

function readJson(path: string): unknown {
  try {
    return JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RecordFormatError(path, `invalid JSON (${reason})`);
  }
}

export class FileSeasonStore implements SeasonStore {
  readonly rawDir: string;
  readonly seasonDir: string;
  readonly seasonCsvPath: string;

  constructor(config: FileSeasonStoreConfig) {
    this.rawDir = join(config.dataDir, 'raw');
    this.seasonDir = join(config.dataDir, 'season');
    this.seasonCsvPath = join(this.seasonDir, `season_${config.season}_results.csv`);
  }

  /** Path a race record is written to. */
  racePath(race: Pick<RaceRecord, 'date' | 'raceNum'>): string {
    return join(this.rawDir, `race_${race.date}_r${race.raceNum}.json`);
  }

  /** All stored race records, ordered by race number. */
  loadRaces(): RaceRecord[] {
    if (!existsSync(this.rawDir)) return [];
    return readdirSync(this.rawDir)
      .filter(name => RACE_FILE_PATTERN.test(name))
      .sort()
      .map(name => {
        const path = join(this.rawDir, name);
        return parseRaceRecord(readJson(path), path);
      })
      .sort((a, b) => a.raceNum - b.raceNum);
  }

  /** Read the season CSV, or flatten the race files when it does not exist yet. */
  loadHistory(): SeasonRow[] {
    if (!existsSync(this.seasonCsvPath)) return racesToSeasonRows(this.loadRaces());

    const parsed: unknown = parse(readFileSync(this.seasonCsvPath, 'utf-8'), {
      columns: true,
      skip_empty_lines: true,
    });

    return expectArray(parsed, this.seasonCsvPath, 'rows').map((row, i) => {
      const source = `${this.seasonCsvPath} row ${i + 2}`;
      if (!isRecord(row)) throw new RecordFormatError(source, 'row must be an object');
      const cells: Record<string, string> = {};
      for (const [key, value] of Object.entries(row)) cells[key] = String(value);
      return seasonRowFromCsv(cells, source);
    });
  }

  appendRace(race: RaceRecord): void {
    const path = this.racePath(race);
    if (this.loadRaces().some(r => r.raceNum === race.raceNum)) {
      throw new Error(`Race ${race.raceNum} is already stored`);
    }
    mkdirSync(this.rawDir, { recursive: true });
    writeFileSync(path, JSON.stringify(race, null, 2) + '\n', 'utf-8');
    this.rebuildSeasonCsv();
  }

  /** Rewrite the season CSV from every race file; returns the rows written. */
  rebuildSeasonCsv(): SeasonRow[] {
    const rows = racesToSeasonRows(this.loadRaces());
    mkdirSync(this.seasonDir, { recursive: true });
    writeFileSync(this.seasonCsvPath, toCsv(rows, SEASON_COLUMNS), 'utf-8');
    return rows;
  }

  saveStandings(standings: SeasonStandings): void {
    mkdirSync(this.seasonDir, { recursive: true });
    writeFileSync(join(this.seasonDir, 'driver_standings.csv'), toCsv(standings.drivers, DRIVER_COLUMNS), 'utf-8');
    writeFileSync(
      join(this.seasonDir, 'owner_standings.csv'),
      toCsv(
        standings.owners.map(o => ({ ...o, owner: o.owner ?? '' })),
        OWNER_COLUMNS,
      ),
      'utf-8',
    );
    writeFileSync(join(this.seasonDir, 'playoff_standings.csv'), toCsv(standings.playoffs, PLAYOFF_COLUMNS), 'utf-8');
  }
}
