import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileSeasonStore } from '../file-store.js';
import { MemorySeasonStore } from '../store.js';
import { racesToSeasonRows } from '../../league.js';
import { RecordFormatError } from '../../errors.js';
import type { RaceRecord, SeasonStandings } from '../../types.js';

// -- Test Helpers --

function makeRace(raceNum: number, date = '2024-05-01'): RaceRecord {
  return {
    date,
    raceNum,
    trackId: 'bristol-bowl',
    results: [
      {
        finish: 1, carNumber: 7, driver: 'Smith, Jr.', team: 'B', startingPos: 2,
        turnsLed: 3, points: 43, playoffPoints: 10, relativeFinish: 1, qualifyingPoints: 10,
      },
      {
        finish: 'DNQ', carNumber: 1, driver: 'Ann', team: 'A', startingPos: 'DNQ',
        turnsLed: 0, points: 0, playoffPoints: 0, relativeFinish: 0, qualifyingPoints: 0,
      },
    ],
    teamResults: [
      { position: 1, team: 'B', totalPoints: 44, turnsLed: 3, avgFinish: 1, drivers: 1 },
      { position: 2, team: 'A', totalPoints: 0, turnsLed: 0, avgFinish: 0, drivers: 1 },
    ],
  };
}

let dataDir: string;
let store: FileSeasonStore;

beforeEach(() => {
  dataDir = mkdtempSync(join(tmpdir(), 'league-store-'));
  store = new FileSeasonStore({ dataDir, season: 2 });
});

afterEach(() => {
  rmSync(dataDir, { recursive: true, force: true });
});

// =============================================
// FileSeasonStore
// =============================================

describe('FileSeasonStore', () => {
  it('starts with an empty history', () => {
    expect(store.loadHistory()).toEqual([]);
    expect(store.loadRaces()).toEqual([]);
  });

  it('writes the race record as JSON', () => {
    const race = makeRace(1);
    store.appendRace(race);

    const path = join(dataDir, 'raw', 'race_2024-05-01_r1.json');
    expect(store.racePath(race)).toBe(path);
    expect(JSON.parse(readFileSync(path, 'utf-8'))).toEqual(race);
  });

  it('rebuilds the season CSV after each race and reads it back', () => {
    store.appendRace(makeRace(1));
    store.appendRace(makeRace(2, '2024-05-08'));

    expect(store.seasonCsvPath).toBe(join(dataDir, 'season', 'season_2_results.csv'));
    const lines = readFileSync(store.seasonCsvPath, 'utf-8').split('\n');
    expect(lines[0]).toBe(
      'date,raceNum,trackId,finish,carNumber,driver,team,startingPos,turnsLed,points,playoffPoints,relativeFinish,qualifyingPoints',
    );
    expect(lines[1]).toBe('2024-05-01,1,bristol-bowl,1,7,"Smith, Jr.",B,2,3,43,10,1,10');
    expect(lines[2]).toBe('2024-05-01,1,bristol-bowl,DNQ,1,Ann,A,DNQ,0,0,0,0,0');

    expect(store.loadHistory()).toEqual(racesToSeasonRows([makeRace(1), makeRace(2, '2024-05-08')]));
  });

  it('orders races by race number rather than file name', () => {
    store.appendRace(makeRace(10, '2024-05-01'));
    store.appendRace(makeRace(2, '2024-05-01'));
    expect(store.loadRaces().map(r => r.raceNum)).toEqual([2, 10]);
  });

  it('flattens race files when no season CSV exists', () => {
    mkdirSync(join(dataDir, 'raw'), { recursive: true });
    writeFileSync(join(dataDir, 'raw', 'race_2024-05-01_r1.json'), JSON.stringify(makeRace(1)));

    expect(existsSync(store.seasonCsvPath)).toBe(false);
    expect(store.loadHistory()).toHaveLength(2);
  });

  it('refuses to store the same race number twice', () => {
    store.appendRace(makeRace(1));
    expect(() => store.appendRace(makeRace(1, '2024-06-01'))).toThrow('Race 1 is already stored');
  });

  it('rejects a race file that is not valid JSON', () => {
    mkdirSync(join(dataDir, 'raw'), { recursive: true });
    writeFileSync(join(dataDir, 'raw', 'race_bad.json'), '{ nope');
    expect(() => store.loadRaces()).toThrow(RecordFormatError);
  });

  it('rejects a season CSV with non-numeric cells', () => {
    mkdirSync(join(dataDir, 'season'), { recursive: true });
    writeFileSync(
      store.seasonCsvPath,
      'date,raceNum,trackId,finish,carNumber,driver,team,startingPos,turnsLed,points,playoffPoints,relativeFinish,qualifyingPoints\n' +
        '2024-05-01,one,oval,1,7,Gil,B,1,0,40,10,1,14\n',
    );
    expect(() => store.loadHistory()).toThrow('raceNum must be numeric, got "one"');
  });

  it('writes the three standings tables', () => {
    const standings: SeasonStandings = {
      drivers: [
        {
          position: 1, carNumber: 7, driver: 'Gil', team: 'B', points: 40, behind: 0,
          starts: 1, wins: 1, top5s: 1, top10s: 1, turnsLed: 3, playoffPoints: 10,
        },
      ],
      owners: [{ position: 1, owner: null, team: 'B', points: 40, behind: 0, wins: 1, top5s: 1, top10s: 1 }],
      playoffs: [
        {
          position: 1, carNumber: 7, driver: 'Gil', team: 'B', playoffPoints: 10,
          wins: 1, top5s: 1, top10s: 1, turnsLed: 3, margin: '',
        },
      ],
    };
    store.saveStandings(standings);

    const read = (name: string) => readFileSync(join(dataDir, 'season', name), 'utf-8').split('\n');
    expect(read('driver_standings.csv').slice(0, 2)).toEqual([
      'position,carNumber,driver,team,points,behind,starts,wins,top5s,top10s,turnsLed,playoffPoints',
      '1,7,Gil,B,40,0,1,1,1,1,3,10',
    ]);
    expect(read('owner_standings.csv').slice(0, 2)).toEqual([
      'position,owner,team,points,behind,wins,top5s,top10s',
      '1,,B,40,0,1,1,1',
    ]);
    expect(read('playoff_standings.csv').slice(0, 2)).toEqual([
      'position,carNumber,driver,team,playoffPoints,wins,top5s,top10s,turnsLed,margin',
      '1,7,Gil,B,10,1,1,1,3,',
    ]);
  });
});

// =============================================
// MemorySeasonStore
// =============================================

describe('MemorySeasonStore', () => {
  it('appends races and flattens them into history', () => {
    const memory = new MemorySeasonStore();
    memory.appendRace(makeRace(1));
    expect(memory.loadHistory()).toEqual(racesToSeasonRows([makeRace(1)]));
  });

  it('stores copies of appended races', () => {
    const memory = new MemorySeasonStore();
    const race = makeRace(1);
    memory.appendRace(race);
    race.results[0].points = 999;
    expect(memory.getRaces()[0].results[0].points).toBe(43);
  });

  it('refuses duplicate race numbers', () => {
    const memory = new MemorySeasonStore([makeRace(1)]);
    expect(() => memory.appendRace(makeRace(1))).toThrow('Race 1 is already stored');
  });

  it('keeps the last saved standings', () => {
    const memory = new MemorySeasonStore();
    expect(memory.getStandings()).toBeNull();
    memory.saveStandings({ drivers: [], owners: [], playoffs: [] });
    expect(memory.getStandings()).toEqual({ drivers: [], owners: [], playoffs: [] });
  });
});
