import { describe, it, expect, afterEach } from 'vitest';
import { cpSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadLeagueConfig, parsePointsStructure, parseTeamOwners } from '../config.js';
import { RecordFormatError } from '../../errors.js';

const configDir = fileURLToPath(new URL('../../../config/', import.meta.url));

describe('loadLeagueConfig', () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
  });

  function copyConfig(): string {
    const dir = mkdtempSync(join(tmpdir(), 'league-config-'));
    tempDirs.push(dir);
    cpSync(configDir, dir, { recursive: true });
    return dir;
  }

  it('loads the bundled league', () => {
    const config = loadLeagueConfig(configDir);

    expect(Object.keys(config.drivers)).toHaveLength(20);
    expect(config.drivers['2']).toEqual({ name: 'Sam Porter', team: 'Red Clay Racing' });
    expect(Object.keys(config.teamOwners)).toEqual([
      'Red Clay Racing',
      'Blue Line Motorsports',
      'Green Flag Garage',
      'Checkered Works',
    ]);
    expect(config.teamOwners['Checkered Works']).toBeNull();
    expect(config.polePosition['Green Flag Garage']).toBe(1);
    expect(config.tracks['bristol-bowl']).toEqual({ name: 'Bristol Bowl' });
    expect(config.points.points?.['1']).toBe(40);
    expect(config.points.qualifyingPoints?.['DNQ']).toBe(0);
  });

  it('puts every driver on a team that has an owner entry', () => {
    const config = loadLeagueConfig(configDir);
    for (const driver of Object.values(config.drivers)) {
      expect(config.teamOwners).toHaveProperty([driver.team]);
    }
  });

  it('rejects a file that is not JSON', () => {
    const dir = copyConfig();
    writeFileSync(join(dir, 'tracks.json'), '{ tracks: ');
    expect(() => loadLeagueConfig(dir)).toThrow(RecordFormatError);
  });

  it('rejects a driver without a team', () => {
    const dir = copyConfig();
    writeFileSync(join(dir, 'drivers.json'), JSON.stringify({ drivers: { '7': { name: 'Gil' } } }));
    expect(() => loadLeagueConfig(dir)).toThrow(`${join(dir, 'drivers.json')}: team must be a string`);
  });
});

describe('parseTeamOwners', () => {
  it('accepts null owners and rejects other values', () => {
    expect(parseTeamOwners({ A: 'Owner A', B: null }, 'owners')).toEqual({ A: 'Owner A', B: null });
    expect(() => parseTeamOwners({ A: 3 }, 'owners')).toThrow('owners: teamOwners.A must be a string or null');
  });
});

describe('parsePointsStructure', () => {
  it('leaves missing tables undefined', () => {
    expect(parsePointsStructure({ points: { '1': 40 } }, 'points')).toEqual({ points: { '1': 40 } });
  });

  it('rejects non-numeric entries', () => {
    expect(() => parsePointsStructure({ playoffPoints: { '1': 'ten' } }, 'points')).toThrow(
      'points playoffPoints: 1 must be a number',
    );
  });
});
