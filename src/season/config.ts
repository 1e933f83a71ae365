/**
 * League configuration files.
 *
 *   drivers.json           { "drivers": { "<carNumber>": { "name", "team" } } }
 *   team_owners.json       { "teamOwners": { "<team>": "<owner>" | null } }
 *   pole_position.json     { "polePosition": { "<team>": <rank> } }
 *   tracks.json            { "tracks": { "<trackId>": { "name" } } }
 *   points_structure.json  { "points", "playoffPoints", "qualifyingPoints" }
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type {
  DriverRoster,
  PointsStructure,
  PolePosition,
  TeamOwners,
  TrackInfo,
} from '../types.js';
import { RecordFormatError } from '../errors.js';
import { expectRecord, readNumberMap, readString } from './codec.js';

export interface LeagueConfig {
  drivers: DriverRoster;
  teamOwners: TeamOwners;
  polePosition: PolePosition;
  tracks: Record<string, TrackInfo>;
  points: PointsStructure;
}

function loadJson(configDir: string, file: string): { source: string; data: Record<string, unknown> } {
  const source = join(configDir, file);
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(source, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RecordFormatError(source, `cannot read config (${reason})`);
  }
  return { source, data: expectRecord(data, source, 'document') };
}

export function parseDrivers(value: unknown, source: string): DriverRoster {
  const drivers = expectRecord(value, source, 'drivers');
  const roster: DriverRoster = {};
  for (const [carNumber, info] of Object.entries(drivers)) {
    const entry = expectRecord(info, source, `drivers.${carNumber}`);
    roster[carNumber] = {
      name: readString(entry, 'name', source),
      team: readString(entry, 'team', source),
    };
  }
  return roster;
}

export function parseTeamOwners(value: unknown, source: string): TeamOwners {
  const owners = expectRecord(value, source, 'teamOwners');
  const out: TeamOwners = {};
  for (const [team, owner] of Object.entries(owners)) {
    if (owner !== null && typeof owner !== 'string') {
      throw new RecordFormatError(source, `teamOwners.${team} must be a string or null`);
    }
    out[team] = owner;
  }
  return out;
}

export function parseTracks(value: unknown, source: string): Record<string, TrackInfo> {
  const tracks = expectRecord(value, source, 'tracks');
  const out: Record<string, TrackInfo> = {};
  for (const [trackId, info] of Object.entries(tracks)) {
    out[trackId] = { name: readString(expectRecord(info, source, `tracks.${trackId}`), 'name', source) };
  }
  return out;
}

export function parsePointsStructure(value: Record<string, unknown>, source: string): PointsStructure {
  const points: PointsStructure = {};
  if (value['points'] != null) points.points = readNumberMap(value['points'], source, 'points');
  if (value['playoffPoints'] != null) {
    points.playoffPoints = readNumberMap(value['playoffPoints'], source, 'playoffPoints');
  }
  if (value['qualifyingPoints'] != null) {
    points.qualifyingPoints = readNumberMap(value['qualifyingPoints'], source, 'qualifyingPoints');
  }
  return points;
}

/**
 * Load every league configuration file from a directory.
 */
export function loadLeagueConfig(configDir: string): LeagueConfig {
  const drivers = loadJson(configDir, 'drivers.json');
  const owners = loadJson(configDir, 'team_owners.json');
  const pole = loadJson(configDir, 'pole_position.json');
  const tracks = loadJson(configDir, 'tracks.json');
  const points = loadJson(configDir, 'points_structure.json');

  return {
    drivers: parseDrivers(drivers.data['drivers'], drivers.source),
    teamOwners: parseTeamOwners(owners.data['teamOwners'], owners.source),
    polePosition: readNumberMap(pole.data['polePosition'], pole.source, 'polePosition'),
    tracks: parseTracks(tracks.data['tracks'], tracks.source),
    points: parsePointsStructure(points.data, points.source),
  };
}
