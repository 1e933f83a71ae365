/**
 * Narrowing of persisted JSON and CSV values into league records.
 *
 * Everything read from disk (or off the wire) starts as unknown. These
 * readers check shape only; a mismatch raises RecordFormatError naming the
 * source and field.
 */

import type {
  Finish,
  RaceRecord,
  ScoredResult,
  SeasonRow,
  TeamRaceResult,
} from '../types.js';
import { DNQ } from '../types.js';
import { RecordFormatError } from '../errors.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectRecord(value: unknown, source: string, field: string): Record<string, unknown> {
  if (!isRecord(value)) throw new RecordFormatError(source, `${field} must be an object`);
  return value;
}

export function expectArray(value: unknown, source: string, field: string): unknown[] {
  if (!Array.isArray(value)) throw new RecordFormatError(source, `${field} must be an array`);
  return value;
}

export function readString(obj: Record<string, unknown>, key: string, source: string): string {
  const value = obj[key];
  if (typeof value !== 'string') throw new RecordFormatError(source, `${key} must be a string`);
  return value;
}

export function readNumber(obj: Record<string, unknown>, key: string, source: string): number {
  const value = obj[key];
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new RecordFormatError(source, `${key} must be a number`);
  }
  return value;
}

/** A number, or the DNQ sentinel. */
export function readFinish(obj: Record<string, unknown>, key: string, source: string): Finish {
  const value = obj[key];
  if (value === DNQ) return DNQ;
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  throw new RecordFormatError(source, `${key} must be an integer or "${DNQ}"`);
}

/** Record<string, number>; used for points tables and pole ranks. */
export function readNumberMap(value: unknown, source: string, field: string): Record<string, number> {
  const obj = expectRecord(value, source, field);
  const out: Record<string, number> = {};
  for (const key of Object.keys(obj)) out[key] = readNumber(obj, key, `${source} ${field}`);
  return out;
}

export function parseScoredResult(value: unknown, source: string): ScoredResult {
  const obj = expectRecord(value, source, 'result');
  return {
    finish: readFinish(obj, 'finish', source),
    carNumber: readNumber(obj, 'carNumber', source),
    driver: readString(obj, 'driver', source),
    team: readString(obj, 'team', source),
    startingPos: readFinish(obj, 'startingPos', source),
    turnsLed: readNumber(obj, 'turnsLed', source),
    points: readNumber(obj, 'points', source),
    playoffPoints: readNumber(obj, 'playoffPoints', source),
    relativeFinish: readNumber(obj, 'relativeFinish', source),
    qualifyingPoints: readNumber(obj, 'qualifyingPoints', source),
  };
}

function parseTeamRaceResult(value: unknown, source: string): TeamRaceResult {
  const obj = expectRecord(value, source, 'teamResult');
  return {
    position: readNumber(obj, 'position', source),
    team: readString(obj, 'team', source),
    totalPoints: readNumber(obj, 'totalPoints', source),
    turnsLed: readNumber(obj, 'turnsLed', source),
    avgFinish: readNumber(obj, 'avgFinish', source),
    drivers: readNumber(obj, 'drivers', source),
  };
}

/** Parse a race record as written by the season store. */
export function parseRaceRecord(value: unknown, source: string): RaceRecord {
  const obj = expectRecord(value, source, 'race');
  return {
    date: readString(obj, 'date', source),
    raceNum: readNumber(obj, 'raceNum', source),
    trackId: readString(obj, 'trackId', source),
    results: expectArray(obj['results'], source, 'results').map(r => parseScoredResult(r, source)),
    teamResults: expectArray(obj['teamResults'] ?? [], source, 'teamResults').map(r =>
      parseTeamRaceResult(r, source),
    ),
  };
}

// -- CSV --

/** Column order of the season results CSV. */
export const SEASON_COLUMNS = [
  'date',
  'raceNum',
  'trackId',
  'finish',
  'carNumber',
  'driver',
  'team',
  'startingPos',
  'turnsLed',
  'points',
  'playoffPoints',
  'relativeFinish',
  'qualifyingPoints',
] as const;

function csvNumber(row: Record<string, string>, key: string, source: string): number {
  const raw = row[key];
  const value = raw === undefined || raw.trim() === '' ? NaN : Number(raw);
  if (Number.isNaN(value)) throw new RecordFormatError(source, `${key} must be numeric, got "${raw ?? ''}"`);
  return value;
}

function csvFinish(row: Record<string, string>, key: string, source: string): Finish {
  return row[key] === DNQ ? DNQ : csvNumber(row, key, source);
}

function csvString(row: Record<string, string>, key: string, source: string): string {
  const value = row[key];
  if (value === undefined) throw new RecordFormatError(source, `missing column ${key}`);
  return value;
}

/** Convert one parsed CSV row (all strings) into a season row. */
export function seasonRowFromCsv(row: Record<string, string>, source: string): SeasonRow {
  return {
    date: csvString(row, 'date', source),
    raceNum: csvNumber(row, 'raceNum', source),
    trackId: csvString(row, 'trackId', source),
    finish: csvFinish(row, 'finish', source),
    carNumber: csvNumber(row, 'carNumber', source),
    driver: csvString(row, 'driver', source),
    team: csvString(row, 'team', source),
    startingPos: csvFinish(row, 'startingPos', source),
    turnsLed: csvNumber(row, 'turnsLed', source),
    points: csvNumber(row, 'points', source),
    playoffPoints: csvNumber(row, 'playoffPoints', source),
    relativeFinish: csvNumber(row, 'relativeFinish', source),
    qualifyingPoints: csvNumber(row, 'qualifyingPoints', source),
  };
}
