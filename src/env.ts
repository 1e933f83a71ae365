/**
 * Process configuration from environment variables (a .env file is loaded by
 * the entry points through dotenv).
 */

import { resolve } from 'node:path';
import type { GridFillPolicy } from './types.js';

export interface LeagueEnv {
  port: number;
  configDir: string;
  dataDir: string;
  season: number;
  fillPolicy: GridFillPolicy;
  verbose: boolean;
}

function parseIntOr(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) throw new Error(`${name} must be an integer, got "${value}"`);
  return parsed;
}

function parseFillPolicy(value: string | undefined): GridFillPolicy {
  if (value === undefined || value === '' || value === 'fill') return 'fill';
  if (value === 'skip') return 'skip';
  throw new Error(`LEAGUE_GRID_FILL must be "fill" or "skip", got "${value}"`);
}

export function readLeagueEnv(env: NodeJS.ProcessEnv = process.env): LeagueEnv {
  return {
    port: parseIntOr(env['PORT'], 3000, 'PORT'),
    configDir: resolve(env['LEAGUE_CONFIG_DIR'] ?? 'config'),
    dataDir: resolve(env['LEAGUE_DATA_DIR'] ?? 'data'),
    season: parseIntOr(env['LEAGUE_SEASON'], 1, 'LEAGUE_SEASON'),
    fillPolicy: parseFillPolicy(env['LEAGUE_GRID_FILL']),
    verbose: env['LEAGUE_VERBOSE'] === '1' || env['NODE_ENV'] === 'development',
  };
}
