/**
 * Race-control server entry point.
 *
 * Usage:
 *   npm start
 *   PORT=9000 LEAGUE_DATA_DIR=./data npm start
 */

import 'dotenv/config';
import { readLeagueEnv } from '../env.js';
import { Logger } from '../utils/logger.js';
import { loadLeagueConfig } from '../season/config.js';
import { FileSeasonStore } from '../season/file-store.js';
import { createLeagueServer } from './ws-server.js';

const env = readLeagueEnv();
const logger = new Logger(env.verbose);

const server = createLeagueServer({
  port: env.port,
  store: new FileSeasonStore({ dataDir: env.dataDir, season: env.season }),
  league: loadLeagueConfig(env.configDir),
  logger,
  fillPolicy: env.fillPolicy,
});

logger.info(`Race control listening on ws://localhost:${env.port} (season ${env.season})`);
logger.info('Press Ctrl+C to stop.');

function shutdown() {
  logger.info('Shutting down...');
  server.close();
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
