/**
 * Rebuild the season CSV from the stored race files and rewrite the driver,
 * owner and playoff standings tables.
 *
 * Usage:
 *   npm run standings
 */

import 'dotenv/config';
import { readLeagueEnv } from '../env.js';
import { Logger } from '../utils/logger.js';
import { loadLeagueConfig } from '../season/config.js';
import { FileSeasonStore } from '../season/file-store.js';
import { computeSeasonStandings } from '../standings/index.js';

const env = readLeagueEnv();
const logger = new Logger(env.verbose);

try {
  const { teamOwners } = loadLeagueConfig(env.configDir);
  const store = new FileSeasonStore({ dataDir: env.dataDir, season: env.season });

  const rows = store.rebuildSeasonCsv();
  logger.info(`Season ${env.season}: ${rows.length} results rebuilt into ${store.seasonCsvPath}`);

  const standings = computeSeasonStandings(rows, teamOwners);
  store.saveStandings(standings);
  logger.success(
    `Standings updated: ${standings.drivers.length} drivers, ${standings.owners.length} owners`,
  );
} catch (err) {
  logger.error('Failed to recalculate standings', err);
  process.exit(1);
}
