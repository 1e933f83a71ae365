/**
 * Race control: transport-independent handling of race-director messages.
 *
 * Flow per connection:
 *   prepare-race   → qualifying + grid, held as the connection's pending race
 *   submit-results → number the race from the store, score, append to the
 *                    season store, save and broadcast standings, clear the
 *                    pending race
 *   cancel-race    → drop the pending race
 */

import type {
  GridFillPolicy,
  RawFinishInput,
  SeasonStandings,
  StartingGridEntry,
} from '../types.js';
import { isDnq } from '../types.js';
import type { SeasonStore } from '../season/store.js';
import type { LeagueConfig } from '../season/config.js';
import type { LeagueLogger } from '../utils/logger.js';
import { logger as defaultLogger } from '../utils/logger.js';
import { type RandomSource, defaultRandom } from '../random.js';
import {
  completeRace,
  formatRaceDate,
  nextRaceNumber,
  prepareRace,
  rosterFromDrivers,
} from '../league.js';
import { computeSeasonStandings } from '../standings/index.js';
import type {
  ClientMessage,
  Connection,
  PendingRace,
  PrepareRaceMessage,
  ServerMessage,
  SubmitResultsMessage,
} from './types.js';

export const MIN_TEAMS = 2;
export const MAX_TEAMS = 7;

export interface ConnectionRegistry {
  /** Send to every open connection. */
  broadcast(message: ServerMessage): void;
}

export interface RaceControlDeps {
  store: SeasonStore;
  config: LeagueConfig;
  registry: ConnectionRegistry;
  logger?: LeagueLogger;
  rng?: RandomSource;
  fillPolicy?: GridFillPolicy;
  now?: () => Date;
}

export interface RaceControl {
  handleMessage(conn: Connection, message: ClientMessage): void;
  handleDisconnect(conn: Connection): void;
  getPendingRace(connectionId: string): PendingRace | null;
}

/**
 * Check that a team selection can start a race. Returns an error message, or
 * null when the selection is valid.
 */
export function validateTeamSelection(teams: readonly string[], knownTeams: readonly string[]): string | null {
  if (teams.length < MIN_TEAMS || teams.length > MAX_TEAMS) {
    return `Select between ${MIN_TEAMS} and ${MAX_TEAMS} teams, got ${teams.length}`;
  }
  if (new Set(teams).size !== teams.length) return 'Teams must be distinct';
  const unknown = teams.find(team => !knownTeams.includes(team));
  if (unknown !== undefined) return `Unknown team: ${unknown}`;
  return null;
}

/**
 * Check submitted finishers against the grid. Every grid car must appear
 * exactly once; finishes are 'DNQ' or distinct positive integers; turns led
 * are non-negative integers. Returns an error message, or null when valid.
 */
export function validateFinishers(
  grid: readonly StartingGridEntry[],
  finishers: readonly RawFinishInput[],
): string | null {
  const onGrid = new Set(grid.map(entry => entry.carNumber));
  const seenCars = new Set<number>();
  const seenFinishes = new Set<number>();

  for (const f of finishers) {
    if (!onGrid.has(f.carNumber)) return `Car ${f.carNumber} is not on the starting grid`;
    if (seenCars.has(f.carNumber)) return `Car ${f.carNumber} is listed more than once`;
    seenCars.add(f.carNumber);

    if (!Number.isInteger(f.turnsLed) || f.turnsLed < 0) {
      return `Turns led for car ${f.carNumber} must be a non-negative integer`;
    }
    if (isDnq(f.finish)) continue;
    if (f.finish < 1) return `Finish for car ${f.carNumber} must be a positive integer`;
    if (seenFinishes.has(f.finish)) return `Finish ${f.finish} is given to more than one car`;
    seenFinishes.add(f.finish);
  }

  const missing = grid.find(entry => !seenCars.has(entry.carNumber));
  if (missing) return `Missing result for car ${missing.carNumber}`;
  return null;
}

/**
 * Create the race-control message handler.
 */
export function createRaceControl(deps: RaceControlDeps): RaceControl {
  const {
    store,
    config,
    registry,
    logger = defaultLogger,
    rng = defaultRandom,
    fillPolicy = 'fill',
    now = () => new Date(),
  } = deps;

  const pending = new Map<string, PendingRace>();
  const roster = rosterFromDrivers(config.drivers);
  const knownTeams = Object.keys(config.teamOwners);

  function currentStandings(): SeasonStandings {
    return computeSeasonStandings(store.loadHistory(), config.teamOwners);
  }

  function handlePrepareRace(conn: Connection, message: PrepareRaceMessage): void {
    if (pending.has(conn.id)) {
      conn.send({ type: 'error', message: 'A race is already pending; submit or cancel it first' });
      return;
    }

    const selectionError = validateTeamSelection(message.teams, knownTeams);
    if (selectionError) {
      conn.send({ type: 'error', message: selectionError });
      return;
    }
    if (!(message.trackId in config.tracks)) {
      conn.send({ type: 'error', message: `Unknown track: ${message.trackId}` });
      return;
    }

    const history = store.loadHistory();
    const { grid } = prepareRace({
      history,
      teams: message.teams,
      polePosition: config.polePosition,
      roster,
      rng,
      fillPolicy,
    });

    if (grid.length === 0) {
      conn.send({ type: 'error', message: 'No starters for this race' });
      return;
    }

    const race: PendingRace = {
      raceNum: nextRaceNumber(history),
      trackId: message.trackId,
      teams: [...message.teams],
      grid,
    };
    pending.set(conn.id, race);
    logger.info(`Race ${race.raceNum} at ${race.trackId}: grid of ${grid.length} cars`);

    conn.send({ type: 'grid-ready', raceNum: race.raceNum, trackId: race.trackId, grid });
  }

  function handleSubmitResults(conn: Connection, message: SubmitResultsMessage): void {
    const race = pending.get(conn.id);
    if (!race) {
      conn.send({ type: 'error', message: 'No race is pending' });
      return;
    }

    const finisherError = validateFinishers(race.grid, message.finishers);
    if (finisherError) {
      conn.send({ type: 'error', message: finisherError });
      return;
    }

    // Another director may have saved a race since this grid was built.
    const raceNum = nextRaceNumber(store.loadHistory());
    if (raceNum !== race.raceNum) {
      logger.info(`Race prepared as ${race.raceNum} is saved as ${raceNum}`);
    }

    const record = completeRace({
      grid: race.grid,
      finishers: message.finishers,
      points: config.points,
      date: formatRaceDate(now()),
      raceNum,
      trackId: race.trackId,
    });

    store.appendRace(record);
    pending.delete(conn.id);
    logger.success(`Saved race ${record.raceNum}`);

    const standings = currentStandings();
    store.saveStandings(standings);
    logger.debug(`Standings updated: ${standings.drivers.length} drivers`);

    conn.send({ type: 'race-saved', race: record });
    registry.broadcast({ type: 'standings', standings });
  }

  function dispatch(conn: Connection, message: ClientMessage): void {
    switch (message.type) {
      case 'get-options':
        conn.send({
          type: 'options',
          teams: knownTeams,
          tracks: Object.entries(config.tracks).map(([id, track]) => ({ id, name: track.name })),
        });
        break;

      case 'prepare-race':
        handlePrepareRace(conn, message);
        break;

      case 'submit-results':
        handleSubmitResults(conn, message);
        break;

      case 'cancel-race':
        if (pending.delete(conn.id)) {
          conn.send({ type: 'race-cancelled' });
        } else {
          conn.send({ type: 'error', message: 'No race is pending' });
        }
        break;

      case 'get-standings':
        conn.send({ type: 'standings', standings: currentStandings() });
        break;
    }
  }

  return {
    handleMessage(conn, message) {
      try {
        dispatch(conn, message);
      } catch (err) {
        logger.error(`Failed to handle ${message.type}`, err);
        conn.send({
          type: 'error',
          message: err instanceof Error ? err.message : 'Internal error',
        });
      }
    },

    handleDisconnect(conn) {
      if (pending.delete(conn.id)) {
        logger.warn(`Connection ${conn.id} closed with a pending race; discarded`);
      }
    },

    getPendingRace(connectionId) {
      return pending.get(connectionId) ?? null;
    },
  };
}
