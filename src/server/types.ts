/**
 * Race-control protocol types.
 *
 * A race director connects over WebSocket, picks teams and a track, receives
 * the starting grid, then submits the finishing order. The server scores and
 * stores the race and pushes fresh standings to every connected client.
 */

import type {
  RaceRecord,
  RawFinishInput,
  SeasonStandings,
  StartingGridEntry,
} from '../types.js';

// -- Client → Server --

export interface GetOptionsMessage {
  type: 'get-options';
}

export interface PrepareRaceMessage {
  type: 'prepare-race';
  teams: string[];
  trackId: string;
}

export interface SubmitResultsMessage {
  type: 'submit-results';
  finishers: RawFinishInput[];
}

export interface CancelRaceMessage {
  type: 'cancel-race';
}

export interface GetStandingsMessage {
  type: 'get-standings';
}

export type ClientMessage =
  | GetOptionsMessage
  | PrepareRaceMessage
  | SubmitResultsMessage
  | CancelRaceMessage
  | GetStandingsMessage;

// -- Server → Client --

export interface SessionCreatedMessage {
  type: 'session-created';
  connectionId: string;
}

export interface OptionsMessage {
  type: 'options';
  teams: string[];
  tracks: Array<{ id: string; name: string }>;
}

export interface GridReadyMessage {
  type: 'grid-ready';
  raceNum: number;
  trackId: string;
  grid: StartingGridEntry[];
}

export interface RaceSavedMessage {
  type: 'race-saved';
  race: RaceRecord;
}

export interface StandingsMessage {
  type: 'standings';
  standings: SeasonStandings;
}

export interface RaceCancelledMessage {
  type: 'race-cancelled';
}

export interface ErrorMessage {
  type: 'error';
  message: string;
}

export type ServerMessage =
  | SessionCreatedMessage
  | OptionsMessage
  | GridReadyMessage
  | RaceSavedMessage
  | StandingsMessage
  | RaceCancelledMessage
  | ErrorMessage;

// -- Connections --

export interface Connection {
  id: string;
  send(message: ServerMessage): void;
}

/** A race prepared for one connection and awaiting its results. */
export interface PendingRace {
  /** Next race number when the grid was built; the saved race is renumbered if others were stored since. */
  raceNum: number;
  trackId: string;
  teams: string[];
  grid: StartingGridEntry[];
}
