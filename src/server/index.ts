/**
 * Race-control server: WebSocket surface over the league engine.
 */

export type { LeagueServerConfig, LeagueServer } from './ws-server.js';
export { createLeagueServer } from './ws-server.js';

export type { ConnectionRegistry, RaceControl, RaceControlDeps } from './race-control.js';
export {
  MIN_TEAMS,
  MAX_TEAMS,
  createRaceControl,
  validateTeamSelection,
  validateFinishers,
} from './race-control.js';

export { parseClientMessage } from './protocol.js';

export type {
  ClientMessage,
  ServerMessage,
  GetOptionsMessage,
  PrepareRaceMessage,
  SubmitResultsMessage,
  CancelRaceMessage,
  GetStandingsMessage,
  SessionCreatedMessage,
  OptionsMessage,
  GridReadyMessage,
  RaceSavedMessage,
  StandingsMessage,
  RaceCancelledMessage,
  ErrorMessage,
  Connection,
  PendingRace,
} from './types.js';
