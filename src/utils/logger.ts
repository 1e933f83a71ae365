/**
 * Console logger for the server and scripts. Debug lines print only in
 * verbose mode (LEAGUE_VERBOSE=1 or NODE_ENV=development).
 */

/** Minimal surface the league services log through. */
export interface LeagueLogger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  debug(message: string): void;
}

export class Logger implements LeagueLogger {
  private verbose: boolean;

  constructor(verbose: boolean = false) {
    this.verbose = verbose;
  }

  info(message: string) {
    console.log(`[info] ${message}`);
  }

  success(message: string) {
    console.log(`[ok] ${message}`);
  }

  error(message: string, error?: unknown) {
    console.error(`[error] ${message}`, error ?? '');
  }

  warn(message: string) {
    console.warn(`[warn] ${message}`);
  }

  debug(message: string) {
    if (this.verbose) {
      console.log(`[debug] ${message}`);
    }
  }
}

export const logger = new Logger(
  process.env['LEAGUE_VERBOSE'] === '1' || process.env['NODE_ENV'] === 'development',
);
