/**
 * Errors raised when a caller hands the engine data that breaks its contract.
 */

export type LookupKind = 'car' | 'team';

/** A car or team referenced by the input does not exist where it must. */
export class LookupError extends Error {
  readonly kind: LookupKind;
  readonly key: string | number;

  constructor(kind: LookupKind, key: string | number, detail?: string) {
    super(`Unknown ${kind} ${JSON.stringify(key)}${detail ? `: ${detail}` : ''}`);
    this.name = 'LookupError';
    this.kind = kind;
    this.key = key;
  }
}

/** A persisted or configured record does not have the expected shape. */
export class RecordFormatError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = 'RecordFormatError';
    this.source = source;
  }
}
