/**
 * Decoding of client messages off the wire.
 */

import type { RawFinishInput } from '../types.js';
import { expectArray, expectRecord, readFinish, readNumber, readString } from '../season/codec.js';
import type { ClientMessage } from './types.js';

const SOURCE = 'message';

function parseFinisher(value: unknown): RawFinishInput {
  const obj = expectRecord(value, SOURCE, 'finisher');
  return {
    carNumber: readNumber(obj, 'carNumber', SOURCE),
    finish: readFinish(obj, 'finish', SOURCE),
    turnsLed: obj['turnsLed'] === undefined ? 0 : readNumber(obj, 'turnsLed', SOURCE),
  };
}

/**
 * Parse a raw frame into a client message.
 *
 * @throws Error for invalid JSON, RecordFormatError for a wrong shape
 */
export function parseClientMessage(raw: string): ClientMessage {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    throw new Error('Invalid message: not JSON');
  }

  const obj = expectRecord(data, SOURCE, 'message');
  const type = readString(obj, 'type', SOURCE);

  switch (type) {
    case 'get-options':
    case 'cancel-race':
    case 'get-standings':
      return { type };
    case 'prepare-race':
      return {
        type,
        teams: expectArray(obj['teams'], SOURCE, 'teams').map(team => {
          if (typeof team !== 'string') throw new Error('Invalid message: teams must be strings');
          return team;
        }),
        trackId: readString(obj, 'trackId', SOURCE),
      };
    case 'submit-results':
      return {
        type,
        finishers: expectArray(obj['finishers'], SOURCE, 'finishers').map(parseFinisher),
      };
    default:
      throw new Error(`Unknown message type: ${type}`);
  }
}
