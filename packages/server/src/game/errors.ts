/**
 * @fileoverview Rule violations reported back to the acting player.
 */

import type { MatchId, PlayerId } from './types.js';

export type IdNotFoundError = {
  readonly type: 'id_not_found';
  readonly entity: 'player' | 'match';
  readonly id: PlayerId | MatchId;
};

export type InvalidRequestError = {
  readonly type: 'invalid_request';
  readonly reason: string;
};

export type MessageUndecodableError = {
  readonly type: 'message_undecodable';
};

export type GameError = IdNotFoundError | InvalidRequestError | MessageUndecodableError;

export function playerNotFound(id: PlayerId): IdNotFoundError {
  return { type: 'id_not_found', entity: 'player', id };
}

export function matchNotFound(id: MatchId): IdNotFoundError {
  return { type: 'id_not_found', entity: 'match', id };
}

export function invalidRequest(reason: string): InvalidRequestError {
  return { type: 'invalid_request', reason };
}

export const MESSAGE_UNDECODABLE: MessageUndecodableError = { type: 'message_undecodable' };

/**
 * Render an error as the text of an `error` message.
 */
export function describeError(error: GameError): string {
  switch (error.type) {
    case 'id_not_found':
      return `${error.entity === 'player' ? 'Player' : 'Match'} ${error.id} not found`;
    case 'invalid_request':
      return error.reason;
    case 'message_undecodable':
      return 'Invalid message format';
  }
}
