/**
 * @fileoverview Session stand-in that records what the store publishes to it.
 */

import type { ServerMessage } from '@card-duel/protocol';

export interface RecordingSession {
  publish(message: ServerMessage): void;
  /** Every message published so far, oldest first */
  readonly messages: ServerMessage[];
  /** Id from the `connected` message, or null before it arrives */
  readonly playerId: number | null;
  clear(): void;
}

export function createRecordingSession(): RecordingSession {
  const messages: ServerMessage[] = [];
  let playerId: number | null = null;

  return {
    publish(message: ServerMessage): void {
      if (message.type === 'connected') {
        playerId = message.id;
      }
      messages.push(message);
    },

    get messages(): ServerMessage[] {
      return messages;
    },

    get playerId(): number | null {
      return playerId;
    },

    clear(): void {
      messages.length = 0;
    },
  };
}
