/**
 * @fileoverview Re-exports protocol messages from the protocol package.
 */

export {
  ClientMessage,
  decodeClientMessage,
  ServerMessage,
  serializeServerMessage,
} from '@card-duel/protocol';
