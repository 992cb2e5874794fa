/**
 * @fileoverview Main entry point for the protocol package.
 * Re-exports all types and protocol definitions.
 */

// Protocol
export {
  CardSchema,
  ChallengeAcceptedMessage,
  ChallengeMessage,
  ChallengeRequestMessage,
  ChallengeResponseMessage,
  ChatMessage,
  ClientMessage,
  ConnectedMessage,
  DirectMessage,
  decodeClientMessage,
  EndStateSchema,
  ErrorMessage,
  GamePhaseSchema,
  HandSchema,
  isMessageType,
  MatchIdSchema,
  PhaseUpdateMessage,
  PickCardMessage,
  PlayCardMessage,
  PlayerIdSchema,
  PlayerMatchStateSchema,
  parseClientMessage,
  parseServerMessage,
  RedactedPlayerStateSchema,
  RoundResultMessage,
  RoundResultSchema,
  ServerMessage,
  serializeServerMessage,
} from './protocol.js';
// Types
export type {
  Card,
  EndState,
  GamePhase,
  Hand,
  MatchId,
  PlayerId,
  PlayerMatchState,
  RedactedPlayerState,
  RoundResult,
} from './types.js';
export { CARDS } from './types.js';

/**
 * Protocol version.
 */
export const PROTOCOL_VERSION = '1.0.0';
