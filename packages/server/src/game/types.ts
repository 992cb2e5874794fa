/**
 * @fileoverview Game types and default match rules.
 * Re-exports protocol types and provides server-specific ones.
 */

import type { GamePhase, Hand, PlayerId, ServerMessage } from '@card-duel/protocol';

// ============ Re-export Protocol Types ============

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
} from '@card-duel/protocol';

export { CARDS } from '@card-duel/protocol';

// ============ Players ============

/**
 * Anything the store can publish outbound messages to.
 * Implemented by the per-connection Session.
 */
export interface SessionHandle {
  publish(message: ServerMessage): void;
}

/**
 * A connected player as tracked by the store.
 */
export interface Player {
  readonly id: PlayerId;
  readonly session: SessionHandle;
  readonly phase: GamePhase;
}

export const IDLE: GamePhase = { type: 'idle' };

// ============ Match Rules ============

/**
 * Starting values for every new match.
 */
export interface MatchRules {
  readonly startingHealth: number;
  readonly startingHand: Hand;
}

export const DEFAULT_MATCH_RULES: MatchRules = {
  startingHealth: 5,
  startingHand: { attacks: 2, counters: 1, rests: 1 },
};
