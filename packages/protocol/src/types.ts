/**
 * @fileoverview Domain types shared by the server and its clients.
 * Inferred from the protocol schemas so the wire format and the domain never drift.
 */

import type { z } from 'zod';
import type {
  CardSchema,
  EndStateSchema,
  GamePhaseSchema,
  HandSchema,
  MatchIdSchema,
  PlayerIdSchema,
  PlayerMatchStateSchema,
  RedactedPlayerStateSchema,
  RoundResultSchema,
} from './protocol.js';

export type PlayerId = z.infer<typeof PlayerIdSchema>;
export type MatchId = z.infer<typeof MatchIdSchema>;
export type Card = z.infer<typeof CardSchema>;
export type Hand = z.infer<typeof HandSchema>;
export type GamePhase = z.infer<typeof GamePhaseSchema>;
export type EndState = z.infer<typeof EndStateSchema>;
export type PlayerMatchState = z.infer<typeof PlayerMatchStateSchema>;
export type RedactedPlayerState = z.infer<typeof RedactedPlayerStateSchema>;
export type RoundResult = z.infer<typeof RoundResultSchema>;

/** All cards, in table order */
export const CARDS: readonly Card[] = ['attack', 'counter', 'rest'];
