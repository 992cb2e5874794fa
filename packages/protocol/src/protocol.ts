/**
 * @fileoverview Card duel protocol message definitions.
 * Uses Zod for runtime validation of incoming messages.
 */

import { z } from 'zod';

// ============ Shared Schemas ============

/**
 * Server-assigned player identifier.
 */
export const PlayerIdSchema = z.number().int().nonnegative();

/**
 * Match identifier (the number of matches created before it).
 */
export const MatchIdSchema = z.number().int().nonnegative();

/**
 * Schema for card enumeration.
 */
export const CardSchema = z.enum(['attack', 'counter', 'rest']);

/**
 * Schema for the cards a player holds.
 */
export const HandSchema = z.object({
  attacks: z.number().int().min(0),
  counters: z.number().int().min(0),
  rests: z.number().int().min(0),
});

/**
 * Schema for a player's lobby/match phase.
 */
export const GamePhaseSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('idle') }),
  z.object({ type: z.literal('challenging'), target: PlayerIdSchema }),
  z.object({ type: z.literal('in_match'), matchId: MatchIdSchema }),
]);

/**
 * Schema for how a match concluded.
 */
export const EndStateSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('draw') }),
  z.object({ type: z.literal('victory'), winner: PlayerIdSchema }),
]);

/**
 * Schema for a participant's full match state, only ever sent to its owner.
 */
export const PlayerMatchStateSchema = z.object({
  playerId: PlayerIdSchema,
  hand: HandSchema,
  chosenCard: CardSchema.optional(),
  health: z.number().int().min(0),
  pendingRewardChoice: z.tuple([CardSchema, CardSchema]).optional(),
});

/**
 * Schema for the part of a participant's state its opponent may see.
 */
export const RedactedPlayerStateSchema = z.object({
  playerId: PlayerIdSchema,
  cardCount: z.number().int().min(0),
  health: z.number().int().min(0),
});

/**
 * Schema for a per-participant view of a match after an action.
 */
export const RoundResultSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('match_ended'), endState: EndStateSchema }),
  z.object({
    type: z.literal('next_round'),
    own: PlayerMatchStateSchema,
    opponent: RedactedPlayerStateSchema,
  }),
]);

// ============ Client -> Server Messages ============

/**
 * Direct chat message to another player.
 */
export const ChatMessage = z.object({
  type: z.literal('chat'),
  to: PlayerIdSchema,
  text: z.string().min(1).max(500),
});

/**
 * Request to challenge another player to a match.
 */
export const ChallengeRequestMessage = z.object({
  type: z.literal('challenge_request'),
  target: PlayerIdSchema,
});

/**
 * Answer to a challenge received from another player.
 */
export const ChallengeResponseMessage = z.object({
  type: z.literal('challenge_response'),
  challenger: PlayerIdSchema,
  accepted: z.boolean(),
});

/**
 * Commit a card for the current round.
 */
export const PlayCardMessage = z.object({
  type: z.literal('play_card'),
  card: CardSchema,
});

/**
 * Resolve a pending reward choice.
 */
export const PickCardMessage = z.object({
  type: z.literal('pick_card'),
  card: CardSchema,
});

/**
 * Union of all valid client-to-server messages.
 */
export const ClientMessage = z.discriminatedUnion('type', [
  ChatMessage,
  ChallengeRequestMessage,
  ChallengeResponseMessage,
  PlayCardMessage,
  PickCardMessage,
]);

export type ClientMessage = z.infer<typeof ClientMessage>;

// ============ Server -> Client Messages ============

/**
 * Sent once a connection has been registered as a player.
 */
export const ConnectedMessage = z.object({
  type: z.literal('connected'),
  id: PlayerIdSchema,
});

/**
 * Server error message.
 */
export const ErrorMessage = z.object({
  type: z.literal('error'),
  message: z.string(),
});

/**
 * Notification that the receiving player's phase changed.
 */
export const PhaseUpdateMessage = z.object({
  type: z.literal('phase_update'),
  phase: GamePhaseSchema,
});

/**
 * Chat message relayed from another player.
 */
export const DirectMessage = z.object({
  type: z.literal('direct'),
  from: PlayerIdSchema,
  text: z.string(),
});

/**
 * Notification that another player issued a challenge.
 */
export const ChallengeMessage = z.object({
  type: z.literal('challenge'),
  from: PlayerIdSchema,
});

/**
 * Notification that the receiver's challenge was accepted.
 */
export const ChallengeAcceptedMessage = z.object({
  type: z.literal('challenge_accepted'),
});

/**
 * Match view for the receiving participant.
 */
export const RoundResultMessage = z.object({
  type: z.literal('round_result'),
  result: RoundResultSchema,
});

/**
 * Union of all valid server-to-client messages.
 */
export const ServerMessage = z.discriminatedUnion('type', [
  ConnectedMessage,
  ErrorMessage,
  PhaseUpdateMessage,
  DirectMessage,
  ChallengeMessage,
  ChallengeAcceptedMessage,
  RoundResultMessage,
]);

export type ServerMessage = z.infer<typeof ServerMessage>;

// ============ Utility Functions ============

/**
 * Parse and validate a client message from unknown data.
 * @param data - Raw data to parse (typically from JSON.parse)
 * @returns Validated ClientMessage or null if invalid
 */
export function parseClientMessage(data: unknown): ClientMessage | null {
  const result = ClientMessage.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Decode a raw text frame into a client message.
 * @returns Validated ClientMessage or null if the text is not valid JSON or not a known message
 */
export function decodeClientMessage(raw: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  return parseClientMessage(parsed);
}

/**
 * Parse and validate a server message from unknown data.
 * @returns Validated ServerMessage or null if invalid
 */
export function parseServerMessage(data: unknown): ServerMessage | null {
  const result = ServerMessage.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Serialize a server message to JSON string.
 */
export function serializeServerMessage(message: ServerMessage): string {
  return JSON.stringify(message);
}

/**
 * Type guard for checking if a message is a specific type.
 * @param message - Message to check
 * @param type - Expected message type
 */
export function isMessageType<T extends ServerMessage['type']>(
  message: ServerMessage,
  type: T
): message is Extract<ServerMessage, { type: T }> {
  return message.type === type;
}
