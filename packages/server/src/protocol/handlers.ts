/**
 * @fileoverview Protocol message handlers using a registry pattern.
 * Each client message type has a dedicated handler that takes the current
 * World and returns the next World plus the messages to deliver.
 */

import { describeError, type GameError } from '../game/errors.js';
import type { Match } from '../game/Match.js';
import { IDLE, type PlayerId } from '../game/types.js';
import type { World } from '../game/World.js';
import { logger } from '../utils/logger.js';
import type { ClientMessage, ServerMessage } from './messages.js';

// ============ Types ============

/**
 * Context for handling a message from a registered player.
 */
export interface HandlerContext {
  /** ID of the player who sent the message */
  playerId: PlayerId;
}

/**
 * A message addressed to one player.
 */
export interface Outbound {
  to: PlayerId;
  message: ServerMessage;
}

/**
 * Result of handling a message.
 */
export interface MessageHandlerResult {
  /** Updated world; the input instance when nothing changed */
  newState: World;
  /** Messages to deliver, in order */
  outbound: Outbound[];
}

/**
 * Handler function type for a specific message type.
 */
type MessageHandler<T extends ClientMessage> = (
  message: T,
  context: HandlerContext,
  state: World
) => MessageHandlerResult;

// ============ Handler Registry ============

/**
 * Registry of message handlers by type.
 */
const messageHandlers: {
  [K in ClientMessage['type']]: MessageHandler<Extract<ClientMessage, { type: K }>>;
} = {
  chat: handleChat,
  challenge_request: handleChallengeRequest,
  challenge_response: handleChallengeResponse,
  play_card: handlePlayCard,
  pick_card: handlePickCard,
};

// ============ Main Handler ============

/**
 * Handle a decoded client message by dispatching to the appropriate handler.
 */
export function handleMessage(
  message: ClientMessage,
  context: HandlerContext,
  state: World
): MessageHandlerResult {
  const handler = messageHandlers[message.type];
  // TypeScript ensures handler exists due to exhaustive type checking
  return handler(message as never, context, state);
}

// ============ Individual Handlers ============

/**
 * Relay a chat line to another player.
 */
function handleChat(
  message: Extract<ClientMessage, { type: 'chat' }>,
  context: HandlerContext,
  state: World
): MessageHandlerResult {
  if (!state.getPlayer(message.to)) {
    return reject(state, context, { type: 'id_not_found', entity: 'player', id: message.to });
  }

  return {
    newState: state,
    outbound: [
      { to: message.to, message: { type: 'direct', from: context.playerId, text: message.text } },
    ],
  };
}

/**
 * Challenge another player to a match.
 */
function handleChallengeRequest(
  message: Extract<ClientMessage, { type: 'challenge_request' }>,
  context: HandlerContext,
  state: World
): MessageHandlerResult {
  const result = state.challenge(context.playerId, message.target);
  if (!result.ok) {
    return reject(state, context, result.error);
  }

  logger.info('Challenge issued', { from: context.playerId, target: message.target });

  return {
    newState: result.value,
    outbound: [
      {
        to: context.playerId,
        message: { type: 'phase_update', phase: { type: 'challenging', target: message.target } },
      },
      { to: message.target, message: { type: 'challenge', from: context.playerId } },
    ],
  };
}

/**
 * Accept or decline a challenge; accepting starts a match.
 */
function handleChallengeResponse(
  message: Extract<ClientMessage, { type: 'challenge_response' }>,
  context: HandlerContext,
  state: World
): MessageHandlerResult {
  const result = state.respondToChallenge(context.playerId, message.challenger, message.accepted);
  if (!result.ok) {
    return reject(state, context, result.error);
  }

  const { state: newState, match } = result.value;

  if (!match) {
    logger.info('Challenge declined', { challenger: message.challenger, by: context.playerId });
    return {
      newState,
      outbound: [{ to: message.challenger, message: { type: 'phase_update', phase: IDLE } }],
    };
  }

  logger.info('Match started', { matchId: match.id, players: match.players });

  const phase = { type: 'in_match', matchId: match.id } as const;
  return {
    newState,
    outbound: [
      { to: message.challenger, message: { type: 'challenge_accepted' } },
      { to: message.challenger, message: { type: 'phase_update', phase } },
      { to: context.playerId, message: { type: 'phase_update', phase } },
      ...roundResultsFor(match),
    ],
  };
}

/**
 * Commit a card for the current round.
 */
function handlePlayCard(
  message: Extract<ClientMessage, { type: 'play_card' }>,
  context: HandlerContext,
  state: World
): MessageHandlerResult {
  const result = state.playCard(context.playerId, message.card);
  if (!result.ok) {
    return reject(state, context, result.error);
  }

  const { state: newState, match, committed, roundResolved } = result.value;

  if (!committed) {
    logger.debug('Card not in hand, nothing committed', {
      playerId: context.playerId,
      card: message.card,
    });
  }

  if (!roundResolved) {
    return { newState, outbound: roundResultsFor(match, context.playerId) };
  }

  if (match.state.type === 'finished') {
    logger.info('Match finished', { matchId: match.id, endState: match.state.endState });
  } else {
    logger.debug('Round resolved', { matchId: match.id, round: match.round - 1 });
  }

  return { newState, outbound: roundResultsFor(match) };
}

/**
 * Take one card from a pending reward choice.
 */
function handlePickCard(
  message: Extract<ClientMessage, { type: 'pick_card' }>,
  context: HandlerContext,
  state: World
): MessageHandlerResult {
  const result = state.pickCard(context.playerId, message.card);
  if (!result.ok) {
    return reject(state, context, result.error);
  }

  return {
    newState: result.value.state,
    outbound: roundResultsFor(result.value.match, context.playerId),
  };
}

// ============ Helper Functions ============

/**
 * Leave the state unchanged and report the error to the sender only.
 */
export function reject(
  state: World,
  context: HandlerContext,
  error: GameError
): MessageHandlerResult {
  logger.debug('Request rejected', { playerId: context.playerId, error });
  return {
    newState: state,
    outbound: [errorFor(context.playerId, error)],
  };
}

export function errorFor(playerId: PlayerId, error: GameError): Outbound {
  return { to: playerId, message: { type: 'error', message: describeError(error) } };
}

/**
 * Build round_result messages for a match, optionally for one participant only.
 * A finished match is followed by a phase update back to idle.
 */
export function roundResultsFor(match: Match, onlyFor?: PlayerId): Outbound[] {
  const outbound: Outbound[] = [];
  for (const { playerId, result } of match.getRoundResults()) {
    if (onlyFor !== undefined && playerId !== onlyFor) continue;
    outbound.push({ to: playerId, message: { type: 'round_result', result } });
    if (match.isFinished) {
      outbound.push({ to: playerId, message: { type: 'phase_update', phase: IDLE } });
    }
  }
  return outbound;
}
