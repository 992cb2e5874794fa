/**
 * @fileoverview Immutable match state - all actions return a new Match instance.
 *
 * A match starts in `resolving_round` and stays there while participants
 * commit cards round after round. Once a health value reaches 0 the match
 * moves to `finished`, which is terminal.
 */

import { type Result, err, ok } from '../utils/result.js';
import { resolveCards } from './cards.js';
import { type GameError, invalidRequest } from './errors.js';
import { addCard, handSize, removeCard } from './hand.js';
import {
  type Card,
  DEFAULT_MATCH_RULES,
  type EndState,
  type MatchId,
  type MatchRules,
  type PlayerId,
  type PlayerMatchState,
  type RedactedPlayerState,
  type RoundResult,
} from './types.js';

export type ParticipantStates = readonly [PlayerMatchState, PlayerMatchState];

export type MatchState =
  | { readonly type: 'resolving_round'; readonly participants: ParticipantStates }
  | { readonly type: 'finished'; readonly endState: EndState };

type ParticipantIndex = 0 | 1;

/**
 * Outcome of a successful `playCard`.
 */
export interface PlayCardOutcome {
  readonly match: Match;
  /** False when the requested card was not in hand and nothing was committed */
  readonly committed: boolean;
  /** True when this commit completed the round */
  readonly roundResolved: boolean;
}

/**
 * What a single participant gets to see after an action.
 */
export interface ParticipantRoundResult {
  readonly playerId: PlayerId;
  readonly result: RoundResult;
}

function freshState(playerId: PlayerId, rules: MatchRules): PlayerMatchState {
  return { playerId, hand: { ...rules.startingHand }, health: rules.startingHealth };
}

function replaceAt(
  participants: ParticipantStates,
  index: ParticipantIndex,
  state: PlayerMatchState
): ParticipantStates {
  return index === 0 ? [state, participants[1]] : [participants[0], state];
}

/**
 * Return a committed card to the hand.
 */
function refund(state: PlayerMatchState): PlayerMatchState {
  if (!state.chosenCard) {
    return state;
  }
  return {
    playerId: state.playerId,
    hand: addCard(state.hand, state.chosenCard),
    health: state.health,
  };
}

function commit(state: PlayerMatchState, card: Card): PlayerMatchState | null {
  const hand = removeCard(state.hand, card);
  if (!hand) {
    return null;
  }
  return { playerId: state.playerId, hand, health: state.health, chosenCard: card };
}

/**
 * Apply one side of a round: health delta, fixed rewards and any pending choice.
 */
function settle(state: PlayerMatchState, own: Card, opponent: Card): PlayerMatchState {
  const { healthDelta, rewards } = resolveCards(own, opponent);
  let hand = state.hand;
  let pendingRewardChoice: [Card, Card] | null = null;

  for (const reward of rewards) {
    switch (reward.type) {
      case 'card':
        hand = addCard(hand, reward.card);
        break;
      case 'choice':
        pendingRewardChoice = [reward.options[0], reward.options[1]];
        break;
    }
  }

  return {
    playerId: state.playerId,
    hand,
    health: Math.max(0, state.health + healthDelta),
    ...(pendingRewardChoice ? { pendingRewardChoice } : {}),
  };
}

function redact(state: PlayerMatchState): RedactedPlayerState {
  return {
    playerId: state.playerId,
    cardCount: handSize(state.hand) + (state.chosenCard ? 1 : 0),
    health: state.health,
  };
}

/**
 * Immutable match container.
 * All state-modifying methods return a new Match instance.
 */
export class Match {
  private constructor(
    private readonly _id: MatchId,
    private readonly _players: readonly [PlayerId, PlayerId],
    private readonly _state: MatchState,
    private readonly _round: number
  ) {}

  // ============ Static Constructors ============

  /**
   * Start a match between two distinct players.
   * @throws {Error} if both ids are the same player
   */
  static create(
    id: MatchId,
    players: readonly [PlayerId, PlayerId],
    rules: MatchRules = DEFAULT_MATCH_RULES
  ): Match {
    const [first, second] = players;
    if (first === second) {
      throw new Error(`A match needs two distinct players, got ${first} twice`);
    }
    return new Match(
      id,
      [first, second],
      {
        type: 'resolving_round',
        participants: [freshState(first, rules), freshState(second, rules)],
      },
      1
    );
  }

  // ============ Getters ============

  get id(): MatchId {
    return this._id;
  }

  get players(): readonly [PlayerId, PlayerId] {
    return this._players;
  }

  get state(): MatchState {
    return this._state;
  }

  /** Number of the round currently being played (starts at 1) */
  get round(): number {
    return this._round;
  }

  get isFinished(): boolean {
    return this._state.type === 'finished';
  }

  hasParticipant(playerId: PlayerId): boolean {
    return this.indexOf(playerId) !== null;
  }

  /** Get the other participant, or undefined if the player is not in this match */
  opponentOf(playerId: PlayerId): PlayerId | undefined {
    const index = this.indexOf(playerId);
    if (index === null) return undefined;
    return this._players[index === 0 ? 1 : 0];
  }

  /** Get a participant's state while the match is still being played */
  getParticipantState(playerId: PlayerId): PlayerMatchState | undefined {
    const index = this.indexOf(playerId);
    if (index === null || this._state.type !== 'resolving_round') return undefined;
    return this._state.participants[index];
  }

  // ============ Actions ============

  /**
   * Commit a card for the current round, replacing any earlier commit.
   *
   * If the card is not in hand the earlier commit is still refunded and
   * nothing new is committed. The round resolves as soon as both
   * participants hold a committed card.
   */
  playCard(playerId: PlayerId, card: Card): Result<PlayCardOutcome, GameError> {
    const checked = this.checkAction(playerId);
    if (!checked.ok) return checked;
    const { index, participants } = checked.value;

    const current = participants[index];
    if (current.pendingRewardChoice) {
      return err(invalidRequest('Pick a reward card before playing another card'));
    }

    const refunded = refund(current);
    const committed = commit(refunded, card);
    const updated = replaceAt(participants, index, committed ?? refunded);

    const [first, second] = updated;
    if (first.chosenCard && second.chosenCard) {
      return ok({
        match: this.resolveRound(updated, first.chosenCard, second.chosenCard),
        committed: true,
        roundResolved: true,
      });
    }

    return ok({
      match: this.withState({ type: 'resolving_round', participants: updated }),
      committed: committed !== null,
      roundResolved: false,
    });
  }

  /**
   * Take one of the two cards offered by a pending reward choice.
   */
  pickCard(playerId: PlayerId, card: Card): Result<Match, GameError> {
    const checked = this.checkAction(playerId);
    if (!checked.ok) return checked;
    const { index, participants } = checked.value;

    const current = participants[index];
    if (!current.pendingRewardChoice) {
      return err(invalidRequest('No reward choice is pending'));
    }
    if (!current.pendingRewardChoice.includes(card)) {
      return err(
        invalidRequest(
          `Card ${card} is not one of the offered rewards (${current.pendingRewardChoice.join(', ')})`
        )
      );
    }

    const picked: PlayerMatchState = {
      playerId: current.playerId,
      hand: addCard(current.hand, card),
      health: current.health,
    };

    return ok(
      this.withState({ type: 'resolving_round', participants: replaceAt(participants, index, picked) })
    );
  }

  /**
   * End the match in favour of the opponent of a leaving player.
   * Returns the same instance if the match is already over or the player is not in it.
   */
  forfeit(playerId: PlayerId): Match {
    const winner = this.opponentOf(playerId);
    if (this.isFinished || winner === undefined) {
      return this;
    }
    return this.withState({ type: 'finished', endState: { type: 'victory', winner } });
  }

  // ============ Projections ============

  /**
   * Per-participant view of the match. Opponents only ever see card count and health.
   */
  getRoundResults(): readonly [ParticipantRoundResult, ParticipantRoundResult] {
    const [first, second] = this._players;

    if (this._state.type === 'finished') {
      const result: RoundResult = { type: 'match_ended', endState: this._state.endState };
      return [
        { playerId: first, result },
        { playerId: second, result },
      ];
    }

    const [a, b] = this._state.participants;
    return [
      { playerId: first, result: { type: 'next_round', own: a, opponent: redact(b) } },
      { playerId: second, result: { type: 'next_round', own: b, opponent: redact(a) } },
    ];
  }

  // ============ Internals ============

  private indexOf(playerId: PlayerId): ParticipantIndex | null {
    if (this._players[0] === playerId) return 0;
    if (this._players[1] === playerId) return 1;
    return null;
  }

  private checkAction(
    playerId: PlayerId
  ): Result<{ index: ParticipantIndex; participants: ParticipantStates }, GameError> {
    if (this._state.type === 'finished') {
      return err(invalidRequest(`Match ${this._id} has already concluded`));
    }
    const index = this.indexOf(playerId);
    if (index === null) {
      return err(invalidRequest(`Player ${playerId} is not a participant of match ${this._id}`));
    }
    return ok({ index, participants: this._state.participants });
  }

  private resolveRound(participants: ParticipantStates, firstCard: Card, secondCard: Card): Match {
    const first = settle(participants[0], firstCard, secondCard);
    const second = settle(participants[1], secondCard, firstCard);

    if (first.health === 0 && second.health === 0) {
      return this.withState({ type: 'finished', endState: { type: 'draw' } });
    }
    if (first.health === 0) {
      return this.withState({
        type: 'finished',
        endState: { type: 'victory', winner: second.playerId },
      });
    }
    if (second.health === 0) {
      return this.withState({
        type: 'finished',
        endState: { type: 'victory', winner: first.playerId },
      });
    }

    return new Match(
      this._id,
      this._players,
      { type: 'resolving_round', participants: [first, second] },
      this._round + 1
    );
  }

  private withState(state: MatchState): Match {
    return new Match(this._id, this._players, state, this._round);
  }
}
