/**
 * @fileoverview Immutable registry of players and matches.
 *
 * World is the state owned by the GameStore. Every action validates first
 * and either returns an error or a new World; a failed action never leaves
 * a partially updated state behind.
 */

import { type Result, err, ok } from '../utils/result.js';
import { type GameError, invalidRequest, matchNotFound, playerNotFound } from './errors.js';
import { Match } from './Match.js';
import {
  type Card,
  DEFAULT_MATCH_RULES,
  type GamePhase,
  IDLE,
  type MatchId,
  type MatchRules,
  type Player,
  type PlayerId,
  type SessionHandle,
} from './types.js';

/**
 * Result of an action that affects a match.
 */
export interface MatchUpdate {
  readonly state: World;
  readonly match: Match;
}

export interface PlayCardUpdate extends MatchUpdate {
  readonly committed: boolean;
  readonly roundResolved: boolean;
}

/**
 * Result of answering a challenge. `match` is null when the challenge was declined.
 */
export interface ChallengeAnswer {
  readonly state: World;
  readonly match: Match | null;
}

/**
 * Immutable world state container.
 * All state-modifying methods return a new World instance.
 */
export class World {
  private constructor(
    private readonly _players: ReadonlyMap<PlayerId, Player>,
    private readonly _matches: ReadonlyMap<MatchId, Match>,
    private readonly _nextPlayerId: PlayerId,
    private readonly _rules: MatchRules
  ) {}

  // ============ Static Constructors ============

  /**
   * Create an empty world.
   * @param rules - Starting values for new matches
   */
  static create(rules: MatchRules = DEFAULT_MATCH_RULES): World {
    return new World(new Map(), new Map(), 1, rules);
  }

  // ============ Getters ============

  get players(): ReadonlyMap<PlayerId, Player> {
    return this._players;
  }

  /** All matches ever created, finished ones included */
  get matches(): ReadonlyMap<MatchId, Match> {
    return this._matches;
  }

  get rules(): MatchRules {
    return this._rules;
  }

  getPlayer(playerId: PlayerId): Player | undefined {
    return this._players.get(playerId);
  }

  getMatch(matchId: MatchId): Match | undefined {
    return this._matches.get(matchId);
  }

  getPlayerCount(): number {
    return this._players.size;
  }

  getMatchCount(): number {
    return this._matches.size;
  }

  // ============ Player Management ============

  /**
   * Register a new player in the idle phase with the next free id.
   */
  addPlayer(session: SessionHandle): { state: World; player: Player } {
    const player: Player = { id: this._nextPlayerId, session, phase: IDLE };
    const players = new Map(this._players);
    players.set(player.id, player);
    return {
      state: new World(players, this._matches, this._nextPlayerId + 1, this._rules),
      player,
    };
  }

  /**
   * Remove a player. Matches they took part in are left untouched.
   */
  removePlayer(playerId: PlayerId): World {
    if (!this._players.has(playerId)) {
      return this;
    }
    const players = new Map(this._players);
    players.delete(playerId);
    return this.withPlayers(players);
  }

  // ============ Challenges ============

  /**
   * Declare a challenge against another player. The target's phase is not changed.
   */
  challenge(challengerId: PlayerId, targetId: PlayerId): Result<World, GameError> {
    const challenger = this._players.get(challengerId);
    if (!challenger) {
      return err(playerNotFound(challengerId));
    }
    switch (challenger.phase.type) {
      case 'challenging':
        return err(invalidRequest(`Already challenging player ${challenger.phase.target}`));
      case 'in_match':
        return err(invalidRequest('Cannot challenge while in a match'));
      case 'idle':
        break;
    }
    if (targetId === challengerId) {
      return err(invalidRequest('Cannot challenge yourself'));
    }
    if (!this._players.has(targetId)) {
      return err(playerNotFound(targetId));
    }

    return ok(this.withPhases([[challengerId, { type: 'challenging', target: targetId }]]));
  }

  /**
   * Accept or decline a challenge addressed to the responder.
   */
  respondToChallenge(
    responderId: PlayerId,
    challengerId: PlayerId,
    accepted: boolean
  ): Result<ChallengeAnswer, GameError> {
    const responder = this._players.get(responderId);
    if (!responder) {
      return err(playerNotFound(responderId));
    }
    const challenger = this._players.get(challengerId);
    if (!challenger) {
      return err(playerNotFound(challengerId));
    }
    if (challenger.phase.type !== 'challenging' || challenger.phase.target !== responderId) {
      return err(invalidRequest(`Player ${challengerId} has not challenged you`));
    }

    if (!accepted) {
      return ok({ state: this.withPhases([[challengerId, IDLE]]), match: null });
    }

    if (responder.phase.type === 'in_match') {
      return err(invalidRequest('Cannot accept a challenge while in a match'));
    }

    const match = Match.create(this._matches.size, [challengerId, responderId], this._rules);
    const phase: GamePhase = { type: 'in_match', matchId: match.id };
    const matches = new Map(this._matches);
    matches.set(match.id, match);

    const state = new World(
      this._players,
      matches,
      this._nextPlayerId,
      this._rules
    ).withPhases([
      [challengerId, phase],
      [responderId, phase],
    ]);

    return ok({ state, match });
  }

  /**
   * Put every player still challenging the given player back to idle.
   * @returns The new state and the ids of the released challengers
   */
  releaseChallengersOf(targetId: PlayerId): { state: World; released: PlayerId[] } {
    const released = [...this._players.values()]
      .filter((p) => p.phase.type === 'challenging' && p.phase.target === targetId)
      .map((p) => p.id);

    if (released.length === 0) {
      return { state: this, released };
    }
    const updates = released.map((id): [PlayerId, GamePhase] => [id, IDLE]);
    return { state: this.withPhases(updates), released };
  }

  // ============ Match Actions ============

  /**
   * Commit a card in the acting player's current match.
   */
  playCard(playerId: PlayerId, card: Card): Result<PlayCardUpdate, GameError> {
    const found = this.findMatchOf(playerId);
    if (!found.ok) return found;

    const outcome = found.value.playCard(playerId, card);
    if (!outcome.ok) return outcome;

    const { match, committed, roundResolved } = outcome.value;
    return ok({ state: this.withMatch(match), match, committed, roundResolved });
  }

  /**
   * Resolve a pending reward choice in the acting player's current match.
   */
  pickCard(playerId: PlayerId, card: Card): Result<MatchUpdate, GameError> {
    const found = this.findMatchOf(playerId);
    if (!found.ok) return found;

    const picked = found.value.pickCard(playerId, card);
    if (!picked.ok) return picked;

    return ok({ state: this.withMatch(picked.value), match: picked.value });
  }

  /**
   * Finish the live match of a player as a loss for them.
   * @returns null if the player is not in a live match
   */
  forfeitMatchOf(playerId: PlayerId): MatchUpdate | null {
    const found = this.findMatchOf(playerId);
    if (!found.ok || found.value.isFinished) {
      return null;
    }
    const match = found.value.forfeit(playerId);
    return { state: this.withMatch(match), match };
  }

  // ============ Internals ============

  private findMatchOf(playerId: PlayerId): Result<Match, GameError> {
    const player = this._players.get(playerId);
    if (!player) {
      return err(playerNotFound(playerId));
    }
    if (player.phase.type !== 'in_match') {
      return err(invalidRequest('Not in a match'));
    }
    const match = this._matches.get(player.phase.matchId);
    if (!match) {
      return err(matchNotFound(player.phase.matchId));
    }
    return ok(match);
  }

  /**
   * Store an updated match. A finished match sends its participants back to idle.
   */
  private withMatch(match: Match): World {
    const matches = new Map(this._matches);
    matches.set(match.id, match);
    const state = new World(this._players, matches, this._nextPlayerId, this._rules);

    if (!match.isFinished) {
      return state;
    }
    const [first, second] = match.players;
    return state.withPhases([
      [first, IDLE],
      [second, IDLE],
    ]);
  }

  /**
   * Set phases for the listed players; ids no longer present are skipped.
   */
  private withPhases(updates: readonly (readonly [PlayerId, GamePhase])[]): World {
    const players = new Map(this._players);
    for (const [id, phase] of updates) {
      const player = players.get(id);
      if (player) {
        players.set(id, { ...player, phase });
      }
    }
    return this.withPlayers(players);
  }

  private withPlayers(players: ReadonlyMap<PlayerId, Player>): World {
    return new World(players, this._matches, this._nextPlayerId, this._rules);
  }
}
