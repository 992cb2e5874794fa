import { describe, expect, it } from 'vitest';
import { Match } from '../src/game/Match.js';
import type { Card, MatchRules, PlayerId } from '../src/game/types.js';
import type { Result } from '../src/utils/result.js';

// Helper to unwrap a successful result
function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw new Error(`Expected ok, got ${JSON.stringify(result.error)}`);
  return result.value;
}

function errorOf<T, E>(result: Result<T, E>): E {
  if (result.ok) throw new Error('Expected an error');
  return result.error;
}

// Play one card for each participant
function playRound(match: Match, first: Card, second: Card): Match {
  const afterFirst = unwrap(match.playCard(1, first)).match;
  return unwrap(afterFirst.playCard(2, second)).match;
}

function participant(match: Match, playerId: PlayerId) {
  const state = match.getParticipantState(playerId);
  if (!state) throw new Error(`No state for player ${playerId}`);
  return state;
}

const ONE_HEALTH: MatchRules = {
  startingHealth: 1,
  startingHand: { attacks: 2, counters: 1, rests: 1 },
};

describe('Match', () => {
  describe('create', () => {
    it('should start both participants with the default hand and health', () => {
      const match = Match.create(0, [1, 2]);

      expect(match.id).toBe(0);
      expect(match.players).toEqual([1, 2]);
      expect(match.round).toBe(1);
      expect(match.isFinished).toBe(false);
      expect(participant(match, 1)).toEqual({
        playerId: 1,
        hand: { attacks: 2, counters: 1, rests: 1 },
        health: 5,
      });
      expect(participant(match, 2).health).toBe(5);
    });

    it('should use the given rules', () => {
      const match = Match.create(3, [1, 2], ONE_HEALTH);
      expect(participant(match, 2).health).toBe(1);
    });

    it('should refuse the same player twice', () => {
      expect(() => Match.create(0, [1, 1])).toThrow('A match needs two distinct players, got 1 twice');
    });
  });

  describe('queries', () => {
    it('should know its participants', () => {
      const match = Match.create(0, [1, 2]);

      expect(match.hasParticipant(1)).toBe(true);
      expect(match.hasParticipant(3)).toBe(false);
      expect(match.opponentOf(1)).toBe(2);
      expect(match.opponentOf(2)).toBe(1);
      expect(match.opponentOf(3)).toBeUndefined();
    });
  });

  describe('playCard', () => {
    it('should commit a card without resolving the round', () => {
      const match = Match.create(0, [1, 2]);
      const outcome = unwrap(match.playCard(1, 'attack'));

      expect(outcome.committed).toBe(true);
      expect(outcome.roundResolved).toBe(false);
      expect(participant(outcome.match, 1)).toEqual({
        playerId: 1,
        hand: { attacks: 1, counters: 1, rests: 1 },
        health: 5,
        chosenCard: 'attack',
      });
      expect(outcome.match.round).toBe(1);
    });

    it('should not mutate the original match', () => {
      const match = Match.create(0, [1, 2]);
      match.playCard(1, 'attack');

      expect(participant(match, 1).chosenCard).toBeUndefined();
    });

    it('should return the earlier card when a new one is committed', () => {
      const first = unwrap(Match.create(0, [1, 2]).playCard(1, 'attack')).match;
      const second = unwrap(first.playCard(1, 'counter'));

      expect(second.committed).toBe(true);
      expect(participant(second.match, 1)).toEqual({
        playerId: 1,
        hand: { attacks: 2, counters: 0, rests: 1 },
        health: 5,
        chosenCard: 'counter',
      });
    });

    it('should allow recommitting the only copy of a card', () => {
      const first = unwrap(Match.create(0, [1, 2]).playCard(1, 'rest')).match;
      const second = unwrap(first.playCard(1, 'rest'));

      expect(second.committed).toBe(true);
      expect(participant(second.match, 1).hand).toEqual({ attacks: 2, counters: 1, rests: 0 });
    });

    it('should commit nothing when the card is not in hand', () => {
      const rules: MatchRules = { startingHealth: 5, startingHand: { attacks: 1, counters: 0, rests: 1 } };
      const outcome = unwrap(Match.create(0, [1, 2], rules).playCard(1, 'counter'));

      expect(outcome.committed).toBe(false);
      expect(outcome.roundResolved).toBe(false);
      expect(participant(outcome.match, 1)).toEqual({
        playerId: 1,
        hand: { attacks: 1, counters: 0, rests: 1 },
        health: 5,
      });
    });

    it('should still return the earlier card when the new one is not in hand', () => {
      const rules: MatchRules = { startingHealth: 5, startingHand: { attacks: 1, counters: 0, rests: 1 } };
      const first = unwrap(Match.create(0, [1, 2], rules).playCard(1, 'attack')).match;
      const outcome = unwrap(first.playCard(1, 'counter'));

      expect(outcome.committed).toBe(false);
      expect(participant(outcome.match, 1)).toEqual({
        playerId: 1,
        hand: { attacks: 1, counters: 0, rests: 1 },
        health: 5,
      });
    });

    it('should reject a player outside the match', () => {
      const error = errorOf(Match.create(0, [1, 2]).playCard(9, 'attack'));
      expect(error).toEqual({
        type: 'invalid_request',
        reason: 'Player 9 is not a participant of match 0',
      });
    });

    it('should reject play after the match concluded', () => {
      const match = playRound(Match.create(4, [1, 2], ONE_HEALTH), 'attack', 'attack');
      const error = errorOf(match.playCard(1, 'attack'));

      expect(error).toEqual({ type: 'invalid_request', reason: 'Match 4 has already concluded' });
    });
  });

  describe('round resolution', () => {
    it('should reward resting into an attack and cost health', () => {
      const outcome = unwrap(unwrap(Match.create(0, [1, 2]).playCard(1, 'rest')).match.playCard(2, 'attack'));

      expect(outcome.roundResolved).toBe(true);
      expect(outcome.match.round).toBe(2);
      expect(participant(outcome.match, 1)).toEqual({
        playerId: 1,
        hand: { attacks: 3, counters: 1, rests: 1 },
        health: 4,
      });
      expect(participant(outcome.match, 2)).toEqual({
        playerId: 2,
        hand: { attacks: 1, counters: 1, rests: 1 },
        health: 5,
      });
    });

    it('should hand back the counter that stopped an attack', () => {
      const match = playRound(Match.create(0, [1, 2]), 'counter', 'attack');

      expect(participant(match, 1)).toEqual({
        playerId: 1,
        hand: { attacks: 2, counters: 1, rests: 1 },
        health: 5,
      });
      expect(participant(match, 2)).toEqual({
        playerId: 2,
        hand: { attacks: 1, counters: 1, rests: 1 },
        health: 4,
      });
    });

    it('should offer both resting players a choice', () => {
      const match = playRound(Match.create(0, [1, 2]), 'rest', 'rest');

      for (const playerId of [1, 2]) {
        expect(participant(match, playerId)).toEqual({
          playerId,
          hand: { attacks: 2, counters: 1, rests: 1 },
          health: 5,
          pendingRewardChoice: ['attack', 'counter'],
        });
      }
    });

    it('should declare the survivor the winner', () => {
      const match = playRound(Match.create(0, [1, 2], ONE_HEALTH), 'attack', 'rest');

      expect(match.isFinished).toBe(true);
      expect(match.state).toEqual({ type: 'finished', endState: { type: 'victory', winner: 1 } });
      expect(match.getParticipantState(1)).toBeUndefined();
    });

    it('should declare a draw when both fall together', () => {
      const match = playRound(Match.create(0, [1, 2], ONE_HEALTH), 'attack', 'attack');
      expect(match.state).toEqual({ type: 'finished', endState: { type: 'draw' } });
    });

    it('should keep the number of cards in play consistent', () => {
      // attack vs attack removes one card from each hand and grants nothing
      const match = playRound(Match.create(0, [1, 2]), 'attack', 'attack');

      expect(participant(match, 1).hand).toEqual({ attacks: 1, counters: 1, rests: 1 });
      expect(participant(match, 2).hand).toEqual({ attacks: 1, counters: 1, rests: 1 });
      expect(participant(match, 1).health).toBe(4);
    });
  });

  describe('pickCard', () => {
    const afterRests = () => playRound(Match.create(0, [1, 2]), 'rest', 'rest');

    it('should block playing until the choice is resolved', () => {
      const error = errorOf(afterRests().playCard(1, 'attack'));
      expect(error).toEqual({
        type: 'invalid_request',
        reason: 'Pick a reward card before playing another card',
      });
    });

    it('should add the picked card and clear the choice', () => {
      const match = unwrap(afterRests().pickCard(1, 'counter'));

      expect(participant(match, 1)).toEqual({
        playerId: 1,
        hand: { attacks: 2, counters: 2, rests: 1 },
        health: 5,
      });
      expect(participant(match, 2).pendingRewardChoice).toEqual(['attack', 'counter']);
      expect(unwrap(match.playCard(1, 'counter')).committed).toBe(true);
    });

    it('should reject a card that was not offered', () => {
      const error = errorOf(afterRests().pickCard(1, 'rest'));
      expect(error).toEqual({
        type: 'invalid_request',
        reason: 'Card rest is not one of the offered rewards (attack, counter)',
      });
    });

    it('should reject a pick without a pending choice', () => {
      const error = errorOf(Match.create(0, [1, 2]).pickCard(1, 'attack'));
      expect(error).toEqual({ type: 'invalid_request', reason: 'No reward choice is pending' });
    });
  });

  describe('forfeit', () => {
    it('should award the match to the opponent', () => {
      const match = Match.create(0, [1, 2]).forfeit(1);
      expect(match.state).toEqual({ type: 'finished', endState: { type: 'victory', winner: 2 } });
    });

    it('should leave a finished match unchanged', () => {
      const finished = Match.create(0, [1, 2]).forfeit(1);
      expect(finished.forfeit(2)).toBe(finished);
    });

    it('should ignore players outside the match', () => {
      const match = Match.create(0, [1, 2]);
      expect(match.forfeit(7)).toBe(match);
    });
  });

  describe('getRoundResults', () => {
    it('should show each participant their own state and a redacted opponent', () => {
      const match = unwrap(Match.create(0, [1, 2]).playCard(1, 'attack')).match;

      expect(match.getRoundResults()).toEqual([
        {
          playerId: 1,
          result: {
            type: 'next_round',
            own: {
              playerId: 1,
              hand: { attacks: 1, counters: 1, rests: 1 },
              health: 5,
              chosenCard: 'attack',
            },
            opponent: { playerId: 2, cardCount: 4, health: 5 },
          },
        },
        {
          playerId: 2,
          result: {
            type: 'next_round',
            own: { playerId: 2, hand: { attacks: 2, counters: 1, rests: 1 }, health: 5 },
            // the committed card still counts towards the hand
            opponent: { playerId: 1, cardCount: 4, health: 5 },
          },
        },
      ]);
    });

    it('should report the end state to both participants once finished', () => {
      const match = playRound(Match.create(0, [1, 2], ONE_HEALTH), 'rest', 'attack');
      const ended = { type: 'match_ended', endState: { type: 'victory', winner: 2 } };

      expect(match.getRoundResults()).toEqual([
        { playerId: 1, result: ended },
        { playerId: 2, result: ended },
      ]);
    });
  });
});
