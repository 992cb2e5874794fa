/**
 * @fileoverview Card interaction table.
 *
 * Each round both participants reveal a card at once. For every
 * (own card, opponent card) pair the table gives the change to the
 * owner's health and the rewards the owner earns:
 *
 * ```
 *            attack   counter   rest
 * attack       -1       -1        0
 * counter       0        0        0      counter vs attack earns a counter
 * rest         -1        0        0      rest vs attack earns attack + rest,
 *                                        otherwise a choice of attack/counter + rest
 * ```
 */

import type { Card } from './types.js';

/**
 * A card granted at the end of a round. A choice is held as a pending
 * decision until the player picks one of the two options.
 */
export type Reward =
  | { readonly type: 'card'; readonly card: Card }
  | { readonly type: 'choice'; readonly options: readonly [Card, Card] };

export type HealthDelta = 0 | -1;

export interface CardResolution {
  readonly healthDelta: HealthDelta;
  readonly rewards: readonly Reward[];
}

const card = (c: Card): Reward => ({ type: 'card', card: c });

const ATTACK_OR_COUNTER: Reward = { type: 'choice', options: ['attack', 'counter'] };

const HEALTH_DELTAS: Record<Card, Record<Card, HealthDelta>> = {
  attack: { attack: -1, counter: -1, rest: 0 },
  counter: { attack: 0, counter: 0, rest: 0 },
  rest: { attack: -1, counter: 0, rest: 0 },
};

const REWARDS: Record<Card, Record<Card, readonly Reward[]>> = {
  attack: { attack: [], counter: [], rest: [] },
  counter: { attack: [card('counter')], counter: [], rest: [] },
  rest: {
    attack: [card('attack'), card('rest')],
    counter: [ATTACK_OR_COUNTER, card('rest')],
    rest: [ATTACK_OR_COUNTER, card('rest')],
  },
};

/**
 * Resolve one side of a round.
 * @param own - Card played by the player being resolved
 * @param opponent - Card played by their opponent
 */
export function resolveCards(own: Card, opponent: Card): CardResolution {
  return {
    healthDelta: HEALTH_DELTAS[own][opponent],
    rewards: REWARDS[own][opponent],
  };
}
