/**
 * @fileoverview Pure helpers for counting, adding and drawing cards.
 */

import type { Card, Hand } from './types.js';

const HAND_FIELDS: Record<Card, keyof Hand> = {
  attack: 'attacks',
  counter: 'counters',
  rest: 'rests',
};

export function countOf(hand: Hand, card: Card): number {
  return hand[HAND_FIELDS[card]];
}

export function handSize(hand: Hand): number {
  return hand.attacks + hand.counters + hand.rests;
}

export function addCard(hand: Hand, card: Card): Hand {
  const field = HAND_FIELDS[card];
  return { ...hand, [field]: hand[field] + 1 };
}

/**
 * Draw one copy of a card.
 * @returns The reduced hand, or null if no copy is left
 */
export function removeCard(hand: Hand, card: Card): Hand | null {
  const field = HAND_FIELDS[card];
  if (hand[field] === 0) {
    return null;
  }
  return { ...hand, [field]: hand[field] - 1 };
}
