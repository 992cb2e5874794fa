import { describe, expect, it } from 'vitest';
import { resolveCards } from '../src/game/cards.js';

describe('resolveCards', () => {
  describe('health', () => {
    it('should cost health when attacked without a counter', () => {
      expect(resolveCards('attack', 'attack').healthDelta).toBe(-1);
      expect(resolveCards('rest', 'attack').healthDelta).toBe(-1);
    });

    it('should cost the attacker health when countered', () => {
      expect(resolveCards('attack', 'counter').healthDelta).toBe(-1);
      expect(resolveCards('counter', 'attack').healthDelta).toBe(0);
    });

    it('should leave health unchanged otherwise', () => {
      expect(resolveCards('attack', 'rest').healthDelta).toBe(0);
      expect(resolveCards('counter', 'counter').healthDelta).toBe(0);
      expect(resolveCards('counter', 'rest').healthDelta).toBe(0);
      expect(resolveCards('rest', 'counter').healthDelta).toBe(0);
      expect(resolveCards('rest', 'rest').healthDelta).toBe(0);
    });
  });

  describe('rewards', () => {
    it('should grant nothing for attacks', () => {
      expect(resolveCards('attack', 'attack').rewards).toEqual([]);
      expect(resolveCards('attack', 'counter').rewards).toEqual([]);
      expect(resolveCards('attack', 'rest').rewards).toEqual([]);
    });

    it('should grant a counter back for countering an attack', () => {
      expect(resolveCards('counter', 'attack').rewards).toEqual([{ type: 'card', card: 'counter' }]);
    });

    it('should grant nothing for a counter that met no attack', () => {
      expect(resolveCards('counter', 'counter').rewards).toEqual([]);
      expect(resolveCards('counter', 'rest').rewards).toEqual([]);
    });

    it('should grant attack and rest for resting into an attack', () => {
      expect(resolveCards('rest', 'attack').rewards).toEqual([
        { type: 'card', card: 'attack' },
        { type: 'card', card: 'rest' },
      ]);
    });

    it('should offer a choice plus rest for an undisturbed rest', () => {
      const expected = [
        { type: 'choice', options: ['attack', 'counter'] },
        { type: 'card', card: 'rest' },
      ];
      expect(resolveCards('rest', 'counter').rewards).toEqual(expected);
      expect(resolveCards('rest', 'rest').rewards).toEqual(expected);
    });
  });

  it('should be deterministic', () => {
    expect(resolveCards('rest', 'attack')).toEqual(resolveCards('rest', 'attack'));
  });
});
