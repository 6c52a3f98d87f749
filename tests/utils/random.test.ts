import { describe, it, expect } from 'vitest';
import { createSeededRandom } from '@/utils/random.js';

describe('SeededRandom', () => {
  describe('determinism', () => {
    it('should generate same sequence with same seed', () => {
      const rng1 = createSeededRandom(12345);
      const rng2 = createSeededRandom(12345);

      const sequence1 = Array.from({ length: 10 }, () => rng1.next());
      const sequence2 = Array.from({ length: 10 }, () => rng2.next());

      expect(sequence1).toEqual(sequence2);
    });

    it('should generate different sequences with different seeds', () => {
      const rng1 = createSeededRandom(12345);
      const rng2 = createSeededRandom(54321);

      const sequence1 = Array.from({ length: 10 }, () => rng1.next());
      const sequence2 = Array.from({ length: 10 }, () => rng2.next());

      expect(sequence1).not.toEqual(sequence2);
    });

    it('should restore sequence after reset', () => {
      const rng = createSeededRandom(12345);
      const sequence1 = Array.from({ length: 10 }, () => rng.next());

      rng.reset();

      expect(Array.from({ length: 10 }, () => rng.next())).toEqual(sequence1);
    });

    it('should expose its seed', () => {
      expect(createSeededRandom(99).seed).toBe(99);
    });
  });

  describe('next', () => {
    it('should generate values in range [0, 1)', () => {
      const rng = createSeededRandom(12345);

      for (let i = 0; i < 1000; i++) {
        const value = rng.next();
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThan(1);
      }
    });
  });

  describe('nextInt', () => {
    it('should stay within inclusive bounds and hit both ends', () => {
      const rng = createSeededRandom(7);
      const seen = new Set<number>();

      for (let i = 0; i < 500; i++) {
        const value = rng.nextInt(3, 6);
        expect(value).toBeGreaterThanOrEqual(3);
        expect(value).toBeLessThanOrEqual(6);
        seen.add(value);
      }

      expect(Array.from(seen).sort()).toEqual([3, 4, 5, 6]);
    });

    it('should throw when min > max', () => {
      expect(() => createSeededRandom(1).nextInt(5, 1)).toThrow('min must be <= max');
    });
  });

  describe('nextChoice', () => {
    it('should pick an element of the array', () => {
      const rng = createSeededRandom(1);
      const items = ['a', 'b', 'c'];

      for (let i = 0; i < 50; i++) {
        expect(items).toContain(rng.nextChoice(items));
      }
    });

    it('should throw on an empty array', () => {
      expect(() => createSeededRandom(1).nextChoice([])).toThrow('Cannot choose from empty array');
    });
  });

  describe('shuffle', () => {
    it('should return a permutation without touching the input', () => {
      const input = [1, 2, 3, 4, 5, 6, 7, 8];
      const shuffled = createSeededRandom(3).shuffle(input);

      expect(input).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
      expect([...shuffled].sort((a, b) => a - b)).toEqual(input);
    });

    it('should shuffle identically for the same seed', () => {
      const input = ['r0', 'r1', 'r2', 'r3', 'r4'];

      expect(createSeededRandom(11).shuffle(input)).toEqual(createSeededRandom(11).shuffle(input));
    });
  });

  describe('fork', () => {
    it('should derive the same child from the same parent state', () => {
      const child1 = createSeededRandom(5).fork();
      const child2 = createSeededRandom(5).fork();

      expect(child1.seed).toBe(child2.seed);
      expect(child1.next()).toBe(child2.next());
    });
  });
});
