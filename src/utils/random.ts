/**
 * Seeded pseudo-random number generator so that shuffled tick orders and
 * generated topologies replay identically for a given seed.
 * Uses mulberry32 (32-bit state, full period).
 */

export interface SeededRandom {
  readonly seed: number;
  next(): number;
  nextInt(min: number, max: number): number;
  nextChoice<T>(items: readonly T[]): T;
  shuffle<T>(items: readonly T[]): T[];
  fork(): SeededRandom;
  reset(): void;
}

class Mulberry32 implements SeededRandom {
  readonly seed: number;
  private state: number;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    this.state = this.seed;
  }

  /**
   * Next value in [0, 1)
   */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Integer in [min, max], both inclusive
   */
  nextInt(min: number, max: number): number {
    if (min > max) {
      throw new Error('min must be <= max');
    }
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  nextChoice<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new Error('Cannot choose from empty array');
    }
    return items[this.nextInt(0, items.length - 1)]!;
  }

  /**
   * Fisher-Yates shuffle into a new array; the input is left untouched
   */
  shuffle<T>(items: readonly T[]): T[] {
    const result = [...items];
    for (let i = result.length - 1; i > 0; i--) {
      const j = this.nextInt(0, i);
      [result[i], result[j]] = [result[j]!, result[i]!];
    }
    return result;
  }

  fork(): SeededRandom {
    return new Mulberry32(this.nextInt(0, 2 ** 31 - 1));
  }

  reset(): void {
    this.state = this.seed;
  }
}

export function createSeededRandom(seed: number): SeededRandom {
  return new Mulberry32(seed);
}
