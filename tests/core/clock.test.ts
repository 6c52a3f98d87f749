import { describe, it, expect } from 'vitest';
import { LogicalClock } from '@/core/clock.js';

describe('LogicalClock', () => {
  it('should start at tick 0', () => {
    expect(new LogicalClock().readTick()).toBe(0);
  });

  it('should advance one tick at a time', () => {
    const clock = new LogicalClock();

    expect(clock.advance()).toBe(1);
    expect(clock.advance()).toBe(2);
    expect(clock.readTick()).toBe(2);
  });

  it('should reset to 0', () => {
    const clock = new LogicalClock();
    clock.advance();

    clock.reset();

    expect(clock.readTick()).toBe(0);
  });
});
