/**
 * Shared logical clock advanced by the simulation, read by routers
 */

export interface Clock {
  /**
   * Current tick, starting at 0
   */
  readTick(): number;
}

export class LogicalClock implements Clock {
  private tick = 0;

  readTick(): number {
    return this.tick;
  }

  advance(): number {
    this.tick += 1;
    return this.tick;
  }

  reset(): void {
    this.tick = 0;
  }
}
