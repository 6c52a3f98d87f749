/**
 * Distance-vector routing (Bellman-Ford relaxation over neighbor vectors)
 */

import { Router, type RouterConfig } from '../router.js';
import { RoutingInvariantError } from '../errors.js';
import type { DistanceVector, RouterId } from './types.js';

/**
 * How an advertisement updates the change flag.
 *
 * - `accumulate`: an improving advertisement sets the flag; a later
 *   non-improving one leaves it set until the next tick sends the vector.
 * - `per-advertisement`: every advertisement recomputes the flag from
 *   scratch, so a no-op advertisement clears an earlier unsent change.
 */
export type ChangeFlagPolicy = 'accumulate' | 'per-advertisement';

export interface DistanceVectorConfig {
  changeFlagPolicy: ChangeFlagPolicy;
}

const DEFAULT_CONFIG: DistanceVectorConfig = {
  changeFlagPolicy: 'accumulate',
};

export class DistanceVectorRouter extends Router<DistanceVectorRouter> {
  readonly protocol = 'distance-vector';
  readonly config: DistanceVectorConfig;

  /**
   * Best known cost to every destination heard of so far
   */
  readonly dv: DistanceVector = new Map();

  /**
   * Does the vector need to be re-advertised on the next tick?
   */
  dvChange = true;

  constructor(config: RouterConfig, dvConfig: Partial<DistanceVectorConfig> = {}) {
    super(config);
    this.config = { ...DEFAULT_CONFIG, ...dvConfig };
  }

  initializeAlgorithm(): void {
    for (const [neighborId, cost] of this.links) {
      this.dv.set(neighborId, cost);
      this.setRoute(neighborId, neighborId, cost);
    }

    this.dv.set(this.id, 0);
    this.setRoute(this.id, this.id, 0);

    this.dvChange = true;
  }

  /**
   * Advertise the full vector to every neighbor if it changed, then clear
   * the flag whether or not anything was sent
   */
  runOneTick(): void {
    if (this.dvChange) {
      const snapshot: ReadonlyMap<RouterId, number> = new Map(this.dv);
      for (const neighbor of this.neighbors) {
        this.send(neighbor, snapshot, this.id);
      }
    }
    this.dvChange = false;
  }

  send(
    neighbor: DistanceVectorRouter,
    dvAdv: ReadonlyMap<RouterId, number>,
    advRouter: RouterId
  ): void {
    this.recordAdvertisementSent(neighbor, advRouter);
    neighbor.processAdvertisement(dvAdv, advRouter);
  }

  /**
   * Relax the local vector against a neighbor's vector.
   * Returns whether any distance improved.
   */
  processAdvertisement(dvAdv: ReadonlyMap<RouterId, number>, advRouter: RouterId): boolean {
    const linkCost = this.links.get(advRouter);
    if (linkCost === undefined) {
      throw new RoutingInvariantError(
        `Router ${this.id} received a distance vector from non-neighbor ${advRouter}`
      );
    }
    this.recordAdvertisementReceived();

    let changed = false;

    for (const [destination, current] of this.dv) {
      const advertised = dvAdv.get(destination);
      if (advertised === undefined) continue;

      const candidate = linkCost + advertised;
      if (candidate < current) {
        this.dv.set(destination, candidate);
        this.setRoute(destination, advRouter, candidate);
        changed = true;
      }
    }

    // Destinations we had no distance for: anything beats infinity
    for (const [destination, advertised] of dvAdv) {
      if (this.dv.has(destination)) continue;

      const candidate = linkCost + advertised;
      this.dv.set(destination, candidate);
      this.setRoute(destination, advRouter, candidate);
      changed = true;
    }

    this.dvChange =
      this.config.changeFlagPolicy === 'accumulate' ? this.dvChange || changed : changed;

    return changed;
  }

  /**
   * Known cost to `destination`, or Infinity if none has been advertised
   */
  distanceTo(destination: RouterId): number {
    return this.dv.get(destination) ?? Infinity;
  }

  isQuiescent(): boolean {
    return !this.dvChange;
  }
}
