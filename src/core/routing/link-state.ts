/**
 * Link-state routing: flood every router's LSA during a fixed broadcast
 * window, then run one shortest-path computation over the learned topology
 */

import { Router, type RouterConfig } from '../router.js';
import { computeShortestPaths, nextHop, type ShortestPaths } from './shortest-path.js';
import type { LinkCosts, LsaTable, RouterId } from './types.js';

export interface LinkStateConfig {
  /**
   * Tick at which flooding is assumed complete and routes are computed.
   * Must exceed the network diameter in hops.
   */
  broadcastInterval: number;
}

export const DEFAULT_BROADCAST_INTERVAL = 1000;

const DEFAULT_CONFIG: LinkStateConfig = {
  broadcastInterval: DEFAULT_BROADCAST_INTERVAL,
};

export class LinkStateRouter extends Router<LinkStateRouter> {
  readonly protocol = 'link-state';
  readonly config: LinkStateConfig;

  readonly lsaTable: LsaTable = new Map();

  /**
   * Originator -> whether this router has flooded that LSA already
   */
  readonly broadcasted = new Map<RouterId, boolean>();

  broadcastComplete = false;
  routesComputed = false;

  /**
   * Result of the shortest-path run, once routes are computed
   */
  lastComputation: ShortestPaths | undefined;

  constructor(config: RouterConfig, lsConfig: Partial<LinkStateConfig> = {}) {
    super(config);
    this.config = { ...DEFAULT_CONFIG, ...lsConfig };
    if (!Number.isInteger(this.config.broadcastInterval) || this.config.broadcastInterval < 0) {
      throw new Error(`Invalid broadcast interval ${this.config.broadcastInterval}`);
    }
    this.broadcasted.set(this.id, false);
  }

  initializeAlgorithm(): void {
    this.lsaTable.set(this.id, new Map(this.links));
    this.setRoute(this.id, this.id, 0);
  }

  runOneTick(): void {
    const tick = this.clock.readTick();

    if (tick >= this.config.broadcastInterval) {
      if (!this.routesComputed) {
        this.broadcastComplete = true;
        this.dijkstrasAlgorithm();
      }
      return;
    }

    for (const [originator, lsa] of this.lsaTable) {
      if (this.broadcasted.get(originator) === true) continue;

      for (const neighbor of this.neighbors) {
        this.send(neighbor, lsa, originator);
      }
      this.broadcasted.set(originator, true);
    }
  }

  /**
   * Deliver `lsa` straight into the neighbor's table. Overwriting is
   * harmless: an originator's LSA never changes.
   */
  send(neighbor: LinkStateRouter, lsa: LinkCosts, originator: RouterId): void {
    this.recordAdvertisementSent(neighbor, originator);
    neighbor.receiveLsa(lsa, originator);
  }

  receiveLsa(lsa: LinkCosts, originator: RouterId): void {
    this.recordAdvertisementReceived();
    this.lsaTable.set(originator, lsa);
  }

  /**
   * Compute shortest paths from this router and fill the forwarding table.
   * Runs at most once per router.
   */
  dijkstrasAlgorithm(): void {
    if (this.routesComputed) return;

    const result = computeShortestPaths(this.id, this.lsaTable);

    for (const [destination, distance] of result.distances) {
      if (destination === this.id) continue;
      this.setRoute(destination, nextHop(this.id, destination, result.previous), distance);
    }

    this.lastComputation = result;
    this.routesComputed = true;
    this.stats.computations++;

    const tick = this.clock.readTick();
    this.logger.info(
      { tick, known: this.lsaTable.size, reachable: result.distances.size },
      'routes computed'
    );
    this.emit('routes:computed', {
      router: this.id,
      tick,
      destinations: result.distances.size,
    });
  }

  isQuiescent(): boolean {
    return this.routesComputed;
  }
}
