/**
 * Router substrate shared by the routing engines: identity, link costs,
 * neighbor handles, forwarding table and the shared clock.
 */

import { TypedEventEmitter } from '../utils/event-emitter.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { Clock } from './clock.js';
import type {
  ForwardingTable,
  LinkCosts,
  RouterEvents,
  RouterId,
  RoutingProtocol,
} from './routing/types.js';

export interface RouterConfig {
  id: RouterId;
  clock: Clock;
  logger?: Logger;
}

export interface RouterStats {
  advertisementsSent: number;
  advertisementsReceived: number;
  routeUpdates: number;
  computations: number;
}

export abstract class Router<TPeer extends Router<TPeer>> extends TypedEventEmitter<RouterEvents> {
  abstract readonly protocol: RoutingProtocol;

  readonly id: RouterId;
  readonly fwdTable: ForwardingTable = new Map();

  // Metrics
  stats: RouterStats = {
    advertisementsSent: 0,
    advertisementsReceived: 0,
    routeUpdates: 0,
    computations: 0,
  };

  protected readonly clock: Clock;
  protected readonly logger: Logger;

  private readonly linkCosts = new Map<RouterId, number>();
  private readonly peers: TPeer[] = [];

  constructor(config: RouterConfig) {
    super();
    this.id = config.id;
    this.clock = config.clock;
    this.logger = (config.logger ?? createLogger()).child({ router: config.id });
  }

  get links(): LinkCosts {
    return this.linkCosts;
  }

  get neighbors(): readonly TPeer[] {
    return this.peers;
  }

  /**
   * Record a direct link to `peer` on this side only
   */
  connect(peer: TPeer, cost: number): void {
    if (peer.id === this.id) {
      throw new Error(`Router ${this.id} cannot link to itself`);
    }
    if (!Number.isFinite(cost) || cost < 0) {
      throw new Error(`Link ${this.id} -> ${peer.id} has invalid cost ${cost}`);
    }
    if (this.linkCosts.has(peer.id)) {
      throw new Error(`Router ${this.id} is already linked to ${peer.id}`);
    }
    this.linkCosts.set(peer.id, cost);
    this.peers.push(peer);
  }

  /**
   * Called once by the simulation before the first tick
   */
  abstract initializeAlgorithm(): void;

  /**
   * Called once per tick by the simulation
   */
  abstract runOneTick(): void;

  /**
   * True when the router has nothing left to advertise or compute
   */
  abstract isQuiescent(): boolean;

  protected recordAdvertisementSent(to: TPeer, originator: RouterId): void {
    this.stats.advertisementsSent++;
    this.emit('advertisement:sent', {
      from: this.id,
      to: to.id,
      originator,
      tick: this.clock.readTick(),
    });
  }

  protected recordAdvertisementReceived(): void {
    this.stats.advertisementsReceived++;
  }

  /**
   * Point `destination` at `nextHop` and publish the change
   */
  protected setRoute(destination: RouterId, nextHop: RouterId, cost: number): void {
    this.fwdTable.set(destination, nextHop);
    this.stats.routeUpdates++;

    const updatedAt = this.clock.readTick();
    this.logger.debug({ destination, nextHop, cost, tick: updatedAt }, 'route updated');
    this.emit('route:updated', {
      router: this.id,
      destination,
      nextHop,
      cost,
      updatedAt,
    });
  }
}
