/**
 * Discrete-time simulation driving a network of routers tick by tick
 */

import { TypedEventEmitter } from '../utils/event-emitter.js';
import { createSeededRandom, type SeededRandom } from '../utils/random.js';
import { createLogger, type Logger, type LogLevel } from '../utils/logger.js';
import { LogicalClock } from './clock.js';
import type { Router, RouterConfig } from './router.js';
import {
  DistanceVectorRouter,
  type DistanceVectorConfig,
} from './routing/distance-vector.js';
import { LinkStateRouter, type LinkStateConfig } from './routing/link-state.js';
import type {
  ForwardingTable,
  RouterEvents,
  RouterId,
  Topology,
} from './routing/types.js';

/**
 * Order in which routers run within one tick. The engines must reach the
 * same result either way; `shuffled` draws a fresh order every tick.
 */
export type TickOrder = 'insertion' | 'shuffled';

export interface SimulationConfig {
  seed: number; // For deterministic shuffling
  tickOrder: TickOrder;
  maxTicks: number; // Upper bound for runUntilConverged
  logLevel?: LogLevel;
  logger?: Logger;
}

export interface SimulationStats {
  ticks: number;
  routers: number;
  links: number;
  advertisementsSent: number;
  routeUpdates: number;
  computations: number;
}

export interface ConvergenceResult {
  converged: boolean;
  ticks: number;
}

export type SimulationEvents = {
  'router:added': { routerId: RouterId };
  'link:added': { from: RouterId; to: RouterId; cost: number };
  initialized: { routers: number; links: number };
  tick: { tick: number; advertisements: number };
  'advertisement:sent': RouterEvents['advertisement:sent'];
  'routes:computed': RouterEvents['routes:computed'];
};

export type RouterFactory<TRouter> = (config: RouterConfig) => TRouter;

const DEFAULT_CONFIG: SimulationConfig = {
  seed: Date.now(),
  tickOrder: 'insertion',
  maxTicks: 5000,
};

export class Simulation<TRouter extends Router<TRouter>> extends TypedEventEmitter<SimulationEvents> {
  readonly config: SimulationConfig;
  readonly clock: LogicalClock;
  readonly routers: Map<RouterId, TRouter>;
  readonly random: SeededRandom;
  readonly logger: Logger;

  private readonly createRouter: RouterFactory<TRouter>;
  private initialized = false;
  private linkCount = 0;
  private advertisementsThisTick = 0;

  constructor(createRouter: RouterFactory<TRouter>, config: Partial<SimulationConfig> = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.createRouter = createRouter;
    this.clock = new LogicalClock();
    this.routers = new Map();
    this.random = createSeededRandom(this.config.seed);
    this.logger =
      this.config.logger ?? createLogger({ name: 'simulation', level: this.config.logLevel });
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  get currentTick(): number {
    return this.clock.readTick();
  }

  /**
   * Add a router to the simulation
   */
  addRouter(id: RouterId): TRouter {
    this.assertMutable();
    if (this.routers.has(id)) {
      throw new Error(`Router with id ${id} already exists`);
    }

    const router = this.createRouter({ id, clock: this.clock, logger: this.logger });
    router.on('advertisement:sent', (event) => {
      this.advertisementsThisTick++;
      this.emit('advertisement:sent', event);
    });
    router.on('routes:computed', (event) => {
      this.emit('routes:computed', event);
    });

    this.routers.set(id, router);
    this.emit('router:added', { routerId: id });

    return router;
  }

  getRouter(id: RouterId): TRouter | undefined {
    return this.routers.get(id);
  }

  /**
   * Connect two routers with a symmetric link
   */
  addLink(from: RouterId, to: RouterId, cost: number): void {
    this.assertMutable();
    const a = this.routers.get(from);
    const b = this.routers.get(to);
    if (!a) {
      throw new Error(`Router ${from} not found`);
    }
    if (!b) {
      throw new Error(`Router ${to} not found`);
    }

    a.connect(b, cost);
    b.connect(a, cost);
    this.linkCount++;

    this.emit('link:added', { from, to, cost });
  }

  loadTopology(topology: Topology): void {
    for (const id of topology.routers) {
      this.addRouter(id);
    }
    for (const link of topology.links) {
      this.addLink(link.from, link.to, link.cost);
    }
  }

  /**
   * Boot every router. Runs implicitly on the first step.
   */
  initialize(): void {
    if (this.initialized) {
      throw new Error('Simulation is already initialized');
    }

    for (const router of this.routers.values()) {
      router.initializeAlgorithm();
    }
    this.initialized = true;

    this.logger.info({ routers: this.routers.size, links: this.linkCount }, 'simulation initialized');
    this.emit('initialized', { routers: this.routers.size, links: this.linkCount });
  }

  /**
   * Run every router once at the current tick, then advance the clock.
   * Returns the number of advertisements sent during the tick.
   */
  step(): number {
    if (!this.initialized) {
      this.initialize();
    }

    const tick = this.clock.readTick();
    this.advertisementsThisTick = 0;

    const routers = Array.from(this.routers.values());
    const order = this.config.tickOrder === 'shuffled' ? this.random.shuffle(routers) : routers;
    for (const router of order) {
      router.runOneTick();
    }

    const advertisements = this.advertisementsThisTick;
    this.emit('tick', { tick, advertisements });
    this.clock.advance();

    return advertisements;
  }

  run(ticks: number): void {
    for (let i = 0; i < ticks; i++) {
      this.step();
    }
  }

  /**
   * Step until a whole tick passes without advertisements and every router
   * is quiescent, or until `maxTicks` steps have run
   */
  runUntilConverged(): ConvergenceResult {
    for (let ticks = 1; ticks <= this.config.maxTicks; ticks++) {
      const advertisements = this.step();
      if (advertisements === 0 && this.isQuiescent()) {
        this.logger.info({ tick: this.clock.readTick(), ticks }, 'converged');
        return { converged: true, ticks };
      }
    }

    this.logger.warn({ maxTicks: this.config.maxTicks }, 'did not converge');
    return { converged: false, ticks: this.config.maxTicks };
  }

  isQuiescent(): boolean {
    for (const router of this.routers.values()) {
      if (!router.isQuiescent()) return false;
    }
    return true;
  }

  getForwardingTables(): Map<RouterId, ForwardingTable> {
    const tables = new Map<RouterId, ForwardingTable>();
    for (const [id, router] of this.routers) {
      tables.set(id, new Map(router.fwdTable));
    }
    return tables;
  }

  getStats(): SimulationStats {
    let advertisementsSent = 0;
    let routeUpdates = 0;
    let computations = 0;

    for (const router of this.routers.values()) {
      advertisementsSent += router.stats.advertisementsSent;
      routeUpdates += router.stats.routeUpdates;
      computations += router.stats.computations;
    }

    return {
      ticks: this.clock.readTick(),
      routers: this.routers.size,
      links: this.linkCount,
      advertisementsSent,
      routeUpdates,
      computations,
    };
  }

  private assertMutable(): void {
    if (this.initialized) {
      throw new Error('Topology is fixed once the simulation is initialized');
    }
  }
}

export interface DistanceVectorSimulationConfig extends SimulationConfig {
  distanceVector: Partial<DistanceVectorConfig>;
}

export interface LinkStateSimulationConfig extends SimulationConfig {
  linkState: Partial<LinkStateConfig>;
}

/**
 * Create a simulation whose routers run distance-vector routing
 */
export function createDistanceVectorSimulation(
  config: Partial<DistanceVectorSimulationConfig> = {}
): Simulation<DistanceVectorRouter> {
  const { distanceVector = {}, ...simulationConfig } = config;
  return new Simulation(
    (routerConfig) => new DistanceVectorRouter(routerConfig, distanceVector),
    simulationConfig
  );
}

/**
 * Create a simulation whose routers run link-state routing
 */
export function createLinkStateSimulation(
  config: Partial<LinkStateSimulationConfig> = {}
): Simulation<LinkStateRouter> {
  const { linkState = {}, ...simulationConfig } = config;
  return new Simulation(
    (routerConfig) => new LinkStateRouter(routerConfig, linkState),
    simulationConfig
  );
}
