/**
 * tickroute - distance-vector and link-state routing in a discrete-time
 * network simulator
 */

// Core exports
export {
  Simulation,
  createDistanceVectorSimulation,
  createLinkStateSimulation,
} from './core/simulation.js';
export type {
  SimulationConfig,
  SimulationEvents,
  SimulationStats,
  ConvergenceResult,
  TickOrder,
  RouterFactory,
  DistanceVectorSimulationConfig,
  LinkStateSimulationConfig,
} from './core/simulation.js';

export { LogicalClock } from './core/clock.js';
export type { Clock } from './core/clock.js';

export { Router } from './core/router.js';
export type { RouterConfig, RouterStats } from './core/router.js';

export { RoutingInvariantError, TopologyError } from './core/errors.js';

// Routing exports
export { DistanceVectorRouter } from './core/routing/distance-vector.js';
export type {
  DistanceVectorConfig,
  ChangeFlagPolicy,
} from './core/routing/distance-vector.js';

export {
  LinkStateRouter,
  DEFAULT_BROADCAST_INTERVAL,
} from './core/routing/link-state.js';
export type { LinkStateConfig } from './core/routing/link-state.js';

export { computeShortestPaths, nextHop } from './core/routing/shortest-path.js';
export type { ShortestPaths } from './core/routing/shortest-path.js';

export type {
  RouterId,
  LinkCosts,
  DistanceVector,
  ForwardingTable,
  LsaTable,
  RoutingProtocol,
  RouteEntry,
  RouterEvents,
  Topology,
  TopologyLink,
} from './core/routing/types.js';

// Graph exports
export {
  TopologyGraph,
  parseTopology,
  loadTopologyFile,
  topologySchema,
  generateTopology,
  checkConvergence,
  traceRoute,
} from './graph/index.js';
export type {
  RouterNodeData,
  LinkData,
  NeighborInfo,
  PathResult,
  TopologyGeneratorOptions,
  ConvergenceReport,
  RouteProblem,
  RouteProblemKind,
  TraceResult,
} from './graph/index.js';

// Utility exports
export { createSeededRandom } from './utils/random.js';
export type { SeededRandom } from './utils/random.js';

export { TypedEventEmitter } from './utils/event-emitter.js';
export type { EventEmitter, EventHandler, Unsubscribe } from './utils/event-emitter.js';

export { createLogger, resolveLogLevel } from './utils/logger.js';
export type { Logger, LoggerOptions, LogLevel } from './utils/logger.js';
