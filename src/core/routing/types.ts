/**
 * Shared types for the routing engines
 */

export type RouterId = string;

/**
 * Neighbor id -> nonnegative link cost
 */
export type LinkCosts = ReadonlyMap<RouterId, number>;

/**
 * Destination -> best known cost. A missing key means unreachable so far.
 */
export type DistanceVector = Map<RouterId, number>;

/**
 * Destination -> next hop neighbor
 */
export type ForwardingTable = Map<RouterId, RouterId>;

/**
 * Originator -> that router's own link costs
 */
export type LsaTable = Map<RouterId, LinkCosts>;

export type RoutingProtocol = 'distance-vector' | 'link-state';

export interface RouteEntry {
  destination: RouterId;
  nextHop: RouterId;
  cost: number;
  updatedAt: number; // tick
}

export type RouterEvents = {
  'advertisement:sent': { from: RouterId; to: RouterId; originator: RouterId; tick: number };
  'route:updated': RouteEntry & { router: RouterId };
  'routes:computed': { router: RouterId; tick: number; destinations: number };
};

export interface TopologyLink {
  from: RouterId;
  to: RouterId;
  cost: number;
}

/**
 * Static network description: routers and undirected, costed links
 */
export interface Topology {
  routers: RouterId[];
  links: TopologyLink[];
}
