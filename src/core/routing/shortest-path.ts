/**
 * Single-source shortest paths over a link-state table, and next-hop
 * derivation from the resulting predecessor map
 */

import { RoutingInvariantError } from '../errors.js';
import type { LsaTable, RouterId } from './types.js';

export interface ShortestPaths {
  source: RouterId;
  /** Finite distances only; unreachable routers are absent */
  distances: Map<RouterId, number>;
  /** Penultimate hop on the chosen shortest path; absent for the source */
  previous: Map<RouterId, RouterId>;
}

/**
 * Dijkstra's algorithm. Nodes are the originators present in `lsaTable`;
 * a neighbor that has no LSA of its own is not a node.
 *
 * Equal tentative distances are resolved by table order; callers must not
 * rely on which of several equal-cost predecessors wins.
 */
export function computeShortestPaths(source: RouterId, lsaTable: LsaTable): ShortestPaths {
  const tentative = new Map<RouterId, number>();
  for (const router of lsaTable.keys()) {
    tentative.set(router, Infinity);
  }
  tentative.set(source, 0);

  const unvisited = new Set(tentative.keys());
  const distances = new Map<RouterId, number>();
  const previous = new Map<RouterId, RouterId>();

  while (unvisited.size > 0) {
    let current: RouterId | undefined;
    let best = Infinity;
    for (const router of unvisited) {
      const distance = tentative.get(router) ?? Infinity;
      if (distance < best) {
        best = distance;
        current = router;
      }
    }

    // Everything left is disconnected from the source
    if (current === undefined) break;

    unvisited.delete(current);
    distances.set(current, best);

    const links = lsaTable.get(current);
    if (!links) continue;

    for (const [neighbor, cost] of links) {
      if (!unvisited.has(neighbor)) continue;

      const candidate = best + cost;
      if (candidate < (tentative.get(neighbor) ?? Infinity)) {
        tentative.set(neighbor, candidate);
        previous.set(neighbor, current);
      }
    }
  }

  return { source, distances, previous };
}

/**
 * First hop from `source` toward `destination`, found by walking the
 * predecessor chain back until it reaches the source.
 *
 * Throws RoutingInvariantError for the source itself, for a destination
 * without a predecessor, and for a chain that cycles.
 */
export function nextHop(
  source: RouterId,
  destination: RouterId,
  previous: ReadonlyMap<RouterId, RouterId>
): RouterId {
  if (destination === source) {
    throw new RoutingInvariantError(`No next hop from ${source} to itself`);
  }

  const seen = new Set<RouterId>();
  let hop = destination;

  for (;;) {
    const before = previous.get(hop);
    if (before === undefined) {
      throw new RoutingInvariantError(
        `No predecessor recorded for ${hop} on the path ${source} -> ${destination}`
      );
    }
    if (before === source) {
      return hop;
    }
    if (seen.has(hop)) {
      throw new RoutingInvariantError(
        `Predecessor chain from ${destination} cycles at ${hop}`
      );
    }
    seen.add(hop);
    hop = before;
  }
}
