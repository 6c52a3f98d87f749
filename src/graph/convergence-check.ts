/**
 * Compare forwarding tables produced by a simulation against ground-truth
 * shortest-path costs. Only costs are compared: equal-cost ties may pick
 * different next hops.
 */

import type { Router } from '../core/router.js';
import type { Simulation } from '../core/simulation.js';
import type { RouterId } from '../core/routing/types.js';
import type { TopologyGraph } from './topology-graph.js';

export type RouteProblemKind = 'missing' | 'loop' | 'broken' | 'suboptimal' | 'unexpected';

export interface RouteProblem {
  kind: RouteProblemKind;
  router: RouterId;
  destination: RouterId;
  expectedCost?: number;
  actualCost?: number;
  path: RouterId[];
}

export interface ConvergenceReport {
  converged: boolean;
  checked: number;
  problems: RouteProblem[];
}

export type TraceResult =
  | { kind: 'ok'; path: RouterId[]; cost: number }
  | { kind: 'missing' | 'loop' | 'broken'; path: RouterId[] };

/**
 * Follow forwarding tables hop by hop from `source` toward `destination`
 */
export function traceRoute<TRouter extends Router<TRouter>>(
  simulation: Simulation<TRouter>,
  graph: TopologyGraph,
  source: RouterId,
  destination: RouterId
): TraceResult {
  const path: RouterId[] = [source];
  const visited = new Set<RouterId>([source]);
  let current = source;
  let cost = 0;

  while (current !== destination) {
    const hop = simulation.getRouter(current)?.fwdTable.get(destination);
    if (hop === undefined) {
      return { kind: 'missing', path };
    }

    const linkCost = graph.getLinkCost(current, hop);
    if (linkCost === undefined) {
      path.push(hop);
      return { kind: 'broken', path };
    }

    path.push(hop);
    if (visited.has(hop)) {
      return { kind: 'loop', path };
    }
    visited.add(hop);
    cost += linkCost;
    current = hop;
  }

  return { kind: 'ok', path, cost };
}

export function checkConvergence<TRouter extends Router<TRouter>>(
  simulation: Simulation<TRouter>,
  graph: TopologyGraph
): ConvergenceReport {
  const problems: RouteProblem[] = [];
  let checked = 0;

  for (const [source, router] of simulation.routers) {
    const expected = graph.distancesFrom(source);

    for (const destination of simulation.routers.keys()) {
      if (destination === source) continue;
      checked++;

      const expectedCost = expected.get(destination);
      if (expectedCost === undefined) {
        if (router.fwdTable.has(destination)) {
          problems.push({ kind: 'unexpected', router: source, destination, path: [source] });
        }
        continue;
      }

      const trace = traceRoute(simulation, graph, source, destination);
      if (trace.kind !== 'ok') {
        problems.push({ kind: trace.kind, router: source, destination, expectedCost, path: trace.path });
      } else if (trace.cost !== expectedCost) {
        problems.push({
          kind: 'suboptimal',
          router: source,
          destination,
          expectedCost,
          actualCost: trace.cost,
          path: trace.path,
        });
      }
    }
  }

  return { converged: problems.length === 0, checked, problems };
}
