/**
 * In-memory view of a static topology, used as ground truth for routing
 * results. Wraps ngraph.graph with undirected, costed links.
 */

import createGraph, { type Graph } from 'ngraph.graph';
import { aStar, type PathFinder } from 'ngraph.path';
import type { RouterId, Topology } from '../core/routing/types.js';

export interface RouterNodeData {
  id: RouterId;
}

export interface LinkData {
  cost: number;
}

export interface NeighborInfo {
  id: RouterId;
  cost: number;
}

export interface PathResult {
  path: RouterId[]; // source first
  cost: number;
}

export class TopologyGraph {
  private graph: Graph<RouterNodeData, LinkData>;
  private pathFinder: PathFinder<RouterNodeData> | undefined;

  constructor() {
    this.graph = createGraph<RouterNodeData, LinkData>();
  }

  static fromTopology(topology: Topology): TopologyGraph {
    const graph = new TopologyGraph();
    graph.beginUpdate();
    try {
      for (const id of topology.routers) {
        graph.addRouter(id);
      }
      for (const link of topology.links) {
        graph.setLink(link.from, link.to, link.cost);
      }
    } finally {
      graph.endUpdate();
    }
    return graph;
  }

  addRouter(id: RouterId): void {
    this.graph.addNode(id, { id });
    this.pathFinder = undefined;
  }

  hasRouter(id: RouterId): boolean {
    return this.graph.hasNode(id) !== undefined;
  }

  /**
   * Set (or replace) the undirected link between two routers
   */
  setLink(from: RouterId, to: RouterId, cost: number): void {
    const existing = this.findLink(from, to);
    if (existing) {
      this.graph.removeLink(existing);
    }
    this.graph.addLink(from, to, { cost });
    this.pathFinder = undefined;
  }

  getLinkCost(from: RouterId, to: RouterId): number | undefined {
    return this.findLink(from, to)?.data.cost;
  }

  getNeighbors(id: RouterId): NeighborInfo[] {
    const neighbors: NeighborInfo[] = [];
    if (!this.hasRouter(id)) return neighbors;

    this.graph.forEachLinkedNode(id, (_other, link) => {
      const neighborId = String(link.fromId) === id ? String(link.toId) : String(link.fromId);
      neighbors.push({ id: neighborId, cost: link.data.cost });
    });

    return neighbors;
  }

  /**
   * Least-cost path between two routers, or undefined if disconnected
   */
  shortestPath(from: RouterId, to: RouterId): PathResult | undefined {
    if (!this.hasRouter(from) || !this.hasRouter(to)) {
      return undefined;
    }
    if (from === to) {
      return { path: [from], cost: 0 };
    }

    if (!this.pathFinder) {
      // No heuristic: A* degrades to Dijkstra
      this.pathFinder = aStar<RouterNodeData, LinkData>(this.graph, {
        oriented: false,
        distance: (_fromNode, _toNode, link) => link.data.cost,
      });
    }

    // ngraph.path lists the destination first
    const nodes = this.pathFinder.find(from, to);
    if (nodes.length === 0) {
      return undefined;
    }
    const path = nodes.map((node) => String(node.id)).reverse();

    let cost = 0;
    for (let i = 1; i < path.length; i++) {
      cost += this.getLinkCost(path[i - 1]!, path[i]!) ?? Infinity;
    }

    return { path, cost };
  }

  /**
   * Ground-truth cost from `from` to every reachable router
   */
  distancesFrom(from: RouterId): Map<RouterId, number> {
    const distances = new Map<RouterId, number>();
    this.forEachRouter((id) => {
      const result = this.shortestPath(from, id);
      if (result) {
        distances.set(id, result.cost);
      }
    });
    return distances;
  }

  isConnected(): boolean {
    const ids = this.getRouterIds();
    const first = ids[0];
    if (first === undefined) return true;

    const visited = new Set<RouterId>([first]);
    const queue: RouterId[] = [first];
    while (queue.length > 0) {
      const current = queue.shift()!;
      for (const neighbor of this.getNeighbors(current)) {
        if (!visited.has(neighbor.id)) {
          visited.add(neighbor.id);
          queue.push(neighbor.id);
        }
      }
    }

    return visited.size === ids.length;
  }

  getRouterIds(): RouterId[] {
    const ids: RouterId[] = [];
    this.forEachRouter((id) => ids.push(id));
    return ids;
  }

  getRouterCount(): number {
    return this.graph.getNodeCount();
  }

  getLinkCount(): number {
    return this.graph.getLinkCount();
  }

  forEachRouter(callback: (id: RouterId) => void): void {
    this.graph.forEachNode((node) => {
      callback(String(node.id));
    });
  }

  beginUpdate(): void {
    this.graph.beginUpdate();
  }

  endUpdate(): void {
    this.graph.endUpdate();
    this.pathFinder = undefined;
  }

  toTopology(): Topology {
    const topology: Topology = { routers: this.getRouterIds(), links: [] };
    this.graph.forEachLink((link) => {
      topology.links.push({
        from: String(link.fromId),
        to: String(link.toId),
        cost: link.data.cost,
      });
    });
    return topology;
  }

  /**
   * Links are stored once, in whichever direction they were added
   */
  private findLink(a: RouterId, b: RouterId) {
    return this.graph.getLink(a, b) ?? this.graph.getLink(b, a) ?? undefined;
  }
}
