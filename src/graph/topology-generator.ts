/**
 * Seeded generation of connected random topologies
 */

import type { SeededRandom } from '../utils/random.js';
import type { RouterId, Topology, TopologyLink } from '../core/routing/types.js';

export interface TopologyGeneratorOptions {
  routerCount: number;
  extraLinks: number; // Links added on top of the spanning tree
  minCost: number;
  maxCost: number;
  idPrefix: string;
}

const DEFAULT_OPTIONS: TopologyGeneratorOptions = {
  routerCount: 8,
  extraLinks: 6,
  minCost: 1,
  maxCost: 10,
  idPrefix: 'r',
};

/**
 * Build a random spanning tree over the routers, then add extra links
 * between unlinked pairs. Costs are integers in [minCost, maxCost].
 * The same random state always yields the same topology.
 */
export function generateTopology(
  random: SeededRandom,
  options: Partial<TopologyGeneratorOptions> = {}
): Topology {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  if (!Number.isInteger(opts.routerCount) || opts.routerCount < 1) {
    throw new Error('routerCount must be a positive integer');
  }
  if (opts.minCost < 0 || opts.minCost > opts.maxCost) {
    throw new Error('Costs must satisfy 0 <= minCost <= maxCost');
  }

  const routers: RouterId[] = Array.from(
    { length: opts.routerCount },
    (_, i) => `${opts.idPrefix}${i}`
  );
  const links: TopologyLink[] = [];
  const linked = new Set<string>();

  const key = (a: RouterId, b: RouterId) => (a < b ? `${a}|${b}` : `${b}|${a}`);
  const link = (from: RouterId, to: RouterId) => {
    linked.add(key(from, to));
    links.push({ from, to, cost: random.nextInt(opts.minCost, opts.maxCost) });
  };

  // Attach each router to one already placed, in random order
  const order = random.shuffle(routers);
  for (let i = 1; i < order.length; i++) {
    const parent = order[random.nextInt(0, i - 1)]!;
    link(order[i]!, parent);
  }

  const maxLinks = (opts.routerCount * (opts.routerCount - 1)) / 2;
  const target = Math.min(maxLinks, links.length + Math.max(0, opts.extraLinks));
  while (links.length < target) {
    const a = random.nextChoice(routers);
    const b = random.nextChoice(routers);
    if (a === b || linked.has(key(a, b))) continue;
    link(a, b);
  }

  return { routers, links };
}
