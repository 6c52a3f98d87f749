import { describe, it, expect } from 'vitest';
import { createDistanceVectorSimulation } from '@/core/simulation.js';
import { checkConvergence, traceRoute } from '@/graph/convergence-check.js';
import { TopologyGraph } from '@/graph/topology-graph.js';
import { line, triangle, triangleWithIsolated } from '../helpers/topologies.js';
import type { Topology } from '@/core/routing/types.js';

describe('checkConvergence', () => {
  const converged = (topology: Topology) => {
    const sim = createDistanceVectorSimulation({ logLevel: 'silent' });
    sim.loadTopology(topology);
    sim.runUntilConverged();
    return { sim, graph: TopologyGraph.fromTopology(topology) };
  };

  it('should accept converged tables', () => {
    const { sim, graph } = converged(triangle());

    expect(checkConvergence(sim, graph)).toEqual({ converged: true, checked: 6, problems: [] });
  });

  it('should flag a route that costs more than the shortest path', () => {
    const { sim, graph } = converged(triangle());
    sim.getRouter('S')!.fwdTable.set('B', 'B');

    expect(checkConvergence(sim, graph).problems).toEqual([
      {
        kind: 'suboptimal',
        router: 'S',
        destination: 'B',
        expectedCost: 2,
        actualCost: 5,
        path: ['S', 'B'],
      },
    ]);
  });

  it('should flag forwarding loops', () => {
    const { sim, graph } = converged(triangle());
    sim.getRouter('A')!.fwdTable.set('B', 'S');

    const trace = traceRoute(sim, graph, 'S', 'B');

    expect(trace).toEqual({ kind: 'loop', path: ['S', 'A', 'S'] });
  });

  it('should flag missing entries', () => {
    const { sim, graph } = converged(line());
    sim.getRouter('a')!.fwdTable.delete('d');

    const report = checkConvergence(sim, graph);

    expect(report.converged).toBe(false);
    expect(report.problems).toEqual([
      { kind: 'missing', router: 'a', destination: 'd', expectedCost: 3, path: ['a'] },
    ]);
  });

  it('should flag next hops that are not neighbors', () => {
    const { sim, graph } = converged(line());
    sim.getRouter('a')!.fwdTable.set('d', 'c');

    expect(traceRoute(sim, graph, 'a', 'd')).toEqual({ kind: 'broken', path: ['a', 'c'] });
  });

  it('should flag entries for unreachable destinations', () => {
    const { sim, graph } = converged(triangleWithIsolated());
    sim.getRouter('S')!.fwdTable.set('Z', 'A');

    expect(checkConvergence(sim, graph).problems).toEqual([
      { kind: 'unexpected', router: 'S', destination: 'Z', path: ['S'] },
    ]);
  });
});
