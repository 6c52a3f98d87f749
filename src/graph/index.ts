/**
 * Graph module: ground truth and topology input for the routing core
 *
 * - TopologyGraph: ngraph-backed topology with least-cost path queries
 * - parseTopology / loadTopologyFile: validated topology input
 * - generateTopology: seeded connected random topologies
 * - checkConvergence: compare forwarding tables against ground truth
 */

export {
  TopologyGraph,
  type RouterNodeData,
  type LinkData,
  type NeighborInfo,
  type PathResult,
} from './topology-graph.js';

export { topologySchema, parseTopology, loadTopologyFile } from './topology-loader.js';

export { generateTopology, type TopologyGeneratorOptions } from './topology-generator.js';

export {
  checkConvergence,
  traceRoute,
  type ConvergenceReport,
  type RouteProblem,
  type RouteProblemKind,
  type TraceResult,
} from './convergence-check.js';
