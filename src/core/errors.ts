/**
 * Error types raised by the routing core and the topology layer
 */

/**
 * An internal invariant of a routing engine was breached. Not recoverable:
 * the computation that raised it must not produce a result.
 */
export class RoutingInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RoutingInvariantError';
  }
}

/**
 * Topology input was rejected; `issues` lists every problem found.
 */
export class TopologyError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'TopologyError';
    this.issues = issues;
  }
}
