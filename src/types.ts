/**
 * Type definitions shared across the cluster-network client
 */

/**
 * A cluster member. Identity is the numeric id; instances are never mutated,
 * a membership change replaces them.
 */
export interface Node {
  readonly id: number;
  readonly url: string;
  readonly available: boolean;
}

/**
 * Snapshot of cluster membership at a point in time, unique by node id
 */
export type NodeSet = ReadonlyArray<Node>;

/**
 * Result of a broadcast for a single node
 */
export interface NodeResponse<R> {
  node: Node;
  response: R;
}

export type LoadBalancerStrategy = 'round-robin' | 'random';

/**
 * Copy and freeze a node set
 */
export function createNodeSet(nodes: Iterable<Node>): NodeSet {
  return Object.freeze(Array.from(nodes, node => Object.freeze({ ...node })));
}
