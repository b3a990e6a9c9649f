import { Node, NodeSet } from '../types';

export interface LoadBalancer {
  /**
   * Pick the next node from the snapshot this balancer was built with.
   * Returns undefined when no node is eligible.
   */
  nextNode(): Node | undefined;
}

export interface LoadBalancerFactory {
  /** Algorithm name */
  readonly name: string;

  /**
   * Build a balancer for the given membership.
   * Throws InvalidClusterError when the set cannot be balanced over.
   */
  newLoadBalancer(nodes: NodeSet): LoadBalancer;
}
