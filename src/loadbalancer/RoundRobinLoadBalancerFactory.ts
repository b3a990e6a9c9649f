import { LoadBalancer, LoadBalancerFactory } from './types';
import { Node, NodeSet } from '../types';
import { eligibleNodes } from './validateNodeSet';

/**
 * Rotates through the available nodes of one snapshot in order.
 *
 *   call 1 -> node A
 *   call 2 -> node B
 *   call 3 -> node C
 *   call 4 -> node A (wraps around)
 */
export class RoundRobinLoadBalancer implements LoadBalancer {
  private index = 0;

  constructor(private readonly nodes: ReadonlyArray<Node>) {}

  nextNode(): Node | undefined {
    if (this.nodes.length === 0) return undefined;

    const node = this.nodes[this.index % this.nodes.length];
    this.index = (this.index + 1) % this.nodes.length;

    return node;
  }
}

export class RoundRobinLoadBalancerFactory implements LoadBalancerFactory {
  readonly name = 'round-robin';

  newLoadBalancer(nodes: NodeSet): LoadBalancer {
    return new RoundRobinLoadBalancer(eligibleNodes(nodes));
  }
}
