import { LoadBalancer, LoadBalancerFactory } from './types';
import { Node, NodeSet } from '../types';
import { eligibleNodes } from './validateNodeSet';

export type RandomSource = () => number;

/**
 * Picks uniformly among the available nodes of one snapshot
 */
export class RandomLoadBalancer implements LoadBalancer {
  constructor(
    private readonly nodes: ReadonlyArray<Node>,
    private readonly random: RandomSource = Math.random
  ) {}

  nextNode(): Node | undefined {
    if (this.nodes.length === 0) return undefined;

    const index = Math.min(Math.floor(this.random() * this.nodes.length), this.nodes.length - 1);
    return this.nodes[index];
  }
}

export class RandomLoadBalancerFactory implements LoadBalancerFactory {
  readonly name = 'random';

  constructor(private readonly random: RandomSource = Math.random) {}

  newLoadBalancer(nodes: NodeSet): LoadBalancer {
    return new RandomLoadBalancer(eligibleNodes(nodes), this.random);
  }
}
