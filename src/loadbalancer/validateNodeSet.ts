import { Node, NodeSet } from '../types';
import { InvalidClusterError } from '../network/errors';

/**
 * Reject membership that repeats a node id and return the nodes eligible for traffic
 */
export function eligibleNodes(nodes: NodeSet): Node[] {
  const seen = new Set<number>();

  for (const node of nodes) {
    if (seen.has(node.id)) {
      throw new InvalidClusterError(`duplicate node id ${node.id}`);
    }
    seen.add(node.id);
  }

  return nodes.filter(node => node.available);
}
