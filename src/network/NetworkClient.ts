import { Node, NodeResponse } from '../types';
import {
  ClusterDisconnectedError,
  ClusterShutdownError,
  InvalidClusterError,
  InvalidNodeError,
  NetworkNotStartedError,
  NoNodesAvailableError
} from './errors';
import { INetworkClientContext, NetworkState } from './types';

/**
 * Handle for sending messages into the cluster. Holds nothing but its factory:
 * lifecycle, connectivity, membership and the load balancer are read on every call.
 *
 * Precondition failures are thrown synchronously; transport failures arrive
 * through the returned promise unchanged.
 */
export class NetworkClient<M = unknown, R = unknown> {
  constructor(private readonly context: INetworkClientContext<M, R>) {}

  /**
   * Send the message to every node currently in the cluster, once each
   */
  broadcastMessage(message: M): Promise<NodeResponse<R>[]> {
    this.verifyClusterReady();

    const clusterIoClient = this.context.getClusterIoClient();
    return Promise.all(
      this.context.currentNodes().map(node =>
        clusterIoClient.sendMessage(node, message).then(response => ({ node, response }))
      )
    );
  }

  /**
   * Send the message to a specific cluster member
   */
  sendMessageToNode(message: M, node: Node): Promise<R> {
    this.verifyClusterReady();

    const member = this.context.currentNodes().find(candidate => candidate.id === node.id);
    if (!member) {
      throw new InvalidNodeError(node.id);
    }

    return this.context.getClusterIoClient().sendMessage(member, message);
  }

  /**
   * Send the message to the node chosen by the current load balancer
   */
  sendMessage(message: M): Promise<R> {
    this.verifyClusterReady();

    const snapshot = this.context.getLoadBalancerSnapshot();
    if (snapshot.status === 'pending') {
      throw new InvalidClusterError('no load balancer has been built');
    }
    if (snapshot.status === 'failed') {
      throw new InvalidClusterError(snapshot.error.reason, { cause: snapshot.error });
    }

    const node = snapshot.loadBalancer.nextNode();
    if (!node) {
      throw new NoNodesAvailableError();
    }

    return this.context.getClusterIoClient().sendMessage(node, message);
  }

  private verifyClusterReady(): void {
    const state = this.context.getState();

    if (state === NetworkState.SHUT_DOWN || this.context.isClusterShutdown()) {
      throw new ClusterShutdownError();
    }

    if (state === NetworkState.NOT_STARTED) {
      throw new NetworkNotStartedError();
    }

    if (!this.context.isClusterConnected()) {
      throw new ClusterDisconnectedError();
    }
  }
}
