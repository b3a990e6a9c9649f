import { Node } from '../types';

/**
 * Low-level sender used by network clients. Delivery, retries and timeouts
 * are the implementation's concern; failures surface through the returned promise.
 */
export interface ClusterIoClient<M = unknown, R = unknown> {
  sendMessage(node: Node, message: M): Promise<R>;

  /**
   * Release connections held by this client
   */
  shutdown(): Promise<void>;
}
