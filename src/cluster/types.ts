import { NodeSet } from '../types';

/**
 * Events delivered by a cluster client to its listeners
 */
export type ClusterEvent =
  | { type: 'connected'; nodes: NodeSet }
  | { type: 'nodes-changed'; nodes: NodeSet }
  | { type: 'disconnected' }
  | { type: 'shutdown' };

export interface ClusterListener {
  handleClusterEvent(event: ClusterEvent): void;
}

/**
 * Opaque handle returned by addListener, used only to remove the same listener
 */
export interface ClusterListenerKey {
  readonly id: number;
}

/**
 * View of cluster membership and connectivity consumed by the network client.
 * Implementations deliver events on their own schedule, never from inside
 * the caller's stack.
 */
export interface ClusterClient {
  /**
   * Connect to the membership backend
   */
  start(): Promise<void>;

  /**
   * Disconnect and release the membership backend
   */
  shutdown(): Promise<void>;

  /**
   * Current membership as last reported
   */
  nodes(): NodeSet;

  isConnected(): boolean;

  isShutdown(): boolean;

  addListener(listener: ClusterListener): ClusterListenerKey;

  removeListener(key: ClusterListenerKey): void;
}

export const ClusterEvents = {
  connected: (nodes: NodeSet): ClusterEvent => ({ type: 'connected', nodes }),
  nodesChanged: (nodes: NodeSet): ClusterEvent => ({ type: 'nodes-changed', nodes }),
  disconnected: (): ClusterEvent => ({ type: 'disconnected' }),
  shutdown: (): ClusterEvent => ({ type: 'shutdown' })
};
