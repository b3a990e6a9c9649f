import { EventEmitter } from 'eventemitter3';
import { ClusterClient, ClusterEvent, ClusterEvents, ClusterListener, ClusterListenerKey } from './types';
import { Node, NodeSet, createNodeSet } from '../types';
import { createLogger, FrameworkLogger, LoggingConfig } from '../common/logger';

interface ClusterNotifications {
  'cluster-event': [ClusterEvent];
}

export interface InMemoryClusterClientOptions {
  /** Report connected as soon as start() resolves (default: true) */
  connectOnStart?: boolean;
  logging?: LoggingConfig;
}

/**
 * In-memory cluster client for testing and development.
 * Membership is driven by the owning process; listeners are notified on the next tick.
 *
 * Note: this client holds membership locally and cannot observe other processes.
 */
export class InMemoryClusterClient implements ClusterClient {
  private currentNodes: NodeSet;
  private started = false;
  private connected = false;
  private shutDown = false;
  private nextListenerId = 1;
  private readonly notifier = new EventEmitter<ClusterNotifications>();
  private readonly listeners = new Map<number, (event: ClusterEvent) => void>();
  private readonly connectOnStart: boolean;
  private readonly logger: FrameworkLogger;

  constructor(nodes: Iterable<Node> = [], options: InMemoryClusterClientOptions = {}) {
    this.currentNodes = createNodeSet(nodes);
    this.connectOnStart = options.connectOnStart ?? true;
    this.logger = createLogger(options.logging);
  }

  async start(): Promise<void> {
    this.ensureNotShutdown();
    if (this.started) {
      return;
    }

    this.started = true;
    this.logger.cluster(`Cluster client started with ${this.currentNodes.length} nodes`);

    if (this.connectOnStart) {
      this.connect();
    }
  }

  async shutdown(): Promise<void> {
    if (this.shutDown) {
      return;
    }

    this.shutDown = true;
    this.connected = false;
    this.logger.cluster('Cluster client shut down');
    this.notify(ClusterEvents.shutdown());
  }

  nodes(): NodeSet {
    return this.currentNodes;
  }

  isConnected(): boolean {
    return this.connected;
  }

  isShutdown(): boolean {
    return this.shutDown;
  }

  addListener(listener: ClusterListener): ClusterListenerKey {
    this.ensureNotShutdown();

    const key: ClusterListenerKey = { id: this.nextListenerId++ };
    const deliver = (event: ClusterEvent): void => {
      try {
        listener.handleClusterEvent(event);
      } catch (error) {
        this.logger.error(`Cluster listener ${key.id} failed handling ${event.type}`, error);
      }
    };

    this.listeners.set(key.id, deliver);
    this.notifier.on('cluster-event', deliver);
    return key;
  }

  removeListener(key: ClusterListenerKey): void {
    const deliver = this.listeners.get(key.id);
    if (!deliver) {
      return;
    }

    this.listeners.delete(key.id);
    this.notifier.off('cluster-event', deliver);
  }

  /**
   * Report the cluster as connected and announce the current membership
   */
  connect(): void {
    this.ensureNotShutdown();
    this.connected = true;
    this.notify(ClusterEvents.connected(this.currentNodes));
  }

  disconnect(): void {
    this.ensureNotShutdown();
    this.connected = false;
    this.notify(ClusterEvents.disconnected());
  }

  /**
   * Replace the whole membership
   */
  setNodes(nodes: Iterable<Node>): void {
    this.ensureNotShutdown();
    this.currentNodes = createNodeSet(nodes);
    this.logger.cluster(`Membership changed: ${this.currentNodes.map(node => node.id).join(', ')}`);

    if (this.connected) {
      this.notify(ClusterEvents.nodesChanged(this.currentNodes));
    }
  }

  markNodeAvailable(nodeId: number): void {
    this.setAvailability(nodeId, true);
  }

  markNodeUnavailable(nodeId: number): void {
    this.setAvailability(nodeId, false);
  }

  getListenerCount(): number {
    return this.listeners.size;
  }

  private setAvailability(nodeId: number, available: boolean): void {
    if (!this.currentNodes.some(node => node.id === nodeId)) {
      throw new Error(`Node ${nodeId} not found in cluster`);
    }

    this.setNodes(this.currentNodes.map(node => (node.id === nodeId ? { ...node, available } : node)));
  }

  private notify(event: ClusterEvent): void {
    process.nextTick(() => {
      this.notifier.emit('cluster-event', event);
      if (event.type === 'shutdown') {
        this.notifier.removeAllListeners();
        this.listeners.clear();
      }
    });
  }

  private ensureNotShutdown(): void {
    if (this.shutDown) {
      throw new Error('Cluster client has been shut down');
    }
  }
}
