import { EventEmitter } from 'events';
import { ClusterClient, ClusterEvent, ClusterListener, ClusterListenerKey } from '../cluster/types';
import { createLogger, FrameworkLogger } from '../common/logger';
import { createLoadBalancerFactory } from '../loadbalancer';
import { LoadBalancerFactory } from '../loadbalancer/types';
import { ClusterIoClient } from '../transport/ClusterIoClient';
import { NodeSet } from '../types';
import { ClusterShutdownError, InvalidClusterError, NetworkNotStartedError } from './errors';
import { NetworkClient } from './NetworkClient';
import {
  INetworkClientContext,
  LoadBalancerSnapshot,
  NetworkClientConfig,
  NetworkClientFactoryEvents,
  NetworkClientFactoryStatus,
  NetworkState
} from './types';

export interface NetworkClientFactoryOptions<M, R> {
  clusterClient: ClusterClient;
  clusterIoClient: ClusterIoClient<M, R>;
  /** Takes precedence over config.loadBalancer */
  loadBalancerFactory?: LoadBalancerFactory;
  config?: Partial<NetworkClientConfig>;
}

/**
 * NetworkClientFactory owns the subscription to the cluster and the load balancer
 * derived from its membership, and mints NetworkClients once started.
 *
 * Responsibilities:
 * - Lifecycle gate: NOT_STARTED -> STARTED -> SHUT_DOWN, no way back
 * - Rebuilding the load balancer on every Connected / NodesChanged event
 * - Releasing the cluster client and the cluster IO client on shutdown
 */
export class NetworkClientFactory<M = unknown, R = unknown>
  extends EventEmitter
  implements INetworkClientContext<M, R>
{
  private readonly clusterClient: ClusterClient;
  private readonly clusterIoClient: ClusterIoClient<M, R>;
  private readonly loadBalancerFactory: LoadBalancerFactory;
  private readonly config: NetworkClientConfig;
  private readonly logger: FrameworkLogger;

  private state: NetworkState = NetworkState.NOT_STARTED;
  private startPromise?: Promise<void>;
  private shutdownPromise?: Promise<void>;
  private listenerKey?: ClusterListenerKey;
  private loadBalancerSnapshot: LoadBalancerSnapshot = { status: 'pending' };

  private readonly listener: ClusterListener = {
    handleClusterEvent: (event: ClusterEvent) => this.handleClusterEvent(event)
  };

  constructor(options: NetworkClientFactoryOptions<M, R>) {
    super();

    this.config = {
      loadBalancer: options.config?.loadBalancer ?? 'round-robin',
      logging: { ...options.config?.logging }
    };

    this.clusterClient = options.clusterClient;
    this.clusterIoClient = options.clusterIoClient;
    this.loadBalancerFactory = options.loadBalancerFactory ?? createLoadBalancerFactory(this.config.loadBalancer);
    this.logger = createLogger(this.config.logging);
  }

  /**
   * Start the cluster client, subscribe to its events and build the first load balancer.
   * Concurrent calls share one start sequence.
   */
  start(): Promise<void> {
    if (this.state === NetworkState.SHUT_DOWN) {
      return Promise.reject(new ClusterShutdownError());
    }

    if (this.state === NetworkState.STARTED) {
      return Promise.resolve();
    }

    if (!this.startPromise) {
      this.startPromise = this.doStart().finally(() => {
        this.startPromise = undefined;
      });
    }

    return this.startPromise;
  }

  newClient(): NetworkClient<M, R> {
    if (this.state === NetworkState.SHUT_DOWN) {
      throw new ClusterShutdownError();
    }

    if (this.state === NetworkState.NOT_STARTED) {
      throw new NetworkNotStartedError();
    }

    return new NetworkClient(this);
  }

  /**
   * Unsubscribe and release both the cluster client and the cluster IO client.
   * Both releases are attempted; the first failure is rethrown.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.doShutdown();
    }

    return this.shutdownPromise;
  }

  getState(): NetworkState {
    return this.state;
  }

  isClusterConnected(): boolean {
    return this.clusterClient.isConnected();
  }

  isClusterShutdown(): boolean {
    return this.clusterClient.isShutdown();
  }

  currentNodes(): NodeSet {
    return this.clusterClient.nodes();
  }

  getLoadBalancerSnapshot(): LoadBalancerSnapshot {
    return this.loadBalancerSnapshot;
  }

  getClusterIoClient(): ClusterIoClient<M, R> {
    return this.clusterIoClient;
  }

  getStatus(): NetworkClientFactoryStatus {
    return {
      state: this.state,
      listenerRegistered: this.listenerKey !== undefined,
      loadBalancer: this.loadBalancerSnapshot.status
    };
  }

  getConfig(): NetworkClientConfig {
    return { ...this.config, logging: { ...this.config.logging } };
  }

  private async doStart(): Promise<void> {
    this.logger.network(`Starting network client factory (${this.loadBalancerFactory.name} load balancer)`);

    await this.clusterClient.start();

    // shutdown() may have run while the cluster client was starting
    if (this.state === NetworkState.SHUT_DOWN) {
      throw new ClusterShutdownError();
    }

    this.listenerKey = this.clusterClient.addListener(this.listener);

    const nodes = this.clusterClient.nodes();
    this.updateLoadBalancer(nodes);

    this.state = NetworkState.STARTED;
    this.logger.network(`Network client factory started with ${nodes.length} nodes`);
    this.notify('started', { nodeCount: nodes.length, timestamp: Date.now() });
  }

  private async doShutdown(): Promise<void> {
    const pendingStart = this.startPromise;
    this.state = NetworkState.SHUT_DOWN;
    this.logger.network('Shutting down network client factory');

    if (pendingStart) {
      // The pending start rejects on its own once it sees SHUT_DOWN
      await Promise.allSettled([pendingStart]);
    }

    const failures: unknown[] = [];
    const release = async (resource: string, action: () => void | Promise<void>): Promise<void> => {
      try {
        await action();
      } catch (error) {
        if (failures.length > 0) {
          this.logger.error(`Failed to release ${resource} during shutdown`, error);
        }
        failures.push(error);
      }
    };

    const listenerKey = this.listenerKey;
    if (listenerKey) {
      this.listenerKey = undefined;
      await release('cluster listener', () => this.clusterClient.removeListener(listenerKey));
    }

    await release('cluster client', () => this.clusterClient.shutdown());
    await release('cluster IO client', () => this.clusterIoClient.shutdown());

    this.notify('shutdown', { timestamp: Date.now() });

    if (failures.length > 0) {
      throw failures[0];
    }

    this.logger.network('Network client factory shut down');
  }

  private handleClusterEvent(event: ClusterEvent): void {
    if (this.state === NetworkState.SHUT_DOWN) {
      return;
    }

    switch (event.type) {
      case 'connected':
      case 'nodes-changed':
        this.logger.network(`Received ${event.type} event with ${event.nodes.length} nodes`);
        this.updateLoadBalancer(event.nodes);
        break;

      default:
        this.logger.debug(`Ignoring ${event.type} cluster event`);
    }
  }

  /**
   * Build a balancer for the given membership and swap it in as one value.
   * A rejected membership replaces the previous balancer with the failure.
   */
  private updateLoadBalancer(nodes: NodeSet): void {
    let snapshot: LoadBalancerSnapshot;

    try {
      snapshot = { status: 'ready', nodes, loadBalancer: this.loadBalancerFactory.newLoadBalancer(nodes) };
    } catch (error) {
      const invalid = error instanceof InvalidClusterError
        ? error
        : new InvalidClusterError(error instanceof Error ? error.message : String(error), { cause: error });
      snapshot = { status: 'failed', nodes, error: invalid };
    }

    this.loadBalancerSnapshot = snapshot;

    if (snapshot.status === 'failed') {
      this.logger.warn(`Load balancer rejected membership of ${nodes.length} nodes: ${snapshot.error.reason}`);
      this.notify('load-balancer-failed', { error: snapshot.error });
    } else {
      this.notify('load-balancer-updated', { nodeCount: nodes.length });
    }
  }

  /**
   * Listener failures are logged and never change the outcome of the operation that emitted
   */
  private notify<K extends keyof NetworkClientFactoryEvents>(event: K, ...args: NetworkClientFactoryEvents[K]): void {
    try {
      this.emit(event, ...args);
    } catch (error) {
      this.logger.error(`A ${event} listener failed`, error);
    }
  }
}
