import { LoggingConfig } from '../common/logger';
import { LoadBalancer } from '../loadbalancer/types';
import { ClusterIoClient } from '../transport/ClusterIoClient';
import { LoadBalancerStrategy, NodeSet } from '../types';
import { InvalidClusterError } from './errors';

export enum NetworkState {
  NOT_STARTED = 'not_started',
  STARTED = 'started',
  SHUT_DOWN = 'shut_down'
}

/**
 * The balancer currently used for balanced sends. Always replaced whole.
 */
export type LoadBalancerSnapshot =
  | { status: 'pending' }
  | { status: 'ready'; nodes: NodeSet; loadBalancer: LoadBalancer }
  | { status: 'failed'; nodes: NodeSet; error: InvalidClusterError };

/**
 * Configuration for the network client factory
 */
export interface NetworkClientConfig {
  /**
   * Policy used when no load balancer factory is passed explicitly
   */
  loadBalancer: LoadBalancerStrategy;

  logging: LoggingConfig;
}

/**
 * What a network client reads from its factory on every call
 */
export interface INetworkClientContext<M, R> {
  getState(): NetworkState;
  isClusterConnected(): boolean;
  isClusterShutdown(): boolean;
  currentNodes(): NodeSet;
  getLoadBalancerSnapshot(): LoadBalancerSnapshot;
  getClusterIoClient(): ClusterIoClient<M, R>;
}

export interface NetworkClientFactoryStatus {
  state: NetworkState;
  listenerRegistered: boolean;
  loadBalancer: LoadBalancerSnapshot['status'];
}

/**
 * Events emitted by the network client factory
 */
export interface NetworkClientFactoryEvents {
  'started': [{ nodeCount: number; timestamp: number }];
  'shutdown': [{ timestamp: number }];
  'load-balancer-updated': [{ nodeCount: number }];
  'load-balancer-failed': [{ error: InvalidClusterError }];
}
