// Main entry point for the cluster-network client

// Types
export * from './types';

// Cluster view
export * from './cluster/types';
export * from './cluster/InMemoryClusterClient';

// Load balancing
export * from './loadbalancer';

// Transport
export * from './transport/ClusterIoClient';
export * from './transport/adapters/InMemoryClusterIoClient';

// Network client and factory
export * from './network';

// Configuration
export * from './config/YamlNetworkConfiguration';

// Common modules
export * from './common/logger';
