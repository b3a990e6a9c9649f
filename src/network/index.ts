export * from './errors';
export * from './types';
export { NetworkClient } from './NetworkClient';
export { NetworkClientFactory, type NetworkClientFactoryOptions } from './NetworkClientFactory';
