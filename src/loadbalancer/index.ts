import { LoadBalancerFactory } from './types';
import { LoadBalancerStrategy } from '../types';
import { RoundRobinLoadBalancerFactory } from './RoundRobinLoadBalancerFactory';
import { RandomLoadBalancerFactory } from './RandomLoadBalancerFactory';

export * from './types';
export { eligibleNodes } from './validateNodeSet';
export { RoundRobinLoadBalancer, RoundRobinLoadBalancerFactory } from './RoundRobinLoadBalancerFactory';
export { RandomLoadBalancer, RandomLoadBalancerFactory, type RandomSource } from './RandomLoadBalancerFactory';

export function createLoadBalancerFactory(strategy: LoadBalancerStrategy): LoadBalancerFactory {
  switch (strategy) {
    case 'round-robin':
      return new RoundRobinLoadBalancerFactory();
    case 'random':
      return new RandomLoadBalancerFactory();
    default: {
      const unknownStrategy: never = strategy;
      throw new Error(`Unknown load balancer strategy: ${String(unknownStrategy)}`);
    }
  }
}
