import { NetworkClientFactory } from '../../../src/network/NetworkClientFactory';
import { NetworkClient } from '../../../src/network/NetworkClient';
import { INetworkClientContext, NetworkState } from '../../../src/network/types';
import {
  ClusterDisconnectedError,
  ClusterShutdownError,
  InvalidClusterError,
  InvalidNodeError,
  NetworkNotStartedError,
  NoNodesAvailableError,
  isNetworkError
} from '../../../src/network/errors';
import { ClusterEvents } from '../../../src/cluster/types';
import { LoadBalancer } from '../../../src/loadbalancer/types';
import { Node, NodeSet, createNodeSet } from '../../../src/types';
import { StubClusterClient } from '../../helpers/stubClusterClient';
import { MockClusterIoClient } from '../../helpers/mockClusterIoClient';
import { createTestNode, nodeFixtures } from '../../fixtures/nodes';

describe('NetworkClient', () => {
  let cluster: StubClusterClient;
  let clusterIoClient: MockClusterIoClient;
  let nextNode: jest.Mock<Node | undefined, []>;
  let newLoadBalancer: jest.Mock<LoadBalancer, [NodeSet]>;
  let factory: NetworkClientFactory<string, string>;

  beforeEach(async () => {
    cluster = new StubClusterClient(nodeFixtures);
    clusterIoClient = new MockClusterIoClient();
    nextNode = jest.fn<Node | undefined, []>().mockReturnValue(nodeFixtures[0]);
    newLoadBalancer = jest.fn<LoadBalancer, [NodeSet]>().mockReturnValue({ nextNode });

    factory = new NetworkClientFactory<string, string>({
      clusterClient: cluster,
      clusterIoClient,
      loadBalancerFactory: { name: 'stub', newLoadBalancer }
    });
  });

  describe('preconditions', () => {
    it('should throw ClusterDisconnectedError when the cluster is disconnected', async () => {
      cluster.connected = false;
      await factory.start();
      const client = factory.newClient();

      expect(() => client.broadcastMessage('hello')).toThrow(ClusterDisconnectedError);
      expect(() => client.sendMessageToNode('hello', createTestNode(1))).toThrow(ClusterDisconnectedError);
      expect(() => client.sendMessage('hello')).toThrow(ClusterDisconnectedError);
      expect(clusterIoClient.sentMessages).toHaveLength(0);
    });

    it('should throw ClusterShutdownError once the factory is shut down', async () => {
      await factory.start();
      const client = factory.newClient();
      await factory.shutdown();

      expect(() => client.broadcastMessage('hello')).toThrow(ClusterShutdownError);
      expect(() => client.sendMessageToNode('hello', createTestNode(1))).toThrow(ClusterShutdownError);
      expect(() => client.sendMessage('hello')).toThrow(ClusterShutdownError);
    });

    it('should throw ClusterShutdownError when the cluster reports shut down', async () => {
      await factory.start();
      const client = factory.newClient();
      cluster.shutDown = true;

      expect(() => client.sendMessage('hello')).toThrow(ClusterShutdownError);
    });

    it('should throw NetworkNotStartedError for a context that never started', () => {
      const context: INetworkClientContext<string, string> = {
        getState: () => NetworkState.NOT_STARTED,
        isClusterConnected: () => true,
        isClusterShutdown: () => false,
        currentNodes: () => nodeFixtures,
        getLoadBalancerSnapshot: () => ({ status: 'pending' }),
        getClusterIoClient: () => clusterIoClient
      };
      const client = new NetworkClient(context);

      expect(() => client.sendMessage('hello')).toThrow(NetworkNotStartedError);
    });

    it('should check connectivity before the target node', async () => {
      await factory.start();
      const client = factory.newClient();
      cluster.connected = false;

      expect(() => client.sendMessageToNode('hello', createTestNode(4))).toThrow(ClusterDisconnectedError);
    });

    it('should check connectivity before the load balancer state', async () => {
      newLoadBalancer.mockImplementationOnce(() => {
        throw new InvalidClusterError('rejected');
      });
      await factory.start();
      const client = factory.newClient();
      cluster.connected = false;

      expect(() => client.sendMessage('hello')).toThrow(ClusterDisconnectedError);
    });

    it('should read connectivity on every call', async () => {
      await factory.start();
      const client = factory.newClient();

      cluster.connected = false;
      expect(() => client.sendMessage('hello')).toThrow(ClusterDisconnectedError);

      cluster.connected = true;
      await expect(client.sendMessage('hello')).resolves.toBe('hello@1');
    });
  });

  describe('broadcastMessage', () => {
    it('should send the message to every node once', async () => {
      await factory.start();

      const responses = await factory.newClient().broadcastMessage('hello');

      expect(clusterIoClient.sentNodeIds()).toEqual([1, 2, 3]);
      expect(responses).toEqual([
        { node: nodeFixtures[0], response: 'hello@1' },
        { node: nodeFixtures[1], response: 'hello@2' },
        { node: nodeFixtures[2], response: 'hello@3' }
      ]);
    });

    it('should use the membership reported at call time', async () => {
      await factory.start();
      const client = factory.newClient();
      cluster.currentNodes = createNodeSet([createTestNode(5), createTestNode(6)]);

      await client.broadcastMessage('hello');

      expect(clusterIoClient.sentNodeIds()).toEqual([5, 6]);
    });

    it('should surface a failed send through the returned promise', async () => {
      clusterIoClient.failFor(2, new Error('connection reset by node 2'));
      await factory.start();

      await expect(factory.newClient().broadcastMessage('hello')).rejects.toThrow('connection reset by node 2');
      expect(clusterIoClient.sentNodeIds()).toEqual([1, 2, 3]);
    });
  });

  describe('sendMessageToNode', () => {
    it('should throw InvalidNodeError for a node outside the cluster', async () => {
      await factory.start();
      const client = factory.newClient();

      expect(() => client.sendMessageToNode('hello', createTestNode(4))).toThrow(InvalidNodeError);
      expect(() => client.sendMessageToNode('hello', createTestNode(4))).toThrow('Node 4 is not a member of the cluster');
      expect(clusterIoClient.sentMessages).toHaveLength(0);
    });

    it('should send to the matching cluster member', async () => {
      await factory.start();

      const response = await factory.newClient().sendMessageToNode('hello', createTestNode(1, false));

      expect(response).toBe('hello@1');
      expect(clusterIoClient.sentMessages).toHaveLength(1);
      expect(clusterIoClient.sentMessages[0].node).toBe(nodeFixtures[0]);
    });
  });

  describe('sendMessage', () => {
    it('should send to the node picked by the load balancer', async () => {
      await factory.start();

      const response = await factory.newClient().sendMessage('hello');

      expect(nextNode).toHaveBeenCalledTimes(1);
      expect(response).toBe('hello@1');
      expect(clusterIoClient.sentNodeIds()).toEqual([1]);
    });

    it('should throw InvalidClusterError when the membership was rejected', async () => {
      newLoadBalancer.mockImplementationOnce(() => {
        throw new InvalidClusterError('duplicate node id 2');
      });
      await factory.start();

      const client = factory.newClient();

      expect(() => client.sendMessage('hello')).toThrow(InvalidClusterError);
      expect(() => client.sendMessage('hello')).toThrow('Invalid cluster: duplicate node id 2');
      expect(nextNode).not.toHaveBeenCalled();
      expect(clusterIoClient.sentMessages).toHaveLength(0);
    });

    it('should throw NoNodesAvailableError when the load balancer has no node', async () => {
      nextNode.mockReturnValue(undefined);
      await factory.start();

      expect(() => factory.newClient().sendMessage('hello')).toThrow(NoNodesAvailableError);
      expect(nextNode).toHaveBeenCalledTimes(1);
      expect(clusterIoClient.sentMessages).toHaveLength(0);
    });

    it('should use the load balancer rebuilt after the client was created', async () => {
      await factory.start();
      const client = factory.newClient();
      const node2 = createTestNode(2);
      newLoadBalancer.mockReturnValueOnce({ nextNode: () => node2 });

      cluster.deliver(ClusterEvents.nodesChanged(createNodeSet([node2])));

      await expect(client.sendMessage('hello')).resolves.toBe('hello@2');
    });

    it('should fail after a rebuild is rejected rather than use the old load balancer', async () => {
      await factory.start();
      const client = factory.newClient();
      newLoadBalancer.mockImplementationOnce(() => {
        throw new InvalidClusterError('rejected');
      });

      cluster.deliver(ClusterEvents.nodesChanged(nodeFixtures));

      expect(() => client.sendMessage('hello')).toThrow(InvalidClusterError);
      expect(nextNode).not.toHaveBeenCalled();
    });

    it('should throw errors callers can branch on by kind', async () => {
      nextNode.mockReturnValue(undefined);
      await factory.start();

      let caught: unknown;
      try {
        factory.newClient().sendMessage('hello');
      } catch (error) {
        caught = error;
      }

      expect(isNetworkError(caught, 'no-nodes-available')).toBe(true);
      expect(isNetworkError(caught, 'invalid-cluster')).toBe(false);
    });
  });

  describe('three node cluster', () => {
    it('should route targeted, balanced and broadcast sends', async () => {
      await factory.start();
      const client = factory.newClient();

      expect(() => client.sendMessageToNode('hello', createTestNode(4))).toThrow(InvalidNodeError);

      await expect(client.sendMessageToNode('hello', createTestNode(1))).resolves.toBe('hello@1');
      expect(clusterIoClient.sentNodeIds()).toEqual([1]);

      nextNode.mockReturnValue(undefined);
      expect(() => client.sendMessage('hello')).toThrow(NoNodesAvailableError);
      expect(clusterIoClient.sentNodeIds()).toEqual([1]);

      await client.broadcastMessage('hello');
      expect(clusterIoClient.sentNodeIds()).toEqual([1, 1, 2, 3]);
    });
  });
});
