import {
  ClusterDisconnectedError,
  ClusterShutdownError,
  InvalidClusterError,
  InvalidNodeError,
  NetworkError,
  NetworkNotStartedError,
  NoNodesAvailableError,
  isNetworkError
} from '../../../src/network/errors';

describe('network errors', () => {
  it('should give each failure its own kind and name', () => {
    const errors: NetworkError[] = [
      new NetworkNotStartedError(),
      new ClusterShutdownError(),
      new ClusterDisconnectedError(),
      new InvalidNodeError(4),
      new InvalidClusterError('duplicate node id 1'),
      new NoNodesAvailableError()
    ];

    expect(errors.map(error => [error.kind, error.name])).toEqual([
      ['network-not-started', 'NetworkNotStartedError'],
      ['cluster-shutdown', 'ClusterShutdownError'],
      ['cluster-disconnected', 'ClusterDisconnectedError'],
      ['invalid-node', 'InvalidNodeError'],
      ['invalid-cluster', 'InvalidClusterError'],
      ['no-nodes-available', 'NoNodesAvailableError']
    ]);
    expect(errors.every(error => error instanceof Error)).toBe(true);
  });

  it('should carry the rejected node and the cluster rejection reason', () => {
    expect(new InvalidNodeError(4).nodeId).toBe(4);
    expect(new InvalidClusterError('no partitions').reason).toBe('no partitions');
    expect(new InvalidClusterError('no partitions').message).toBe('Invalid cluster: no partitions');
  });

  it('should narrow with isNetworkError', () => {
    expect(isNetworkError(new ClusterShutdownError())).toBe(true);
    expect(isNetworkError(new ClusterShutdownError(), 'cluster-shutdown')).toBe(true);
    expect(isNetworkError(new ClusterShutdownError(), 'cluster-disconnected')).toBe(false);
    expect(isNetworkError(new Error('plain'))).toBe(false);
    expect(isNetworkError('cluster-shutdown')).toBe(false);
  });
});
