export type NetworkErrorKind =
  | 'network-not-started'
  | 'cluster-shutdown'
  | 'cluster-disconnected'
  | 'invalid-node'
  | 'invalid-cluster'
  | 'no-nodes-available';

/**
 * Base class for every failure raised by the client factory and its clients.
 * Branch on `kind` (or use instanceof on a subclass).
 */
export abstract class NetworkError extends Error {
  abstract readonly kind: NetworkErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Thrown when a client is requested or used before start() completed. */
export class NetworkNotStartedError extends NetworkError {
  readonly kind = 'network-not-started' as const;

  constructor() {
    super('The network client factory has not been started');
  }
}

/** Thrown for any use of the factory, or its clients, after shutdown(). */
export class ClusterShutdownError extends NetworkError {
  readonly kind = 'cluster-shutdown' as const;

  constructor() {
    super('The cluster has been shut down');
  }
}

/** Thrown when the cluster reports it is not connected at call time. */
export class ClusterDisconnectedError extends NetworkError {
  readonly kind = 'cluster-disconnected' as const;

  constructor() {
    super('The cluster is disconnected');
  }
}

/** Thrown when a caller targets a node that is not a current cluster member. */
export class InvalidNodeError extends NetworkError {
  readonly kind = 'invalid-node' as const;

  constructor(readonly nodeId: number) {
    super(`Node ${nodeId} is not a member of the cluster`);
  }
}

/** Thrown when the load balancer factory rejects the current node set. */
export class InvalidClusterError extends NetworkError {
  readonly kind = 'invalid-cluster' as const;

  constructor(readonly reason: string, options?: ErrorOptions) {
    super(`Invalid cluster: ${reason}`, options);
  }
}

/** Thrown when the load balancer has no node to offer. */
export class NoNodesAvailableError extends NetworkError {
  readonly kind = 'no-nodes-available' as const;

  constructor() {
    super('No nodes available to receive the message');
  }
}

export function isNetworkError(error: unknown, kind?: NetworkErrorKind): error is NetworkError {
  return error instanceof NetworkError && (kind === undefined || error.kind === kind);
}
