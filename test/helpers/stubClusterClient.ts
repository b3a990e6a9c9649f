import { ClusterClient, ClusterEvent, ClusterListener, ClusterListenerKey } from '../../src/cluster/types';
import { NodeSet } from '../../src/types';

/**
 * Cluster client whose answers are set directly by the test.
 * The registered listener is captured so events can be delivered by hand.
 */
export class StubClusterClient implements ClusterClient {
  public connected = true;
  public shutDown = false;
  public listener?: ClusterListener;

  start = jest.fn(async (): Promise<void> => undefined);

  shutdown = jest.fn(async (): Promise<void> => {
    this.shutDown = true;
    this.connected = false;
  });

  nodes = jest.fn((): NodeSet => this.currentNodes);

  addListener = jest.fn((listener: ClusterListener): ClusterListenerKey => {
    this.listener = listener;
    return { id: 1 };
  });

  removeListener = jest.fn((_key: ClusterListenerKey): void => undefined);

  constructor(public currentNodes: NodeSet = []) {}

  isConnected(): boolean {
    return this.connected;
  }

  isShutdown(): boolean {
    return this.shutDown;
  }

  deliver(event: ClusterEvent): void {
    if (!this.listener) {
      throw new Error('No listener registered');
    }
    this.listener.handleClusterEvent(event);
  }
}
