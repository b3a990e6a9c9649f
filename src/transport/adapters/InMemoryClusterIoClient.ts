import { EventEmitter } from 'events';
import { ClusterIoClient } from '../ClusterIoClient';
import { Node } from '../../types';

export type MessageHandler<M, R> = (message: M, node: Node) => R | Promise<R>;

/**
 * In-memory transport for local testing and simulations.
 * Nodes register a handler under their id; sends are delivered on the next tick.
 */
export class InMemoryClusterIoClient<M = unknown, R = unknown> extends EventEmitter implements ClusterIoClient<M, R> {
  private handlers = new Map<number, MessageHandler<M, R>>();
  private isShutdown = false;

  registerNode(nodeId: number, handler: MessageHandler<M, R>): void {
    this.handlers.set(nodeId, handler);
  }

  unregisterNode(nodeId: number): void {
    this.handlers.delete(nodeId);
  }

  sendMessage(node: Node, message: M): Promise<R> {
    if (this.isShutdown) {
      return Promise.reject(new Error('Cluster IO client has been shut down'));
    }

    const handler = this.handlers.get(node.id);
    if (!handler) {
      return Promise.reject(new Error(`No handler registered for node ${node.id}`));
    }

    // Simulate async delivery with next tick
    return new Promise<R>((resolve, reject) => {
      process.nextTick(() => {
        try {
          resolve(handler(message, node));
        } catch (error) {
          reject(error);
          return;
        }
        // Send already settled
        this.emit('message-sent', { nodeId: node.id });
      });
    });
  }

  async shutdown(): Promise<void> {
    if (this.isShutdown) return;

    this.isShutdown = true;
    this.handlers.clear();
    this.emit('stopped');
  }

  getRegisteredNodeIds(): number[] {
    return Array.from(this.handlers.keys());
  }
}
