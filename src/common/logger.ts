/**
 * Console logging for the network client factory and the in-memory cluster.
 * Each category has its own switch; everything is silent under Jest.
 */

export interface LoggingConfig {
  enableNetworkLogs?: boolean;
  enableClusterLogs?: boolean;
  enableTestMode?: boolean;
}

export class FrameworkLogger {
  private readonly config: LoggingConfig;

  constructor(config: LoggingConfig = {}) {
    this.config = { ...config };
    // Jest sets JEST_WORKER_ID in every worker
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  /**
   * Factory lifecycle and load balancer rebuilds
   */
  network(message: string, ...args: unknown[]): void {
    if (this.config.enableNetworkLogs && !this.config.enableTestMode) {
      console.log(`[NETWORK] ${message}`, ...args);
    }
  }

  /**
   * Membership and connectivity changes reported by a cluster client
   */
  cluster(message: string, ...args: unknown[]): void {
    if (this.config.enableClusterLogs && !this.config.enableTestMode) {
      console.log(`[CLUSTER] ${message}`, ...args);
    }
  }

  /**
   * Release failures and listener errors. Not gated by a category switch.
   */
  error(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  }

  /**
   * Rejected memberships and similar recoverable conditions
   */
  warn(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.warn(`[WARN] ${message}`, ...args);
    }
  }

  /**
   * Ignored cluster events and other tracing; printed when NODE_ENV is 'development'
   */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'development' && !this.config.enableTestMode) {
      console.debug(`[DEBUG] ${message}`, ...args);
    }
  }
}

export function createLogger(config: LoggingConfig = {}): FrameworkLogger {
  return new FrameworkLogger(config);
}
