import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { createLoadBalancerFactory } from '../loadbalancer';
import { LoadBalancerFactory } from '../loadbalancer/types';
import { NetworkClientConfig } from '../network/types';
import { LoadBalancerStrategy, Node, NodeSet, createNodeSet } from '../types';

/**
 * YAML network configuration schema
 */
export interface YamlNetworkConfig {
  /** Cluster identity and static membership */
  cluster: {
    name: string;

    /** Nodes known up front, used to seed an in-memory cluster client */
    nodes?: Array<{
      id: number;
      url: string;
      /** Eligible for traffic (default: true) */
      available?: boolean;
    }>;
  };

  /** Client factory settings */
  network?: {
    /** Strategy: 'round-robin', 'random' */
    load_balancer?: LoadBalancerStrategy;

    logging?: {
      network?: boolean;
      cluster?: boolean;
    };
  };

  /** Environment-specific overrides */
  environments?: {
    [env: string]: Partial<YamlNetworkConfig>;
  };
}

type LoggingSection = NonNullable<NonNullable<YamlNetworkConfig['network']>['logging']>;

const LOAD_BALANCER_STRATEGIES: readonly LoadBalancerStrategy[] = ['round-robin', 'random'];
const LOGGING_KEYS = ['network', 'cluster'] as const;

/**
 * Loads network client settings from YAML
 */
export class YamlNetworkConfiguration extends EventEmitter {
  private config: YamlNetworkConfig | null = null;
  private currentEnvironment: string;

  constructor(environment: string = 'development') {
    super();
    this.currentEnvironment = environment;
  }

  /**
   * Load configuration from YAML file
   */
  async loadFromFile(filePath: string): Promise<void> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      this.config = this.parseFromYaml(yamlContent);

      this.applyEnvironmentOverrides();

      this.emit('config-loaded', { filePath, config: this.config });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to load YAML configuration from ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Parse YAML content into configuration object
   */
  parseFromYaml(yamlContent: string): YamlNetworkConfig {
    try {
      return validateConfiguration(yaml.load(yamlContent));
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to parse YAML configuration: ${errorMessage}`);
    }
  }

  /**
   * Use an already parsed configuration
   */
  load(config: YamlNetworkConfig): void {
    this.config = validateConfiguration(config);
    this.applyEnvironmentOverrides();
  }

  /**
   * Settings for NetworkClientFactory
   */
  toNetworkClientConfig(): NetworkClientConfig {
    const network = this.requireConfig().network ?? {};
    return {
      loadBalancer: network.load_balancer ?? 'round-robin',
      logging: {
        enableNetworkLogs: network.logging?.network ?? false,
        enableClusterLogs: network.logging?.cluster ?? false
      }
    };
  }

  toLoadBalancerFactory(): LoadBalancerFactory {
    return createLoadBalancerFactory(this.toNetworkClientConfig().loadBalancer);
  }

  /**
   * Static membership declared under cluster.nodes
   */
  toNodes(): NodeSet {
    const nodes: Node[] = (this.requireConfig().cluster.nodes ?? []).map(node => ({
      id: node.id,
      url: node.url,
      available: node.available !== false
    }));
    return createNodeSet(nodes);
  }

  /**
   * Save configuration to YAML file
   */
  async saveToFile(filePath: string): Promise<void> {
    const config = this.requireConfig();

    try {
      const yamlContent = yaml.dump(config, {
        indent: 2,
        lineWidth: 100,
        quotingType: '"',
        forceQuotes: false,
        skipInvalid: true
      });

      await fs.writeFile(filePath, yamlContent, 'utf8');
      this.emit('config-saved', { filePath });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      const errorMessage = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to save YAML configuration to ${filePath}: ${errorMessage}`);
    }
  }

  /**
   * Merge configurations with precedence
   */
  static mergeConfigurations(base: YamlNetworkConfig, override: Partial<YamlNetworkConfig>): YamlNetworkConfig {
    return {
      cluster: { ...base.cluster, ...override.cluster },
      network: {
        load_balancer: override.network?.load_balancer ?? base.network?.load_balancer,
        logging: mergeLogging(base.network?.logging, override.network?.logging)
      },
      environments: { ...base.environments, ...override.environments }
    };
  }

  getConfig(): YamlNetworkConfig | null {
    return this.config;
  }

  getEnvironment(): string {
    return this.currentEnvironment;
  }

  private requireConfig(): YamlNetworkConfig {
    if (!this.config) {
      throw new Error('No configuration loaded');
    }
    return this.config;
  }

  private applyEnvironmentOverrides(): void {
    const envOverrides = this.config?.environments?.[this.currentEnvironment];
    if (!this.config || !envOverrides) {
      return;
    }

    this.config = YamlNetworkConfiguration.mergeConfigurations(this.config, envOverrides);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLoadBalancerStrategy(value: unknown): value is LoadBalancerStrategy {
  return LOAD_BALANCER_STRATEGIES.some(strategy => strategy === value);
}

function validateNetworkSection(value: unknown, path: string): YamlNetworkConfig['network'] {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new Error(`${path} must be a mapping`);
  }

  const strategy = value.load_balancer;
  if (strategy !== undefined && !isLoadBalancerStrategy(strategy)) {
    throw new Error(`${path}.load_balancer must be one of: ${LOAD_BALANCER_STRATEGIES.join(', ')}`);
  }

  return {
    load_balancer: strategy,
    logging: validateLogging(value.logging, `${path}.logging`)
  };
}

/**
 * Only the flags actually present are kept, so an override leaves the others alone
 */
function validateLogging(value: unknown, path: string): LoggingSection | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new Error(`${path} must be a mapping`);
  }

  const logging: LoggingSection = {};
  for (const key of LOGGING_KEYS) {
    const flag = value[key];
    if (flag === undefined) {
      continue;
    }
    if (typeof flag !== 'boolean') {
      throw new Error(`${path}.${key} must be a boolean`);
    }
    logging[key] = flag;
  }
  return logging;
}

function mergeLogging(base: LoggingSection | undefined, override: LoggingSection | undefined): LoggingSection | undefined {
  if (!base && !override) {
    return undefined;
  }

  const logging: LoggingSection = {};
  for (const key of LOGGING_KEYS) {
    const flag = override?.[key] ?? base?.[key];
    if (flag !== undefined) {
      logging[key] = flag;
    }
  }
  return logging;
}

function validateNodes(value: unknown): NonNullable<YamlNetworkConfig['cluster']['nodes']> {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new Error('cluster.nodes must be an array');
  }

  return value.map((node: unknown) => {
    const { id, url, available } = isRecord(node) ? node : { id: undefined, url: undefined, available: undefined };
    if (typeof id !== 'number' || !Number.isInteger(id)) {
      throw new Error('node.id must be an integer');
    }
    if (typeof url !== 'string' || url.length === 0) {
      throw new Error(`node ${id} requires a url`);
    }
    if (available !== undefined && typeof available !== 'boolean') {
      throw new Error(`node ${id}.available must be a boolean`);
    }
    return { id, url, available };
  });
}

/**
 * Validate configuration structure
 */
function validateConfiguration(config: unknown): YamlNetworkConfig {
  const cluster = isRecord(config) ? config.cluster : undefined;
  const name = isRecord(cluster) ? cluster.name : undefined;
  if (!isRecord(config) || !isRecord(cluster) || typeof name !== 'string' || !name) {
    throw new Error('cluster.name is required');
  }

  const environments: Record<string, Partial<YamlNetworkConfig>> = {};
  if (config.environments !== undefined) {
    if (!isRecord(config.environments)) {
      throw new Error('environments must be a mapping');
    }
    for (const [env, override] of Object.entries(config.environments)) {
      if (!isRecord(override)) {
        throw new Error(`environments.${env} must be a mapping`);
      }
      environments[env] = {
        network: validateNetworkSection(override.network, `environments.${env}.network`)
      };
    }
  }

  return {
    cluster: {
      name,
      nodes: validateNodes(cluster.nodes)
    },
    network: validateNetworkSection(config.network, 'network'),
    environments
  };
}
