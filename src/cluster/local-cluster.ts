import { ClusterStartError, toError } from '../errors.js';
import { Logger } from '../logging/logger.js';
import type { MetricsRegistry } from '../metrics/registry.js';
import type { LinkStats } from '../network/interception-proxy.js';
import { PassThroughHandler, type ProxyHandlerFactory } from '../network/proxy-handler.js';
import { ProxyNetwork } from '../network/proxy-network.js';
import type { GenesisConfig, LinkLatencyConfig, NodeConfig } from '../types/config.js';
import type { PeerId } from '../types/message.js';
import { nowMs } from '../utils/time.js';
import { buildGenesisBlock } from './block.js';
import { LocalNode, type NodeStatus } from './local-node.js';

const logger = new Logger('local-cluster');

export const DEFAULT_NODE_CONFIG: NodeConfig = {
  blockProductionDelayMs: 600,
  gossipIntervalMs: 250,
};

export const DEFAULT_LINK_LATENCY: LinkLatencyConfig = {
  baseLatencyMs: 5,
  jitterMs: 2,
};

export type GenesisOverrides = Partial<Pick<GenesisConfig, 'chainId' | 'epochLength' | 'genesisTimeMs'>>;

export interface ClusterOptions {
  nodeCount: number;
  /** 0 means a single shard. */
  shardCount: number;
  bootNodeIndex: number;
  handlerFactory?: ProxyHandlerFactory;
  seed?: number;
  /** Applied to every node. */
  localConfigOverride?: Partial<NodeConfig>;
  genesisOverrides?: GenesisOverrides;
  /** Per-node overrides keyed by node index, applied after `localConfigOverride`. */
  nodeOverrides?: Readonly<Record<number, Partial<NodeConfig>>>;
  link?: LinkLatencyConfig;
  metrics?: MetricsRegistry;
}

export interface ClusterStatus {
  chainId: string;
  nodes: NodeStatus[];
  links: LinkStats[];
}

/** What the driver loop needs from a running cluster. */
export interface ClusterHandle {
  fatalError(): Error | undefined;
  status(): ClusterStatus;
  stop(): Promise<void>;
}

export type ClusterLauncher = (options: ClusterOptions) => Promise<ClusterHandle>;

export function peerIdFor(index: number): PeerId {
  return `node${index}`;
}

export class LocalCluster implements ClusterHandle {
  private stopped = false;

  constructor(
    readonly genesis: GenesisConfig,
    readonly nodes: readonly LocalNode[],
    readonly network: ProxyNetwork
  ) {}

  fatalError(): Error | undefined {
    return this.network.fatalError();
  }

  status(): ClusterStatus {
    return {
      chainId: this.genesis.chainId,
      nodes: this.nodes.map((node) => node.status()),
      links: this.network.linkStats(),
    };
  }

  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }

    this.stopped = true;
    for (const node of this.nodes) {
      node.stop();
    }
    await this.network.close();
    logger.info('cluster stopped', { chainId: this.genesis.chainId });
  }
}

function validateTopology(options: ClusterOptions): void {
  const { nodeCount, shardCount, bootNodeIndex } = options;

  if (!Number.isInteger(nodeCount) || nodeCount < 1) {
    throw new ClusterStartError(`node count must be a positive integer, got ${nodeCount}`);
  }

  if (!Number.isInteger(shardCount) || shardCount < 0) {
    throw new ClusterStartError(`shard count must be a non-negative integer, got ${shardCount}`);
  }

  if (!Number.isInteger(bootNodeIndex) || bootNodeIndex < 0 || bootNodeIndex >= nodeCount) {
    throw new ClusterStartError(`boot node index ${bootNodeIndex} outside [0, ${nodeCount})`);
  }
}

export function buildGenesis(options: ClusterOptions): GenesisConfig {
  return {
    chainId: options.genesisOverrides?.chainId ?? 'harness-localnet',
    numShards: Math.max(1, options.shardCount),
    epochLength: options.genesisOverrides?.epochLength ?? 10,
    blockProducers: Array.from({ length: options.nodeCount }, (_, index) => peerIdFor(index)),
    genesisTimeMs: options.genesisOverrides?.genesisTimeMs ?? nowMs(),
  };
}

/**
 * Starts `nodeCount` in-process validators wired through one proxy per ordered
 * link. Resolves once every node is running; throws {@link ClusterStartError}
 * otherwise, after stopping whatever was started.
 */
export async function startCluster(options: ClusterOptions): Promise<LocalCluster> {
  validateTopology(options);

  const genesis = buildGenesis(options);
  const genesisBlock = buildGenesisBlock(genesis);
  const network = new ProxyNetwork({
    handlerFactory: options.handlerFactory ?? ((link) => new PassThroughHandler(link)),
    seed: options.seed ?? 42,
    latency: options.link ?? DEFAULT_LINK_LATENCY,
    metrics: options.metrics,
  });

  const bootPeer = peerIdFor(options.bootNodeIndex);
  const nodes = genesis.blockProducers.map(
    (peerId, index) =>
      new LocalNode({
        peerId,
        genesis,
        genesisBlock,
        config: {
          ...DEFAULT_NODE_CONFIG,
          ...options.localConfigOverride,
          ...options.nodeOverrides?.[index],
        },
        bootPeer: index === options.bootNodeIndex ? undefined : bootPeer,
        network,
        metrics: options.metrics,
      })
  );

  const cluster = new LocalCluster(genesis, nodes, network);
  // boot node first so the others have someone to dial
  const startOrder = [nodes[options.bootNodeIndex], ...nodes.filter((_, index) => index !== options.bootNodeIndex)];

  try {
    for (const node of startOrder) {
      node.start();
    }
  } catch (error) {
    await cluster.stop();
    throw new ClusterStartError('failed to start cluster nodes', toError(error));
  }

  logger.info('cluster started', {
    chainId: genesis.chainId,
    nodeCount: options.nodeCount,
    numShards: genesis.numShards,
    bootPeer,
  });

  return cluster;
}
