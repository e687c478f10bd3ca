export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface DropPolicyConfig {
  dropRatio: number;
  heightTarget: number;
}

export interface DriverConfig {
  timeoutMs: number;
  pollIntervalMs: number;
}

export interface ClusterTopologyConfig {
  nodeCount: number;
  /** 0 means a single shard. */
  shardCount: number;
  bootNodeIndex: number;
}

export interface LinkLatencyConfig {
  baseLatencyMs: number;
  jitterMs: number;
}

export interface NodeConfig {
  blockProductionDelayMs: number;
  gossipIntervalMs: number;
}

export interface GenesisConfig {
  chainId: string;
  numShards: number;
  epochLength: number;
  blockProducers: string[];
  genesisTimeMs: number;
}

export interface HarnessConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  seed: number;
  statusPort: number;
  dropPolicy: DropPolicyConfig;
  driver: DriverConfig;
  topology: ClusterTopologyConfig;
  link: LinkLatencyConfig;
  node: NodeConfig;
}
