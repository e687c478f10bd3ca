import 'dotenv/config';

import { ConfigError } from '../errors.js';
import { parseLogLevel } from '../logging/logger.js';
import type { HarnessConfig, LogLevel } from '../types/config.js';

function readEnv(name: string, fallback?: string): string {
  const value = process.env[name] ?? fallback;
  if (value === undefined) {
    throw new ConfigError(name, 'missing required environment variable');
  }

  return value;
}

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(name, `not a number: ${raw}`);
  }

  return parsed;
}

function readInteger(name: string, fallback: number, min: number): number {
  const value = readNumber(name, fallback);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(name, `expected an integer >= ${min}, got ${value}`);
  }

  return value;
}

function readLogLevel(name: string, fallback: LogLevel): LogLevel {
  const raw = process.env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const level = parseLogLevel(raw);
  if (!level) {
    throw new ConfigError(name, `unknown log level: ${raw}`);
  }

  return level;
}

export function validateHarnessConfig(config: HarnessConfig): HarnessConfig {
  const { dropPolicy, driver, topology } = config;

  if (!(dropPolicy.dropRatio >= 0 && dropPolicy.dropRatio <= 1)) {
    throw new ConfigError('DROP_RATIO', `must be within [0, 1], got ${dropPolicy.dropRatio}`);
  }

  if (driver.timeoutMs <= 0) {
    throw new ConfigError('LIVENESS_TIMEOUT_SECONDS', 'must be positive');
  }

  if (driver.pollIntervalMs <= 0) {
    throw new ConfigError('POLL_INTERVAL_SECONDS', 'must be positive');
  }

  if (topology.bootNodeIndex >= topology.nodeCount) {
    throw new ConfigError(
      'BOOT_NODE_INDEX',
      `must be below NODE_COUNT (${topology.nodeCount}), got ${topology.bootNodeIndex}`
    );
  }

  return config;
}

export function loadHarnessConfig(): HarnessConfig {
  return validateHarnessConfig({
    nodeEnv: readEnv('NODE_ENV', 'development'),
    logLevel: readLogLevel('LOG_LEVEL', 'info'),
    seed: readInteger('RANDOM_SEED', 42, 0),
    statusPort: readInteger('STATUS_PORT', 0, 0),
    dropPolicy: {
      dropRatio: readNumber('DROP_RATIO', 0.05),
      heightTarget: readInteger('HEIGHT_TARGET', 10, 1),
    },
    driver: {
      timeoutMs: Math.round(readNumber('LIVENESS_TIMEOUT_SECONDS', 90) * 1_000),
      pollIntervalMs: Math.round(readNumber('POLL_INTERVAL_SECONDS', 1) * 1_000),
    },
    topology: {
      nodeCount: readInteger('NODE_COUNT', 4, 1),
      shardCount: readInteger('SHARD_COUNT', 0, 0),
      bootNodeIndex: readInteger('BOOT_NODE_INDEX', 1, 0),
    },
    link: {
      baseLatencyMs: readInteger('LINK_BASE_LATENCY_MS', 5, 0),
      jitterMs: readInteger('LINK_JITTER_MS', 2, 0),
    },
    node: {
      blockProductionDelayMs: readInteger('BLOCK_PRODUCTION_DELAY_MS', 600, 1),
      gossipIntervalMs: readInteger('GOSSIP_INTERVAL_MS', 250, 1),
    },
  });
}
