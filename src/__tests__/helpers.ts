import { zeroHash } from 'viem';

import { buildBlock } from '../cluster/block.js';
import { setLogSink } from '../logging/logger.js';
import type { HarnessConfig } from '../types/config.js';
import type { BlockMessage, PeerMessage } from '../types/message.js';

export function testConfig(overrides: Partial<HarnessConfig> = {}): HarnessConfig {
  return {
    nodeEnv: 'test',
    logLevel: 'warn',
    seed: 7,
    statusPort: 0,
    dropPolicy: { dropRatio: 0.05, heightTarget: 5 },
    driver: { timeoutMs: 10_000, pollIntervalMs: 20 },
    topology: { nodeCount: 4, shardCount: 0, bootNodeIndex: 1 },
    link: { baseLatencyMs: 0, jitterMs: 0 },
    node: { blockProductionDelayMs: 10, gossipIntervalMs: 5 },
    ...overrides,
  };
}

export function blockMessage(height: number, producer = 'node0'): BlockMessage {
  return {
    kind: 'Block',
    block: buildBlock({
      prevHash: zeroHash,
      height,
      epochId: 0,
      producer,
      timestampMs: 1_700_000_000_000,
      chunkMask: [true],
    }),
  };
}

export const handshake: PeerMessage = {
  kind: 'Handshake',
  chainId: 'test-chain',
  peerId: 'node0',
  headHeight: 0,
  ack: false,
};

export interface CapturedLog {
  level: string;
  context: string;
  message: string;
  [key: string]: unknown;
}

/** Collects every log entry written until the returned `restore` is called. */
export function captureLogs(): { entries: CapturedLog[]; restore: () => void } {
  const entries: CapturedLog[] = [];
  const restore = setLogSink((line) => {
    const entry: CapturedLog = JSON.parse(line);
    entries.push(entry);
  });
  return { entries, restore };
}
