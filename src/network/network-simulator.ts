import type { LinkLatencyConfig } from '../types/config.js';
import { XorShift32 } from '../utils/prng.js';
import { sleep } from '../utils/time.js';

export interface LatencyResult<T> {
  latencyMs: number;
  result: T;
}

/** Per-link delay model: base latency plus uniform jitter, never negative. */
export class NetworkSimulator {
  private readonly random: XorShift32;

  constructor(
    private readonly config: LinkLatencyConfig,
    seed: number
  ) {
    this.random = new XorShift32(seed);
  }

  sampleLatencyMs(): number {
    const jitter = this.config.jitterMs > 0 ? this.random.nextInt(-this.config.jitterMs, this.config.jitterMs) : 0;
    return Math.max(0, this.config.baseLatencyMs + jitter);
  }

  async execute<T>(action: () => Promise<T> | T): Promise<LatencyResult<T>> {
    const latencyMs = this.sampleLatencyMs();
    if (latencyMs > 0) {
      await sleep(latencyMs);
    }

    const result = await action();
    return { latencyMs, result };
  }
}
