import { Logger } from '../logging/logger.js';
import type { MetricsRegistry } from '../metrics/registry.js';
import { ProxyHandler, type ProxyHandlerFactory, type ProxyLink } from '../network/proxy-handler.js';
import type { LivenessGate } from '../sync/liveness-gate.js';
import { blockHeight, type PeerId, type PeerMessage } from '../types/message.js';
import { deriveSeed, XorShift32 } from '../utils/prng.js';

const logger = new Logger('drop-policy');

export interface DropPolicyOptions {
  gate: LivenessGate;
  /** Probability in [0, 1] that a message is discarded. */
  dropRatio: number;
  heightTarget: number;
  metrics?: MetricsRegistry;
  /** Supplies the per-handler uniform source; defaults to a link-seeded XorShift32. */
  random?: (link: ProxyLink) => () => number;
}

export interface DropPolicyCounters {
  dropped: number;
  total: number;
  finished: boolean;
}

/**
 * Drops a fixed fraction of traffic on its link and watches Block messages for
 * the liveness height target. Height inspection never influences the drop
 * decision.
 */
export class DropPolicyHandler extends ProxyHandler {
  private readonly nextSample: () => number;
  private dropped = 0;
  private total = 0;
  private finished = false;

  constructor(
    link: ProxyLink,
    private readonly options: DropPolicyOptions
  ) {
    super(link);

    if (!(options.dropRatio >= 0 && options.dropRatio <= 1)) {
      throw new RangeError(`drop ratio must be within [0, 1], got ${options.dropRatio}`);
    }

    if (options.random) {
      this.nextSample = options.random(link);
    } else {
      const prng = new XorShift32(deriveSeed(link.seed, 'drop', link.from, link.to));
      this.nextSample = () => prng.nextFloat();
    }
  }

  static factory(options: DropPolicyOptions): ProxyHandlerFactory {
    return (link) => new DropPolicyHandler(link, options);
  }

  async handle(message: PeerMessage, from: PeerId, to: PeerId): Promise<boolean> {
    const height = blockHeight(message);
    if (height !== undefined) {
      this.observeHeight(height, from, to);
    }

    const drop = this.nextSample() < this.options.dropRatio;
    if (drop) {
      this.dropped += 1;
    }
    this.total += 1;

    return !drop;
  }

  counters(): DropPolicyCounters {
    return {
      dropped: this.dropped,
      total: this.total,
      finished: this.finished,
    };
  }

  private observeHeight(height: number, from: PeerId, to: PeerId): void {
    const { gate, heightTarget, metrics } = this.options;

    if (gate.updateBestHeight(height)) {
      metrics?.bestHeight.set(gate.bestHeight());
      logger.info('height advanced', { height, from, to });
    }

    if (height < heightTarget || this.finished) {
      return;
    }

    this.finished = true;
    const latched = gate.setSuccess();
    if (latched) {
      metrics?.livenessReached.set(1);
    }

    logger.info('liveness target reached', {
      height,
      heightTarget,
      from,
      to,
      dropped: this.dropped,
      total: this.total,
      latched,
    });
  }
}
