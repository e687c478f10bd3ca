import { HandlerFactoryError, toError, type HandlerFailureError } from '../errors.js';
import { Logger } from '../logging/logger.js';
import type { MetricsRegistry } from '../metrics/registry.js';
import type { LinkLatencyConfig } from '../types/config.js';
import { freezeMessage, type PeerId, type PeerMessage, type RoutedMessage } from '../types/message.js';
import { deriveSeed } from '../utils/prng.js';
import { InterceptionProxy, type LinkStats } from './interception-proxy.js';
import { NetworkSimulator } from './network-simulator.js';
import type { ProxyHandlerFactory } from './proxy-handler.js';

const logger = new Logger('proxy-network');

export type MessageReceiver = (message: PeerMessage, from: PeerId) => void;

export type DeliveryStatus = 'delivered' | 'dropped' | 'failed' | 'unreachable' | 'closed';

export interface DeliveryResult {
  status: DeliveryStatus;
  latencyMs: number;
}

export type FatalErrorListener = (error: Error) => void;

export interface ProxyNetworkOptions {
  handlerFactory: ProxyHandlerFactory;
  seed: number;
  latency: LinkLatencyConfig;
  metrics?: MetricsRegistry;
}

interface Link {
  proxy: InterceptionProxy;
  simulator: NetworkSimulator;
}

/**
 * In-process transport between cluster nodes. Every ordered pair of nodes gets
 * its own interception proxy and handler, created on the first send over it.
 */
export class ProxyNetwork {
  private readonly receivers = new Map<PeerId, MessageReceiver>();
  private readonly links = new Map<string, Link>();
  private readonly fatalListeners = new Set<FatalErrorListener>();
  private fatal: Error | undefined;
  private closed = false;

  constructor(private readonly options: ProxyNetworkOptions) {}

  register(peerId: PeerId, receiver: MessageReceiver): void {
    if (this.receivers.has(peerId)) {
      throw new Error(`peer already registered: ${peerId}`);
    }

    this.receivers.set(peerId, receiver);
  }

  unregister(peerId: PeerId): void {
    this.receivers.delete(peerId);
  }

  async send(from: PeerId, to: PeerId, message: PeerMessage): Promise<DeliveryResult> {
    if (this.closed) {
      return { status: 'closed', latencyMs: 0 };
    }

    if (!this.receivers.has(to)) {
      return { status: 'unreachable', latencyMs: 0 };
    }

    let link: Link;
    try {
      link = this.linkFor(from, to);
    } catch (error) {
      const failure = new HandlerFactoryError(from, to, toError(error));
      logger.error('proxy handler factory failed', { from, to, error: failure.message });
      this.reportFatal(failure);
      return { status: 'failed', latencyMs: 0 };
    }

    const routed: RoutedMessage = { message: freezeMessage(message), from, to };
    const frozen = routed.message;
    const outcome = await link.proxy.intercept(routed);

    if (outcome === 'failed') {
      return { status: 'failed', latencyMs: 0 };
    }

    if (outcome === 'drop') {
      logger.debug('message dropped', { from, to, kind: frozen.kind });
      return { status: 'dropped', latencyMs: 0 };
    }

    const { latencyMs, result } = await link.simulator.execute(() => this.deliver(from, to, frozen));
    return { status: result, latencyMs };
  }

  onFatal(listener: FatalErrorListener): () => void {
    this.fatalListeners.add(listener);
    return () => {
      this.fatalListeners.delete(listener);
    };
  }

  /** First fatal error recorded on this network, if any. */
  fatalError(): Error | undefined {
    return this.fatal;
  }

  linkStats(): LinkStats[] {
    return Array.from(this.links.values(), (link) => link.proxy.stats());
  }

  /** Stops delivery; in-flight decisions are allowed to settle. */
  async close(): Promise<void> {
    this.closed = true;
    await Promise.all(Array.from(this.links.values(), (link) => link.proxy.drain()));
  }

  private linkFor(from: PeerId, to: PeerId): Link {
    const key = `${from}->${to}`;
    const existing = this.links.get(key);
    if (existing) {
      return existing;
    }

    const linkInfo = { from, to, seed: this.options.seed };
    const link: Link = {
      proxy: new InterceptionProxy({
        link: linkInfo,
        handler: this.options.handlerFactory(linkInfo),
        metrics: this.options.metrics,
        onFatal: (error: HandlerFailureError) => this.reportFatal(error),
      }),
      simulator: new NetworkSimulator(this.options.latency, deriveSeed(this.options.seed, 'latency', from, to)),
    };

    this.links.set(key, link);
    return link;
  }

  private deliver(from: PeerId, to: PeerId, message: PeerMessage): DeliveryStatus {
    if (this.closed) {
      return 'closed';
    }

    const receiver = this.receivers.get(to);
    if (!receiver) {
      return 'unreachable';
    }

    try {
      receiver(message, from);
    } catch (error) {
      this.reportFatal(toError(error));
      return 'failed';
    }

    this.options.metrics?.deliveredMessages.inc({ kind: message.kind });
    return 'delivered';
  }

  private reportFatal(error: Error): void {
    if (this.fatal) {
      logger.warn('additional fatal error after the first', { error: error.message });
      return;
    }

    this.fatal = error;
    for (const listener of this.fatalListeners) {
      listener(error);
    }
  }
}
