import { HandlerFailureError, toError } from '../errors.js';
import { Logger } from '../logging/logger.js';
import type { InterceptDecision, MetricsRegistry } from '../metrics/registry.js';
import type { RoutedMessage } from '../types/message.js';
import type { ProxyHandler, ProxyLink } from './proxy-handler.js';

const logger = new Logger('interception-proxy');

export type InterceptOutcome = InterceptDecision | 'failed';

export interface LinkStats {
  from: string;
  to: string;
  intercepted: number;
  forwarded: number;
  dropped: number;
  failed: number;
}

export interface InterceptionProxyOptions {
  link: ProxyLink;
  handler: ProxyHandler;
  onFatal: (error: HandlerFailureError) => void;
  metrics?: MetricsRegistry;
}

/**
 * Sits on one ordered link and asks its handler about every message.
 * Calls are chained so the handler sees messages one at a time, in send order.
 */
export class InterceptionProxy {
  readonly link: ProxyLink;

  private readonly handler: ProxyHandler;
  private tail: Promise<unknown> = Promise.resolve();
  private intercepted = 0;
  private forwarded = 0;
  private dropped = 0;
  private failed = 0;

  constructor(private readonly options: InterceptionProxyOptions) {
    this.link = options.link;
    this.handler = options.handler;
  }

  intercept(routed: RoutedMessage): Promise<InterceptOutcome> {
    if (routed.from !== this.link.from || routed.to !== this.link.to) {
      return Promise.reject(
        new Error(`message for ${routed.from} -> ${routed.to} sent through link ${this.link.from} -> ${this.link.to}`)
      );
    }

    const decision = this.tail.then(() => this.decide(routed));
    this.tail = decision;
    return decision;
  }

  /** Resolves once every message queued so far has been decided. */
  async drain(): Promise<void> {
    await this.tail;
  }

  stats(): LinkStats {
    return {
      from: this.link.from,
      to: this.link.to,
      intercepted: this.intercepted,
      forwarded: this.forwarded,
      dropped: this.dropped,
      failed: this.failed,
    };
  }

  private async decide({ message, from, to }: RoutedMessage): Promise<InterceptOutcome> {
    this.intercepted += 1;

    let forward: boolean;
    try {
      forward = await this.handler.handle(message, from, to);
    } catch (error) {
      this.failed += 1;
      const failure = new HandlerFailureError(from, to, message.kind, toError(error));
      logger.error('proxy handler failed', {
        from,
        to,
        kind: message.kind,
        error: failure.message,
      });
      this.options.metrics?.handlerFailures.inc({ kind: message.kind });
      this.options.onFatal(failure);
      return 'failed';
    }

    const outcome: InterceptDecision = forward ? 'forward' : 'drop';
    if (forward) {
      this.forwarded += 1;
    } else {
      this.dropped += 1;
    }

    this.options.metrics?.recordDecision(message.kind, outcome);
    return outcome;
  }
}
