import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

export type InterceptDecision = 'forward' | 'drop';

export class MetricsRegistry {
  readonly registry: Registry;

  readonly interceptedMessages: Counter<'kind' | 'decision'>;
  readonly handlerFailures: Counter<'kind'>;
  readonly deliveredMessages: Counter<'kind'>;
  readonly bestHeight: Gauge;
  readonly livenessReached: Gauge;
  readonly nodeHeight: Gauge<'node'>;
  readonly driverPolls: Counter;

  constructor(options: { collectDefaults?: boolean } = {}) {
    this.registry = new Registry();
    if (options.collectDefaults ?? false) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.interceptedMessages = new Counter({
      name: 'harness_intercepted_messages_total',
      help: 'Messages seen by the proxy layer, by kind and forward/drop decision',
      labelNames: ['kind', 'decision'],
      registers: [this.registry],
    });

    this.handlerFailures = new Counter({
      name: 'harness_handler_failures_total',
      help: 'Proxy handler invocations that threw',
      labelNames: ['kind'],
      registers: [this.registry],
    });

    this.deliveredMessages = new Counter({
      name: 'harness_delivered_messages_total',
      help: 'Forwarded messages handed to the destination node',
      labelNames: ['kind'],
      registers: [this.registry],
    });

    this.bestHeight = new Gauge({
      name: 'harness_best_height_seen',
      help: 'Highest block height observed on any intercepted link',
      registers: [this.registry],
    });

    this.livenessReached = new Gauge({
      name: 'harness_liveness_reached',
      help: '1 once the liveness height target has been observed',
      registers: [this.registry],
    });

    this.nodeHeight = new Gauge({
      name: 'harness_node_head_height',
      help: 'Head height of each local cluster node',
      labelNames: ['node'],
      registers: [this.registry],
    });

    this.driverPolls = new Counter({
      name: 'harness_driver_polls_total',
      help: 'Liveness gate polls performed by the driver loop',
      registers: [this.registry],
    });
  }

  recordDecision(kind: string, decision: InterceptDecision): void {
    this.interceptedMessages.inc({ kind, decision });
  }
}
