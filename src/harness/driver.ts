import { startCluster, type ClusterHandle, type ClusterLauncher, type ClusterStatus } from '../cluster/local-cluster.js';
import { ClusterStartError, LivenessTimeoutError, toError } from '../errors.js';
import { Logger } from '../logging/logger.js';
import type { MetricsRegistry } from '../metrics/registry.js';
import type { ProxyHandlerFactory } from '../network/proxy-handler.js';
import { LivenessGate } from '../sync/liveness-gate.js';
import type { HarnessConfig } from '../types/config.js';
import { buildId } from '../utils/id.js';
import { systemClock, type Clock } from '../utils/time.js';
import { DropPolicyHandler } from './drop-policy-handler.js';

export type DriverState = 'idle' | 'starting' | 'running' | 'succeeded' | 'failed';

export interface LivenessDriverOptions {
  config: HarnessConfig;
  gate?: LivenessGate;
  metrics?: MetricsRegistry;
  launcher?: ClusterLauncher;
  /** Replaces the drop-policy handler on every link. */
  handlerFactory?: ProxyHandlerFactory;
  clock?: Clock;
  runId?: string;
  onStateChange?: (state: DriverState) => void;
}

export interface LivenessOutcome {
  runId: string;
  elapsedMs: number;
  bestHeight: number;
  polls: number;
}

export interface DriverSnapshot {
  runId: string;
  state: DriverState;
  success: boolean;
  bestHeight: number;
  heightTarget: number;
  elapsedMs: number | null;
  cluster: ClusterStatus | null;
}

/**
 * Starts the cluster with the drop policy installed on every link, then polls
 * the liveness gate until it latches or the deadline passes. One evaluation per
 * run; the cluster is always stopped before {@link run} settles.
 */
export class LivenessDriver {
  readonly runId: string;
  readonly gate: LivenessGate;

  private readonly logger: Logger;
  private readonly clock: Clock;
  private state: DriverState = 'idle';
  private cluster: ClusterHandle | null = null;
  private runningSinceMs: number | null = null;

  constructor(private readonly options: LivenessDriverOptions) {
    this.runId = options.runId ?? buildId('run');
    this.gate = options.gate ?? new LivenessGate();
    this.clock = options.clock ?? systemClock;
    this.logger = new Logger('driver', { runId: this.runId });
  }

  get currentState(): DriverState {
    return this.state;
  }

  async run(): Promise<LivenessOutcome> {
    if (this.state !== 'idle') {
      throw new Error(`driver already used (state ${this.state})`);
    }

    this.transition('starting');
    const cluster = await this.startCluster();
    this.cluster = cluster;
    this.runningSinceMs = this.clock.now();
    this.transition('running');

    try {
      const outcome = await this.pollUntilLive(cluster);
      this.transition('succeeded');
      this.logger.info('liveness reached', { ...outcome });
      return outcome;
    } catch (error) {
      this.transition('failed');
      this.logger.error('liveness run failed', { error: toError(error).message });
      throw error;
    } finally {
      await this.stopCluster(cluster);
    }
  }

  snapshot(): DriverSnapshot {
    return {
      runId: this.runId,
      state: this.state,
      success: this.gate.isSuccess(),
      bestHeight: this.gate.bestHeight(),
      heightTarget: this.options.config.dropPolicy.heightTarget,
      elapsedMs: this.runningSinceMs === null ? null : this.clock.now() - this.runningSinceMs,
      cluster: this.cluster?.status() ?? null,
    };
  }

  private async startCluster(): Promise<ClusterHandle> {
    const { config, metrics } = this.options;
    const launcher = this.options.launcher ?? startCluster;
    const handlerFactory =
      this.options.handlerFactory ??
      DropPolicyHandler.factory({
        gate: this.gate,
        dropRatio: config.dropPolicy.dropRatio,
        heightTarget: config.dropPolicy.heightTarget,
        metrics,
      });

    try {
      return await launcher({
        nodeCount: config.topology.nodeCount,
        shardCount: config.topology.shardCount,
        bootNodeIndex: config.topology.bootNodeIndex,
        seed: config.seed,
        link: config.link,
        localConfigOverride: config.node,
        handlerFactory,
        metrics,
      });
    } catch (error) {
      this.transition('failed');
      throw error instanceof ClusterStartError ? error : new ClusterStartError('cluster failed to start', toError(error));
    }
  }

  private async pollUntilLive(cluster: ClusterHandle): Promise<LivenessOutcome> {
    const { timeoutMs, pollIntervalMs } = this.options.config.driver;
    const startedAt = this.runningSinceMs ?? this.clock.now();
    let polls = 0;

    for (;;) {
      polls += 1;
      this.options.metrics?.driverPolls.inc();

      const fatal = cluster.fatalError();
      if (fatal) {
        throw fatal;
      }

      const elapsedMs = this.clock.now() - startedAt;
      if (this.gate.isSuccess()) {
        return {
          runId: this.runId,
          elapsedMs,
          bestHeight: this.gate.bestHeight(),
          polls,
        };
      }

      if (elapsedMs >= timeoutMs) {
        throw new LivenessTimeoutError(
          timeoutMs,
          elapsedMs,
          this.gate.bestHeight(),
          this.options.config.dropPolicy.heightTarget
        );
      }

      await this.clock.sleep(pollIntervalMs);
    }
  }

  /** A failed teardown is logged; the run's own result stands. */
  private async stopCluster(cluster: ClusterHandle): Promise<void> {
    try {
      await cluster.stop();
    } catch (error) {
      this.logger.error('cluster stop failed', { error: toError(error).message });
    }
  }

  private transition(next: DriverState): void {
    this.state = next;
    this.logger.debug('driver state changed', { state: next });
    this.options.onStateChange?.(next);
  }
}
