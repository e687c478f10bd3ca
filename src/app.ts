import { createServer, type Server as HttpServer } from 'node:http';

import type express from 'express';

import { createStatusApp } from './api/status-server.js';
import { LivenessDriver, type LivenessOutcome } from './harness/driver.js';
import { Logger, setLogLevel } from './logging/logger.js';
import { MetricsRegistry } from './metrics/registry.js';
import type { HarnessConfig } from './types/config.js';

const logger = new Logger('harness-app');

export interface HarnessRuntime {
  app: express.Express;
  server: HttpServer;
  driver: LivenessDriver;
  metrics: MetricsRegistry;
  /** Starts the status endpoint (when configured) and runs one liveness check. */
  run: () => Promise<LivenessOutcome>;
  stop: () => Promise<void>;
}

export function createHarnessRuntime(config: HarnessConfig): HarnessRuntime {
  setLogLevel(config.logLevel);

  const metrics = new MetricsRegistry({ collectDefaults: config.nodeEnv !== 'test' });
  const driver = new LivenessDriver({ config, metrics });
  const app = createStatusApp(driver, metrics);
  const server = createServer(app);

  const listen = async (): Promise<void> => {
    if (config.statusPort <= 0) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(config.statusPort, () => {
        server.off('error', reject);
        resolve();
      });
    });
    logger.info('status endpoint listening', { port: config.statusPort });
  };

  const stop = async (): Promise<void> => {
    if (!server.listening) {
      return;
    }

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  };

  return {
    app,
    server,
    driver,
    metrics,
    run: async () => {
      await listen();
      logger.info('starting liveness run', {
        runId: driver.runId,
        dropRatio: config.dropPolicy.dropRatio,
        heightTarget: config.dropPolicy.heightTarget,
        timeoutMs: config.driver.timeoutMs,
        nodeCount: config.topology.nodeCount,
      });
      return driver.run();
    },
    stop,
  };
}
