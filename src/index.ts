#!/usr/bin/env node
import { createHarnessRuntime } from './app.js';
import { loadHarnessConfig } from './config/harness-config.js';
import { toError } from './errors.js';
import { Logger } from './logging/logger.js';

const logger = new Logger('main');

async function main(): Promise<void> {
  const config = loadHarnessConfig();
  const runtime = createHarnessRuntime(config);

  try {
    const outcome = await runtime.run();
    logger.info('run finished', { ...outcome });
  } finally {
    await runtime.stop();
  }

  process.stdout.write('Success\n');
  process.exit(0);
}

main().catch((error: unknown) => {
  const failure = toError(error);
  logger.error('liveness harness failed', {
    errorName: failure.name,
    error: failure.message,
  });
  process.exit(1);
});
