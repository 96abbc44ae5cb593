/**
 * Conductor - observe, decide, act across Matrix and Farcaster.
 *
 * Entry point for the application.
 */

import 'dotenv/config';

import { createContainer, type Container } from './core/container.js';
import { ConfigError } from './core/errors.js';

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  container = await createContainer();
  const { logger, config, loop } = container;

  logger.info(
    {
      dryRun: config.executor.dryRun,
      tickIntervalMs: config.loop.tickIntervalMs,
      maxCyclesPerHour: config.loop.maxCyclesPerHour,
    },
    'Conductor starting...'
  );

  await container.start();
  logger.info({ state: loop.getState() }, 'Conductor running');
}

async function shutdown(exitCode = 0): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;

  if (container) {
    await container.shutdown();
  }
  process.exit(exitCode);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

process.on('uncaughtException', (error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught exception:', error);
  void shutdown(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Unhandled rejection:', reason);
  void shutdown(1);
});

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    // eslint-disable-next-line no-console
    console.error(`Configuration error: ${error.message}`, error.issues);
  } else {
    // eslint-disable-next-line no-console
    console.error('Failed to start:', error);
  }
  process.exit(1);
});
