#!/usr/bin/env tsx

/**
 * Long-running cron process: periodic ingestion and processing
 * Stops scheduling on SIGINT/SIGTERM and waits for a running drain.
 */

import './load-env';
import { getServices } from '../src/lib/services';
import { startScheduler } from '../src/scheduler/cron';

async function main() {
  try {
    const { config, ingestor, runner, logger } = await getServices();
    const scheduler = startScheduler({ config: config.cron, ingestor, runner, logger });

    const shutdown = (signal: string) => {
      logger.info(`Received ${signal}, shutting down`);
      scheduler.stop();
      runner.cancel();
      void runner.wait().then(() => process.exit(0));
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    console.error('💥 Scheduler failed to start');
    console.error('Error:', error);
    process.exit(1);
  }
}

void main();
