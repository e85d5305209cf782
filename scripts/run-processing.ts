#!/usr/bin/env tsx

/**
 * Drain pending articles once in the foreground
 * Usage: npm run process [-- <batchSize>]
 * Ctrl+C stops dispatching; in-flight articles finish first.
 */

import './load-env';
import { DrainCancelledError } from '../src/pipeline/articleProcessor';
import { getServices } from '../src/lib/services';

async function main() {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('\n⏹  Cancelling, waiting for in-flight articles...');
    controller.abort();
  });

  try {
    const { config, processor } = await getServices();
    const batchSize = process.argv[2] ? Number(process.argv[2]) : config.processor.batchSize;
    if (!Number.isInteger(batchSize) || batchSize <= 0) {
      throw new Error(`Invalid batch size: ${process.argv[2]}`);
    }

    const stats = await processor.processPending(batchSize, { signal: controller.signal });
    console.log(`🎉 Processed ${stats.processed} articles (${stats.succeeded} succeeded, ${stats.failed} failed)`);
    process.exit(0);
  } catch (error) {
    if (error instanceof DrainCancelledError) {
      console.log(`⏹  ${error.message}`);
      process.exit(130);
    }
    console.error('\n💥 PROCESSING FAILED');
    console.error('Error:', error);
    process.exit(1);
  }
}

void main();
