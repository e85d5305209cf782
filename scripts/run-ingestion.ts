#!/usr/bin/env tsx

/**
 * Runner for one ingestion pass
 * Usage: npm run ingest [-- <sourceId>]
 */

import './load-env';
import { getServices } from '../src/lib/services';

async function main() {
  const target = process.argv[2];
  console.log('🚀 Starting feed ingestion\n');
  console.log('═'.repeat(60));

  try {
    const { ingestor } = await getServices();

    if (target) {
      const sourceId = Number(target);
      if (!Number.isInteger(sourceId) || sourceId <= 0) {
        throw new Error(`Invalid source id: ${target}`);
      }
      const newItems = await ingestor.ingest(sourceId);
      console.log(`✅ Source ${sourceId}: ${newItems} new articles`);
      process.exit(0);
    }

    const summary = await ingestor.fetchAllEnabled();

    console.log('═'.repeat(60));
    console.log('📊 Results:');
    console.log(`   • Sources processed: ${summary.sourcesProcessed}`);
    console.log(`   • New articles: ${summary.newItems}`);
    console.log(`   • Failed sources: ${summary.failures}`);
    console.log(`   • Duration: ${summary.endTime - summary.startTime}ms`);

    for (const report of summary.reports) {
      if (!report.result.success) {
        console.log(`   ❌ ${report.name}: ${report.result.error}`);
      }
    }

    process.exit(summary.failures > 0 && summary.failures === summary.sourcesProcessed ? 1 : 0);
  } catch (error) {
    console.error('\n💥 INGESTION FAILED');
    console.error('Error:', error);
    process.exit(1);
  }
}

void main();
