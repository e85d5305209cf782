/**
 * API Route: /api/ingest
 *
 * Cron endpoint for scheduled ingestion runs.
 * Fetches every enabled source and stores new items as pending.
 */

import { NextResponse } from 'next/server';
import { getServices } from '@/lib/services';
import { errorResponse } from '@/lib/http';

export const dynamic = 'force-dynamic';

export async function GET(request: Request) {
  try {
    const { config, ingestor } = await getServices();

    // Verify cron secret when one is configured
    if (config.api.cronSecret) {
      const authHeader = request.headers.get('authorization');
      if (authHeader !== `Bearer ${config.api.cronSecret}`) {
        return NextResponse.json(
          { error: 'Unauthorized' },
          { status: 401 }
        );
      }
    }

    const summary = await ingestor.fetchAllEnabled({ signal: request.signal });

    return NextResponse.json({
      message: 'Ingestion completed',
      new_articles: summary.newItems,
      sources_processed: summary.sourcesProcessed,
      failures: summary.failures,
      reports: summary.reports
    });
  } catch (error) {
    return errorResponse(error);
  }
}

// Also support POST for manual triggers
export async function POST(request: Request) {
  return GET(request);
}
