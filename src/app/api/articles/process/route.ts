/**
 * API Route: /api/articles/process
 *
 * POST starts a background drain of pending articles and returns at once;
 * GET reports the runner state; DELETE requests cancellation.
 */

import { NextResponse } from 'next/server';
import { z } from 'zod';
import { getServices } from '@/lib/services';
import { errorResponse } from '@/lib/http';

export const dynamic = 'force-dynamic';

const DEFAULT_LIMIT = 10;

const limitSchema = z.coerce.number().int().min(1).max(200).default(DEFAULT_LIMIT);

export async function POST(request: Request) {
  try {
    const raw = new URL(request.url).searchParams.get('limit');
    const limit = limitSchema.parse(raw || undefined);

    const { runner } = await getServices();
    const { started, snapshot } = runner.start(limit);

    return NextResponse.json(
      {
        message: started ? 'processing started' : 'processing already running',
        processing: snapshot
      },
      { status: started ? 202 : 409 }
    );
  } catch (error) {
    return errorResponse(error);
  }
}

export async function GET() {
  try {
    const { runner } = await getServices();
    return NextResponse.json(runner.snapshot());
  } catch (error) {
    return errorResponse(error);
  }
}

export async function DELETE() {
  try {
    const { runner } = await getServices();
    const cancelled = runner.cancel();
    return NextResponse.json({
      message: cancelled ? 'cancellation requested' : 'nothing running',
      processing: runner.snapshot()
    });
  } catch (error) {
    return errorResponse(error);
  }
}
