import { NextResponse } from 'next/server';
import { getServices } from '@/lib/services';
import { errorResponse } from '@/lib/http';

export const dynamic = 'force-dynamic';

export async function GET() {
  try {
    const { status } = await getServices();
    return NextResponse.json(await status.getSystemStatus());
  } catch (error) {
    return errorResponse(error);
  }
}
