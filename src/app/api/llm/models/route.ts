import { NextResponse } from 'next/server';
import { getServices } from '@/lib/services';
import { errorResponse } from '@/lib/http';

export const dynamic = 'force-dynamic';

export async function GET(request: Request) {
  try {
    const { gateway } = await getServices();
    const models = await gateway.listModels({ signal: request.signal });
    return NextResponse.json({ models });
  } catch (error) {
    return errorResponse(error);
  }
}
