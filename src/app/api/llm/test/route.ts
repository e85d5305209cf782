import { NextResponse } from 'next/server';
import { getServices } from '@/lib/services';
import { errorMessage, logger } from '@/utils/logger';

export async function POST(request: Request) {
  try {
    const { gateway } = await getServices();
    const response = await gateway.testConnection({ signal: request.signal });
    return NextResponse.json({
      success: true,
      message: 'Connection succeeded',
      response
    });
  } catch (error) {
    logger.warn('LLM connection test failed', { error: errorMessage(error) });
    return NextResponse.json(
      { success: false, error: errorMessage(error) },
      { status: 500 }
    );
  }
}
