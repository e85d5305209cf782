import { NextResponse } from 'next/server';
import { z } from 'zod';
import { getServices } from '@/lib/services';
import { errorResponse, readJson } from '@/lib/http';

export const dynamic = 'force-dynamic';

const saveConfigSchema = z.record(z.string());

export async function GET() {
  try {
    const { store } = await getServices();
    return NextResponse.json(await store.getConfigMap());
  } catch (error) {
    return errorResponse(error);
  }
}

export async function POST(request: Request) {
  try {
    const values = saveConfigSchema.parse(await readJson(request));
    const { store } = await getServices();
    await store.setConfigValues(values);
    return NextResponse.json({ message: 'saved' });
  } catch (error) {
    return errorResponse(error);
  }
}
